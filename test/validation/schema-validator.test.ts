import { describe, it, expect } from 'vitest';
import { SchemaValidator } from '../../src/validation/schema-validator.js';

describe('SchemaValidator', () => {
  const schema = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      limit: { type: 'integer', maximum: 100 },
      email: { type: 'string', format: 'email' },
    },
    required: ['limit'],
  };

  it('should accept conforming arguments', () => {
    expect(new SchemaValidator().check(schema, { limit: 10 })).toEqual({ valid: true, errors: [] });
  });

  it('should report every violation', () => {
    const check = new SchemaValidator().check(schema, { limit: 1000, email: 7 });

    expect(check.valid).toBe(false);
    expect(check.errors).toEqual(['/limit must be <= 100', '/email must be string']);
  });

  it('should name the root for missing properties', () => {
    expect(new SchemaValidator().check(schema, {}).errors).toEqual(["/ must have required property 'limit'"]);
  });

  it('should not check formats', () => {
    expect(new SchemaValidator().check(schema, { limit: 1, email: 'not-an-email' }).valid).toBe(true);
  });

  it('should return null for schemas that do not compile', () => {
    const validator = new SchemaValidator();
    const broken = { type: 'object', properties: { a: { type: 'no-such-type' } } };

    expect(validator.check(broken, { a: 1 })).toEqual({ valid: null, errors: [] });
    expect(validator.check(broken, { a: 2 })).toEqual({ valid: null, errors: [] });
  });
});
