import { describe, it, expect } from 'vitest';
import { ArgumentSynthesizer, paginationValue } from '../../src/scenarios/argument-synthesizer.js';
import type { Operation } from '../../src/transport/types.js';

function op(properties: Record<string, unknown>, required: string[] = []): Operation {
  return { name: 'list_items', description: '', inputSchema: { type: 'object', properties, required } };
}

const listItems = op(
  {
    project_id: { type: 'string' },
    limit: { type: 'integer' },
    offset: { type: 'integer' },
    cursor: { type: 'string' },
    status: { type: 'string', enum: ['open', 'closed'] },
    query: { type: 'string' },
  },
  ['project_id']
);

describe('ArgumentSynthesizer', () => {
  const synthesizer = new ArgumentSynthesizer();

  it('should build minimal, typical and large scenarios', () => {
    const [minimal, typical, large] = synthesizer.synthesize(listItems);

    expect(minimal?.name).toBe('minimal');
    expect(minimal?.args).toEqual({ project_id: 'sample_id' });
    expect(typical?.name).toBe('typical');
    expect(typical?.args).toEqual({
      project_id: 'sample_id',
      limit: 10,
      offset: 0,
      status: 'sample_value',
      query: 'sample query',
    });
    expect(large?.name).toBe('large');
    expect(large?.args).toEqual({ project_id: 'sample_id', limit: 1000, offset: 0 });
  });

  it('should build search scenarios from a required query', () => {
    const search = op({ query: { type: 'string' }, limit: { type: 'integer' } }, ['query']);

    expect(synthesizer.synthesize(search).map((scenario) => scenario.args)).toEqual([
      { query: 'sample query' },
      { query: 'sample query', limit: 10 },
      { query: 'sample query', limit: 1000 },
    ]);
  });

  it('should recognize pagination and filter parameters in schema order', () => {
    expect(synthesizer.paginationParamsOf(listItems)).toEqual(['limit', 'offset', 'cursor']);
    expect(synthesizer.filterParamsOf(listItems)).toEqual(['status', 'query']);
  });

  it('should start page numbers at one', () => {
    const [, typical, large] = synthesizer.synthesize(op({ page: { type: 'integer' } }));

    expect(typical?.args).toEqual({ page: 1 });
    expect(large?.args).toEqual({ page: 1 });
  });

  it('should let pagination override a required value', () => {
    const [minimal, typical] = synthesizer.synthesize(op({ limit: { type: 'integer' } }, ['limit']));

    expect(minimal?.args).toEqual({ limit: 1 });
    expect(typical?.args).toEqual({ limit: 10 });
  });

  it('should fill required names missing from properties', () => {
    expect(synthesizer.minimalArgs(op({}, ['title']))).toEqual({ title: 'sample_value' });
  });

  it('should produce identical arguments for an operation without parameters', () => {
    const scenarios = synthesizer.synthesize(op({}));

    expect(scenarios.map((scenario) => scenario.args)).toEqual([{}, {}, {}]);
  });

  it('should be deterministic', () => {
    expect(synthesizer.synthesize(listItems)).toEqual(synthesizer.synthesize(listItems));
  });

  it('should honor configured parameter names', () => {
    const custom = new ArgumentSynthesizer({ paginationParams: ['Top'], filterParams: ['tenant'] });
    const operation = op({ top: { type: 'integer' }, tenant: { type: 'string' }, limit: { type: 'integer' } });

    const [, typical, large] = custom.synthesize(operation);

    expect(typical?.args).toEqual({ top: 10, tenant: 'sample_value' });
    expect(large?.args).toEqual({ top: 1000 });
  });
});

describe('paginationValue', () => {
  it('should pick values by parameter kind', () => {
    expect(paginationValue('limit', 10)).toBe(10);
    expect(paginationValue('per_page', 1000)).toBe(1000);
    expect(paginationValue('Page', 10)).toBe(1);
    expect(paginationValue('START', 1000)).toBe(0);
  });

  it('should leave cursors and tokens unset', () => {
    expect(paginationValue('cursor', 10)).toBeUndefined();
    expect(paginationValue('next_token', 10)).toBeUndefined();
  });
});
