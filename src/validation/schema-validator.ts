import { Ajv2020 as Ajv } from 'ajv/dist/2020.js';
import type { ValidateFunction } from 'ajv';
import type { OperationInputSchema } from '../transport/types.js';
import { getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

const logger = getLogger('schema-validator');

export interface ArgumentCheck {
  /** null when the schema could not be compiled */
  valid: boolean | null;
  errors: string[];
}

/**
 * Checks argument sets against operation input schemas. Compiled
 * validators are cached per schema object.
 */
export class SchemaValidator {
  private readonly ajv = new Ajv({
    allErrors: true,
    strict: false,
    allowUnionTypes: true,
    validateFormats: false,
  });
  private readonly compiled = new WeakMap<object, ValidateFunction | null>();

  check(schema: OperationInputSchema, args: Record<string, unknown>): ArgumentCheck {
    const validate = this.compile(schema);
    if (!validate) {
      return { valid: null, errors: [] };
    }
    if (validate(args)) {
      return { valid: true, errors: [] };
    }
    const errors = (validate.errors ?? []).map(
      (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
    );
    return { valid: false, errors };
  }

  private compile(schema: OperationInputSchema): ValidateFunction | null {
    const cached = this.compiled.get(schema);
    if (cached !== undefined) {
      return cached;
    }

    // Servers declare assorted drafts; the keywords used by tool schemas
    // read the same under 2020-12.
    const { $schema: _declared, ...body } = schema;
    let validate: ValidateFunction | null;
    try {
      validate = this.ajv.compile(body);
    } catch (error) {
      logger.debug({ error: getErrorMessage(error) }, 'Input schema does not compile');
      validate = null;
    }
    this.compiled.set(schema, validate);
    return validate;
  }
}
