import type { ArgumentCorrector, CorrectionRequest } from './corrector.js';
import type { LLMClient } from '../llm/client.js';
import { parseJSONResponse } from '../llm/client.js';
import { CORRECTION_SYSTEM_PROMPT, buildCorrectionPrompt } from '../prompts/templates.js';
import { SchemaValidator } from '../validation/schema-validator.js';
import { LLM_DEFAULTS } from '../constants.js';
import { getErrorMessage, type ToolInvocationError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { isRecord, serializeJson, stableStringify } from '../utils/json.js';

export interface LLMArgumentCorrectorOptions {
  maxTokens?: number;
  /** Shared validator; a private one is created when omitted */
  validator?: SchemaValidator;
}

/**
 * Error text handed to the model: the message, plus the server's error
 * payload when it carried one.
 */
export function describeToolError(error: ToolInvocationError): string {
  if (error.details === undefined || error.details === null) {
    return error.message;
  }
  return `${error.message}\n${serializeJson(error.details)}`;
}

/**
 * Asks an LLM for replacement arguments and accepts them only when they
 * are a JSON object that differs from the rejected one and passes the
 * operation's input schema.
 */
export class LLMArgumentCorrector implements ArgumentCorrector {
  private readonly logger = getLogger('llm-corrector');
  private readonly llm: LLMClient;
  private readonly validator: SchemaValidator;
  private readonly maxTokens: number;

  constructor(llm: LLMClient, options: LLMArgumentCorrectorOptions = {}) {
    this.llm = llm;
    this.validator = options.validator ?? new SchemaValidator();
    this.maxTokens = options.maxTokens ?? LLM_DEFAULTS.MAX_TOKENS;
  }

  async correct(request: CorrectionRequest): Promise<Record<string, unknown> | null> {
    const { operation, args, error } = request;
    const prompt = buildCorrectionPrompt({ operation, args, error: describeToolError(error) });

    let reply: string;
    try {
      reply = await this.llm.complete(prompt, {
        systemPrompt: CORRECTION_SYSTEM_PROMPT,
        responseFormat: 'json',
        maxTokens: this.maxTokens,
      });
    } catch (llmError) {
      this.logger.warn({ tool: operation.name, error: getErrorMessage(llmError) }, 'Correction request failed');
      return null;
    }

    const corrected = parseJSONResponse(reply);
    if (!isRecord(corrected)) {
      this.logger.debug({ tool: operation.name, reply: reply.slice(0, 200) }, 'Correction reply is not a JSON object');
      return null;
    }
    if (stableStringify(corrected) === stableStringify(args)) {
      this.logger.debug({ tool: operation.name }, 'Correction reply repeats the rejected arguments');
      return null;
    }

    const check = this.validator.check(operation.inputSchema, corrected);
    if (check.valid === false) {
      this.logger.debug({ tool: operation.name, errors: check.errors }, 'Corrected arguments fail the input schema');
      return null;
    }

    this.logger.debug({ tool: operation.name }, 'Arguments corrected');
    return corrected;
  }
}
