/**
 * Prompt templates for LLM-backed argument correction.
 *
 * Everything taken from the server (schema, arguments, error text) goes
 * through createDataSection before it reaches a prompt.
 */

import type { Operation } from '../transport/types.js';
import { createDataSection, sanitizeForPrompt, truncateForPrompt } from '../utils/sanitize.js';

/** Longest error text passed to the model */
const MAX_ERROR_LENGTH = 2000;

export const CORRECTION_SYSTEM_PROMPT = `You repair arguments for tool calls. You are given a tool's JSON Schema, arguments that the tool rejected, and the validation error it returned. Reply with a single JSON object holding corrected arguments that satisfy the schema. Keep values that were already valid. Do not add commentary.`;

export interface CorrectionPromptContext {
  operation: Operation;
  args: Record<string, unknown>;
  error: string;
}

export function buildCorrectionPrompt(ctx: CorrectionPromptContext): string {
  const { operation, args, error } = ctx;
  const description = operation.description ? `\nDescription: ${sanitizeForPrompt(operation.description).sanitized}` : '';

  return `Tool: ${operation.name}${description}

Input schema:
${createDataSection('schema', JSON.stringify(operation.inputSchema, null, 2))}

Rejected arguments:
${createDataSection('arguments', JSON.stringify(args, null, 2))}

Error returned by the tool:
${createDataSection('error', truncateForPrompt(error, MAX_ERROR_LENGTH))}

Return only the corrected arguments as a JSON object.`;
}
