import { TOKEN_EFFICIENCY } from '../constants.js';
import { serializeJson } from './json.js';

/**
 * Estimate the token count of a response payload.
 *
 * Absent or null payloads count as zero; anything else is at least one token.
 */
export function estimateTokens(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  const length = serializeJson(value).length;
  return Math.max(1, Math.floor(length / TOKEN_EFFICIENCY.CHARS_PER_TOKEN));
}

/**
 * Measure the serialized size of a payload.
 */
export function measurePayload(value: unknown): { sizeBytes: number; tokenEstimate: number } {
  if (value === null || value === undefined) {
    return { sizeBytes: 0, tokenEstimate: 0 };
  }
  return {
    sizeBytes: Buffer.byteLength(serializeJson(value), 'utf8'),
    tokenEstimate: estimateTokens(value),
  };
}
