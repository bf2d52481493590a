/**
 * Input sanitization for server-supplied text placed in LLM prompts.
 *
 * Tool schemas and error messages come from the server under test, so
 * they are treated as data: instruction-like phrases are filtered and the
 * content is fenced in labelled delimiters.
 */

/**
 * Patterns that may indicate prompt injection attempts.
 */
const INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/gi,
  /disregard\s+(all\s+)?(previous|above|prior)/gi,
  /forget\s+(everything|all|what)\s+(you|i)/gi,
  /new\s+instructions?:/gi,
  /system\s*:\s*you\s+(are|should|must|will)/gi,
  /\byou\s+are\s+now\b/gi,
  /\bpretend\s+(to\s+be|you\s+are)\b/gi,
  /\byour\s+(new\s+)?role\s+is\b/gi,
  /```\s*(system|instruction|prompt)/gi,
];

const FILTERED = '[FILTERED]';

export interface SanitizeResult {
  sanitized: string;
  /** Sources of the patterns that matched */
  detectedPatterns: string[];
}

export function sanitizeForPrompt(text: string): SanitizeResult {
  let sanitized = text;
  const detectedPatterns: string[] = [];

  for (const pattern of INJECTION_PATTERNS) {
    const next = sanitized.replace(pattern, FILTERED);
    if (next !== sanitized) {
      detectedPatterns.push(pattern.source);
      sanitized = next;
    }
  }

  return { sanitized, detectedPatterns };
}

export function hasInjectionPatterns(text: string): boolean {
  return sanitizeForPrompt(text).detectedPatterns.length > 0;
}

export function truncateForPrompt(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}... [truncated]`;
}

/**
 * Fence content in `<LABEL_DATA>` delimiters after filtering it.
 */
export function createDataSection(label: string, content: string): string {
  const tag = `${label.toUpperCase()}_DATA`;
  return `<${tag}>\n${sanitizeForPrompt(content).sanitized}\n</${tag}>`;
}
