/**
 * JSON value types and helpers shared by the transport, synthesis and cache layers.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Type guard for plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialize a value the way the server sent it. `undefined` and values
 * JSON cannot represent serialize to an empty string.
 */
export function serializeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return String(value);
  }
}

/**
 * Deterministic JSON serialization with sorted object keys.
 * Used for hashing so that key order never changes a cache key.
 */
export function stableStringify(value: unknown): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (input === null || input === undefined) return input;

    if (typeof input === 'string' || typeof input === 'number' || typeof input === 'boolean') {
      return input;
    }

    if (typeof input === 'bigint') {
      return input.toString();
    }

    if (typeof input === 'symbol' || typeof input === 'function') {
      return String(input);
    }

    if (input instanceof Date) {
      return input.toISOString();
    }

    if (Array.isArray(input)) {
      return input.map((item) => normalize(item));
    }

    if (isRecord(input)) {
      if (seen.has(input)) {
        return '[Circular]';
      }
      seen.add(input);
      const normalized: Record<string, unknown> = {};
      for (const key of Object.keys(input).sort()) {
        normalized[key] = normalize(input[key]);
      }
      return normalized;
    }

    return String(input);
  };

  const json = JSON.stringify(normalize(value));
  return json === undefined ? 'undefined' : json;
}

/**
 * Parse JSON text without throwing. Returns undefined for invalid input.
 */
export function tryParseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
