/**
 * Structural heuristics over tool responses. All of them are approximate
 * and tunable through the analysis config.
 */

import type { ResponseSignals } from './types.js';
import {
  COLLECTION_KEYS,
  LOW_VALUE_PATTERNS,
  TOKEN_EFFICIENCY,
  TRUNCATION_INDICATORS,
  VERBOSE_IDENTIFIER_PATTERNS,
} from '../constants.js';
import { isRecord, serializeJson, tryParseJson } from '../utils/json.js';

export interface SignalOptions {
  collectionKeys?: readonly string[];
  /** Regex sources */
  verboseIdentifierPatterns?: readonly string[];
}

/**
 * The data a tool result carries. Structured content wins; otherwise text
 * blocks are read as JSON where they parse. A single block yields its value,
 * several yield an array. Anything else is returned unchanged.
 */
export function extractPayload(response: unknown): unknown {
  if (!isRecord(response)) {
    return response;
  }
  if (response.structuredContent !== undefined) {
    return response.structuredContent;
  }
  if (!Array.isArray(response.content)) {
    return response;
  }

  const values = response.content.flatMap((block): unknown[] => {
    if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
      return [tryParseJson(block.text) ?? block.text];
    }
    return [];
  });
  if (values.length === 0) {
    return response.content;
  }
  return values.length === 1 ? values[0] : values;
}

function isStructured(payload: unknown): payload is object {
  return typeof payload === 'object' && payload !== null;
}

/**
 * A sequence, or an object holding an array under a record-list name.
 */
export function isCollectionShaped(payload: unknown, keys: readonly string[] = COLLECTION_KEYS): boolean {
  if (Array.isArray(payload)) {
    return true;
  }
  if (!isRecord(payload)) {
    return false;
  }
  const wanted = new Set(keys.map((key) => key.toLowerCase()));
  return Object.entries(payload).some(([key, value]) => wanted.has(key.toLowerCase()) && Array.isArray(value));
}

export function compileIdentifierPatterns(sources: readonly string[] = VERBOSE_IDENTIFIER_PATTERNS): RegExp[] {
  return sources.map((source) => new RegExp(source));
}

/**
 * Identifier-shaped strings anywhere in the payload. Plain text payloads
 * are scanned too.
 */
export function hasVerboseIdentifiers(payload: unknown, patterns: readonly RegExp[] = compileIdentifierPatterns()): boolean {
  let text: string;
  if (typeof payload === 'string') {
    text = payload;
  } else if (isStructured(payload)) {
    text = serializeJson(payload);
  } else {
    return false;
  }
  return patterns.some((pattern) => pattern.test(text));
}

export function isTruncated(payload: unknown): boolean {
  if (!isStructured(payload)) {
    return false;
  }
  const text = serializeJson(payload).toLowerCase();
  return TRUNCATION_INDICATORS.some((indicator) => text.includes(indicator));
}

/**
 * True when low-value patterns (timestamps, metadata, internal or debug
 * fields) exceed the configured share of the payload's field count.
 */
export function hasLowValueData(payload: unknown): boolean {
  if (!isStructured(payload)) {
    return false;
  }
  const text = serializeJson(payload).toLowerCase();
  const fieldCount = text.split('":').length - 1;
  if (fieldCount === 0) {
    return false;
  }
  const hits = LOW_VALUE_PATTERNS.filter((pattern) => pattern.test(text)).length;
  return hits / fieldCount > TOKEN_EFFICIENCY.LOW_VALUE_RATIO;
}

/**
 * All signals for one tool result.
 */
export function readSignals(response: unknown, options: SignalOptions = {}, patterns?: readonly RegExp[]): ResponseSignals {
  const payload = extractPayload(response);
  return {
    collectionShaped: isCollectionShaped(payload, options.collectionKeys),
    verboseIdentifiers: hasVerboseIdentifiers(
      payload,
      patterns ?? compileIdentifierPatterns(options.verboseIdentifierPatterns)
    ),
    truncated: isTruncated(payload),
    lowValueData: hasLowValueData(payload),
  };
}

export const NO_SIGNALS: ResponseSignals = Object.freeze({
  collectionShaped: false,
  verboseIdentifiers: false,
  truncated: false,
  lowValueData: false,
});
