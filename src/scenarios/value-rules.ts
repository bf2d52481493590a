/**
 * Sample value generation for schema-typed parameters.
 *
 * Rules are tried top to bottom and the first match wins. Name matching
 * is a case-insensitive substring test; the name rules only apply to
 * string parameters (or parameters with no declared type).
 */

import { SAMPLE_VALUES } from '../constants.js';
import { isRecord } from '../utils/json.js';

/**
 * A parameter as the rules see it.
 */
export interface ParamDescriptor {
  name: string;
  /** Lowercased name */
  lowerName: string;
  /** Lowercased declared type; `string` when none is declared */
  type: string;
  schema: Record<string, unknown>;
}

export interface ValueRule {
  /** Rule label, for logs and tests */
  id: string;
  matches: (param: ParamDescriptor) => boolean;
  generate: (param: ParamDescriptor) => unknown;
}

const nameHas =
  (...words: string[]) =>
  (param: ParamDescriptor): boolean =>
    param.type === 'string' && words.some((word) => param.lowerName.includes(word));

const typeIs =
  (type: string) =>
  (param: ParamDescriptor): boolean =>
    param.type === type;

/**
 * The ordered rule table; the first match wins. Enums are not consulted.
 */
export const VALUE_RULES: readonly ValueRule[] = [
  { id: 'url', matches: nameHas('url', 'link', 'href'), generate: () => SAMPLE_VALUES.URL },
  { id: 'email', matches: nameHas('email', 'mail'), generate: () => SAMPLE_VALUES.EMAIL },
  { id: 'query', matches: nameHas('query', 'search', 'term'), generate: () => SAMPLE_VALUES.QUERY },
  { id: 'identifier', matches: nameHas('id', 'key'), generate: () => SAMPLE_VALUES.IDENTIFIER },
  { id: 'string', matches: typeIs('string'), generate: () => SAMPLE_VALUES.STRING },
  { id: 'integer', matches: typeIs('integer'), generate: () => SAMPLE_VALUES.INTEGER },
  { id: 'number', matches: typeIs('number'), generate: () => SAMPLE_VALUES.NUMBER },
  { id: 'boolean', matches: typeIs('boolean'), generate: () => SAMPLE_VALUES.BOOLEAN },
  { id: 'array', matches: typeIs('array'), generate: () => [] },
  { id: 'object', matches: typeIs('object'), generate: () => ({}) },
];

/**
 * Declared type of a property schema, lowercased. Union types resolve to
 * their first non-null member; an untyped schema counts as a string.
 */
export function resolveType(schema: Record<string, unknown>): string {
  const declared = schema.type;
  if (typeof declared === 'string') {
    return declared.toLowerCase();
  }
  if (Array.isArray(declared)) {
    const first = declared.find(
      (entry): entry is string => typeof entry === 'string' && entry.toLowerCase() !== 'null'
    );
    if (first) {
      return first.toLowerCase();
    }
  }
  return 'string';
}

export function describeParam(name: string, schema: unknown): ParamDescriptor {
  const record = isRecord(schema) ? schema : {};
  return { name, lowerName: name.toLowerCase(), type: resolveType(record), schema: record };
}

/**
 * Sample value for one parameter. Unknown types get null.
 */
export function generateSampleValue(name: string, schema: unknown, rules: readonly ValueRule[] = VALUE_RULES): unknown {
  const param = describeParam(name, schema);
  const rule = rules.find((candidate) => candidate.matches(param));
  return rule ? rule.generate(param) : null;
}
