import { generateSampleValue, VALUE_RULES, type ValueRule } from './value-rules.js';
import type { Operation } from '../transport/types.js';
import {
  FILTER_PARAMS,
  PAGE_NUMBER_PARAMS,
  PAGE_OFFSET_PARAMS,
  PAGINATION_PARAMS,
  SCENARIO_PAGE_SIZES,
} from '../constants.js';
import { isRecord } from '../utils/json.js';

export type ScenarioName = 'minimal' | 'typical' | 'large';

export const SCENARIO_NAMES: readonly ScenarioName[] = ['minimal', 'typical', 'large'];

/**
 * One concrete way to call an operation.
 */
export interface Scenario {
  name: ScenarioName;
  operation: Operation;
  args: Record<string, unknown>;
  description: string;
}

export interface SynthesizerOptions {
  /** Parameter names treated as pagination controls */
  paginationParams?: readonly string[];
  /** Parameter names treated as filters */
  filterParams?: readonly string[];
  rules?: readonly ValueRule[];
}

function hasOwn(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

const PAGE_NUMBER = new Set<string>(PAGE_NUMBER_PARAMS);
const PAGE_OFFSET = new Set<string>(PAGE_OFFSET_PARAMS);

/**
 * Value for a pagination parameter at the given page size, or undefined
 * for opaque cursors, which have no meaningful first value.
 */
export function paginationValue(name: string, pageSize: number): number | undefined {
  const lower = name.toLowerCase();
  if (lower.includes('cursor') || lower.includes('token')) {
    return undefined;
  }
  if (PAGE_NUMBER.has(lower)) {
    return 1;
  }
  if (PAGE_OFFSET.has(lower)) {
    return 0;
  }
  return pageSize;
}

/**
 * Builds the three scenarios for an operation from its input schema.
 * Output depends only on the schema and the options.
 */
export class ArgumentSynthesizer {
  private readonly paginationParams: Set<string>;
  private readonly filterParams: Set<string>;
  private readonly rules: readonly ValueRule[];

  constructor(options: SynthesizerOptions = {}) {
    this.paginationParams = new Set((options.paginationParams ?? PAGINATION_PARAMS).map((name) => name.toLowerCase()));
    this.filterParams = new Set((options.filterParams ?? FILTER_PARAMS).map((name) => name.toLowerCase()));
    this.rules = options.rules ?? VALUE_RULES;
  }

  /**
   * Declared parameters recognized as pagination controls, in schema order.
   */
  paginationParamsOf(operation: Operation): string[] {
    return Object.keys(this.propertiesOf(operation)).filter((name) => this.paginationParams.has(name.toLowerCase()));
  }

  /**
   * Declared parameters recognized as filters, in schema order.
   */
  filterParamsOf(operation: Operation): string[] {
    return Object.keys(this.propertiesOf(operation)).filter((name) => this.filterParams.has(name.toLowerCase()));
  }

  /**
   * Required parameters only, each from the value rules.
   */
  minimalArgs(operation: Operation): Record<string, unknown> {
    const properties = this.propertiesOf(operation);
    const args: Record<string, unknown> = {};
    for (const name of operation.inputSchema.required ?? []) {
      if (hasOwn(args, name)) continue;
      args[name] = generateSampleValue(name, properties[name], this.rules);
    }
    return args;
  }

  synthesize(operation: Operation): Scenario[] {
    const properties = this.propertiesOf(operation);
    const minimal = this.minimalArgs(operation);

    const typical: Record<string, unknown> = { ...minimal };
    const large: Record<string, unknown> = { ...minimal };
    for (const name of this.paginationParamsOf(operation)) {
      const small = paginationValue(name, SCENARIO_PAGE_SIZES.typical);
      const big = paginationValue(name, SCENARIO_PAGE_SIZES.large);
      if (small !== undefined) typical[name] = small;
      if (big !== undefined) large[name] = big;
    }
    for (const name of this.filterParamsOf(operation)) {
      if (!hasOwn(typical, name)) {
        typical[name] = generateSampleValue(name, properties[name], this.rules);
      }
    }

    return [
      { name: 'minimal', operation, args: minimal, description: 'Required parameters only' },
      { name: 'typical', operation, args: typical, description: 'Typical usage with a small page size' },
      { name: 'large', operation, args: large, description: 'Large page size to probe response limits' },
    ];
  }

  private propertiesOf(operation: Operation): Record<string, unknown> {
    const properties = operation.inputSchema.properties;
    return isRecord(properties) ? properties : {};
  }
}
