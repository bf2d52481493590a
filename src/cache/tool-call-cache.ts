/**
 * File-backed store for successful tool calls.
 *
 * Layout under the cache directory:
 *   <sha256(server)[:16]>/_metadata.json
 *   <sha256(server)[:16]>/<operation>/_index.json
 *   <sha256(server)[:16]>/<operation>/<scenario>_<timestamp>.json
 *
 * The store is write-mostly: analysis writes to it and never reads it back
 * to decide anything. Write failures are logged, never thrown.
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { PATHS } from '../constants.js';
import { getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

const logger = getLogger('tool-call-cache');

export interface ToolCallMetrics {
  tokenEstimate: number;
  elapsedMs: number;
  sizeBytes: number;
  corrected: boolean;
}

/**
 * What the harness hands over for one successful scenario.
 */
export interface ToolCallRecordInput {
  operation: string;
  scenario: string;
  input: Record<string, unknown>;
  output: unknown;
  metrics: ToolCallMetrics;
}

const toolCallRecordSchema = z.object({
  key: z.string(),
  operation_name: z.string(),
  server_identity: z.string(),
  timestamp: z.string(),
  scenario_name: z.string(),
  input_params: z.record(z.unknown()),
  output_response: z.unknown(),
  metrics: z.object({
    tokenEstimate: z.number(),
    elapsedMs: z.number(),
    sizeBytes: z.number(),
    corrected: z.boolean(),
  }),
});

export type ToolCallRecord = z.infer<typeof toolCallRecordSchema>;

const operationIndexSchema = z.object({
  operation_name: z.string(),
  total_cached_calls: z.number().int(),
  first_cached: z.string(),
  last_cached: z.string(),
  scenarios: z.record(z.number().int()),
});

export type OperationIndex = z.infer<typeof operationIndexSchema>;

export interface ToolCallCacheStats {
  serverIdentity: string;
  cachePath: string;
  totalOperations: number;
  totalCalls: number;
  operations: Record<string, OperationIndex>;
}

/**
 * Sink the harness writes successful results to.
 */
export interface ResultSink {
  record(entry: ToolCallRecordInput): void;
}

export interface ToolCallCacheOptions {
  /** Server identity; namespaces the cache */
  server: string;
  dir?: string;
  now?: () => Date;
}

export function hashServer(server: string): string {
  return createHash('sha256').update(server).digest('hex').slice(0, 16);
}

/**
 * Key of a record: the hash of the server identity and the operation name.
 */
export function recordKey(server: string, operation: string): string {
  return createHash('sha256').update(`${server}\n${operation}`).digest('hex');
}

/**
 * Operation name usable as a directory name.
 */
export function sanitizeOperationName(name: string): string {
  const sanitized = name.replace(/[/\\ ]/g, '_').replace(/[^A-Za-z0-9_-]/g, '');
  return sanitized || 'unknown_operation';
}

/**
 * Directory of an operation's records. The hash suffix keeps names that
 * sanitize alike (`get.user`, `getuser`) apart.
 */
export function operationDirName(name: string): string {
  const suffix = createHash('sha256').update(name).digest('hex').slice(0, 8);
  return `${sanitizeOperationName(name)}_${suffix}`;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function formatFileTimestamp(date: Date): string {
  // 2026-10-19T08:30:12.345Z -> 20261019_083012_345
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}_${iso.slice(20, 23)}`;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export class ToolCallCache implements ResultSink {
  private readonly server: string;
  private readonly root: string;
  private readonly now: () => Date;

  constructor(options: ToolCallCacheOptions) {
    this.server = options.server;
    this.root = join(expandHome(options.dir ?? PATHS.DEFAULT_CACHE_DIR), hashServer(options.server));
    this.now = options.now ?? (() => new Date());
  }

  getCachePath(): string {
    return this.root;
  }

  record(entry: ToolCallRecordInput): void {
    try {
      this.ensureRoot();
      const dir = join(this.root, operationDirName(entry.operation));
      mkdirSync(dir, { recursive: true });

      const at = this.now();
      const record: ToolCallRecord = {
        key: recordKey(this.server, entry.operation),
        operation_name: entry.operation,
        server_identity: this.server,
        timestamp: at.toISOString(),
        scenario_name: entry.scenario,
        input_params: entry.input,
        output_response: entry.output,
        metrics: entry.metrics,
      };

      const base = `${entry.scenario}_${formatFileTimestamp(at)}`;
      let file = join(dir, `${base}.json`);
      for (let n = 1; existsSync(file); n++) {
        file = join(dir, `${base}_${n}.json`);
      }
      writeFileSync(file, JSON.stringify(record, null, 2));
      logger.debug({ operation: entry.operation, scenario: entry.scenario, file }, 'Cached tool call');

      this.updateIndex(dir, entry.operation, record.timestamp);
    } catch (error) {
      logger.warn({ operation: entry.operation, error: getErrorMessage(error) }, 'Failed to cache tool call');
    }
  }

  /**
   * Cached records, newest first. Unreadable files are skipped.
   */
  getCachedCalls(operation?: string): ToolCallRecord[] {
    const dirs = operation ? [operationDirName(operation)] : this.operationDirs();
    const records: ToolCallRecord[] = [];

    for (const name of dirs) {
      const dir = join(this.root, name);
      if (!existsSync(dir)) continue;
      for (const file of readdirSync(dir)) {
        if (file.startsWith('_') || !file.endsWith('.json')) continue;
        try {
          const parsed = toolCallRecordSchema.safeParse(readJson(join(dir, file)));
          if (parsed.success && (!operation || parsed.data.operation_name === operation)) {
            records.push(parsed.data);
          }
        } catch (error) {
          logger.debug({ file, error: getErrorMessage(error) }, 'Skipping unreadable cache file');
        }
      }
    }

    return records.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  getStats(): ToolCallCacheStats {
    const operations: Record<string, OperationIndex> = {};
    let totalCalls = 0;

    for (const name of this.operationDirs()) {
      const index = this.readIndex(join(this.root, name));
      if (index) {
        operations[index.operation_name] = index;
        totalCalls += index.total_cached_calls;
      }
    }

    return {
      serverIdentity: this.server,
      cachePath: this.root,
      totalOperations: Object.keys(operations).length,
      totalCalls,
      operations,
    };
  }

  /**
   * Delete the records of one operation, or of the whole server.
   */
  clear(operation?: string): void {
    const target = operation ? join(this.root, operationDirName(operation)) : this.root;
    rmSync(target, { recursive: true, force: true });
    logger.info({ server: this.server, operation }, 'Cleared tool-call cache');
  }

  private ensureRoot(): void {
    mkdirSync(this.root, { recursive: true });
    const metadata = join(this.root, '_metadata.json');
    if (!existsSync(metadata)) {
      writeFileSync(
        metadata,
        JSON.stringify({ server_identity: this.server, created_at: this.now().toISOString() }, null, 2)
      );
    }
  }

  private operationDirs(): string[] {
    if (!existsSync(this.root)) {
      return [];
    }
    return readdirSync(this.root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
  }

  private readIndex(dir: string): OperationIndex | null {
    const path = join(dir, '_index.json');
    if (!existsSync(path)) {
      return null;
    }
    try {
      const parsed = operationIndexSchema.safeParse(readJson(path));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.debug({ path, error: getErrorMessage(error) }, 'Unreadable cache index');
      return null;
    }
  }

  private updateIndex(dir: string, operation: string, timestamp: string): void {
    const previous = this.readIndex(dir);
    const scenarios: Record<string, number> = {};
    let total = 0;
    for (const file of readdirSync(dir)) {
      if (file.startsWith('_') || !file.endsWith('.json')) continue;
      const scenario = file.replace(/_\d{8}_\d{6}_\d{3}(?:_\d+)?\.json$/, '');
      scenarios[scenario] = (scenarios[scenario] ?? 0) + 1;
      total++;
    }

    const index: OperationIndex = {
      operation_name: operation,
      total_cached_calls: total,
      first_cached: previous?.first_cached ?? timestamp,
      last_cached: timestamp,
      scenarios,
    };
    writeFileSync(join(dir, '_index.json'), JSON.stringify(index, null, 2));
  }
}
