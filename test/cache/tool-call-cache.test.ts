import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import {
  ToolCallCache,
  expandHome,
  hashServer,
  operationDirName,
  recordKey,
  sanitizeOperationName,
  type ToolCallRecordInput,
} from '../../src/cache/tool-call-cache.js';

const SERVER = 'node weather-server.js';

function entry(overrides: Partial<ToolCallRecordInput> = {}): ToolCallRecordInput {
  return {
    operation: 'get_forecast',
    scenario: 'minimal',
    input: { city: 'sample_value' },
    output: { content: [{ type: 'text', text: 'sunny' }] },
    metrics: { tokenEstimate: 12, elapsedMs: 4, sizeBytes: 48, corrected: false },
    ...overrides,
  };
}

/** A clock that advances one second per reading. */
function steppingClock(start = '2026-10-19T08:30:12.345Z'): () => Date {
  let tick = 0;
  return () => new Date(Date.parse(start) + 1000 * tick++);
}

describe('ToolCallCache', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'toolscope-cache-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should namespace records by a hash of the server identity', () => {
    const cache = new ToolCallCache({ server: SERVER, dir });

    expect(cache.getCachePath()).toBe(join(dir, hashServer(SERVER)));
  });

  it('should write one file per call with the record fields', () => {
    const at = new Date('2026-10-19T08:30:12.345Z');
    const cache = new ToolCallCache({ server: SERVER, dir, now: () => at });

    cache.record(entry());

    const opDir = join(cache.getCachePath(), operationDirName('get_forecast'));
    expect(readdirSync(opDir).sort()).toEqual(['_index.json', 'minimal_20261019_083012_345.json']);
    expect(JSON.parse(readFileSync(join(opDir, 'minimal_20261019_083012_345.json'), 'utf-8'))).toEqual({
      key: recordKey(SERVER, 'get_forecast'),
      operation_name: 'get_forecast',
      server_identity: SERVER,
      timestamp: '2026-10-19T08:30:12.345Z',
      scenario_name: 'minimal',
      input_params: { city: 'sample_value' },
      output_response: { content: [{ type: 'text', text: 'sunny' }] },
      metrics: { tokenEstimate: 12, elapsedMs: 4, sizeBytes: 48, corrected: false },
    });
    expect(JSON.parse(readFileSync(join(cache.getCachePath(), '_metadata.json'), 'utf-8'))).toEqual({
      server_identity: SERVER,
      created_at: '2026-10-19T08:30:12.345Z',
    });
  });

  it('should never overwrite a record written in the same millisecond', () => {
    const at = new Date('2026-10-19T08:30:12.345Z');
    const cache = new ToolCallCache({ server: SERVER, dir, now: () => at });

    cache.record(entry());
    cache.record(entry());

    expect(readdirSync(join(cache.getCachePath(), operationDirName('get_forecast'))).sort()).toEqual([
      '_index.json',
      'minimal_20261019_083012_345.json',
      'minimal_20261019_083012_345_1.json',
    ]);
    expect(cache.getStats().operations.get_forecast?.scenarios).toEqual({ minimal: 2 });
  });

  it('should keep per-operation statistics', () => {
    const cache = new ToolCallCache({ server: SERVER, dir, now: steppingClock() });

    cache.record(entry({ scenario: 'minimal' }));
    cache.record(entry({ scenario: 'typical' }));
    cache.record(entry({ operation: 'list_alerts', scenario: 'large' }));

    const stats = cache.getStats();
    expect(stats.serverIdentity).toBe(SERVER);
    expect(stats.totalOperations).toBe(2);
    expect(stats.totalCalls).toBe(3);
    expect(stats.operations.get_forecast).toEqual({
      operation_name: 'get_forecast',
      total_cached_calls: 2,
      // metadata creation took the first clock reading
      first_cached: '2026-10-19T08:30:13.345Z',
      last_cached: '2026-10-19T08:30:14.345Z',
      scenarios: { minimal: 1, typical: 1 },
    });
  });

  it('should list cached calls newest first', () => {
    const cache = new ToolCallCache({ server: SERVER, dir, now: steppingClock() });
    cache.record(entry({ scenario: 'minimal' }));
    cache.record(entry({ scenario: 'typical' }));
    cache.record(entry({ operation: 'list_alerts', scenario: 'large' }));

    expect(cache.getCachedCalls().map((call) => call.scenario_name)).toEqual(['large', 'typical', 'minimal']);
    expect(cache.getCachedCalls('get_forecast').map((call) => call.scenario_name)).toEqual(['typical', 'minimal']);
    expect(cache.getCachedCalls('missing')).toEqual([]);
  });

  it('should skip unreadable record files', () => {
    const cache = new ToolCallCache({ server: SERVER, dir });
    cache.record(entry());
    writeFileSync(join(cache.getCachePath(), operationDirName('get_forecast'), 'broken.json'), 'not json');

    expect(cache.getCachedCalls()).toHaveLength(1);
  });

  it('should clear one operation or the whole server', () => {
    const cache = new ToolCallCache({ server: SERVER, dir, now: steppingClock() });
    cache.record(entry());
    cache.record(entry({ operation: 'list_alerts' }));

    cache.clear('list_alerts');
    expect(Object.keys(cache.getStats().operations)).toEqual(['get_forecast']);

    cache.clear();
    expect(existsSync(cache.getCachePath())).toBe(false);
    expect(cache.getStats().totalCalls).toBe(0);
  });

  it('should keep operations whose names sanitize alike apart', () => {
    const cache = new ToolCallCache({ server: SERVER, dir, now: steppingClock() });

    cache.record(entry({ operation: 'get.user' }));
    cache.record(entry({ operation: 'getuser' }));
    cache.record(entry({ operation: 'getuser', scenario: 'typical' }));

    const stats = cache.getStats();
    expect(stats.totalOperations).toBe(2);
    expect(stats.operations['get.user']?.total_cached_calls).toBe(1);
    expect(stats.operations.getuser?.total_cached_calls).toBe(2);
    expect(cache.getCachedCalls('get.user').map((call) => call.operation_name)).toEqual(['get.user']);

    cache.clear('getuser');
    expect(Object.keys(cache.getStats().operations)).toEqual(['get.user']);
  });

  it('should keep separate servers apart', () => {
    const a = new ToolCallCache({ server: 'server-a', dir });
    const b = new ToolCallCache({ server: 'server-b', dir });

    a.record(entry());

    expect(a.getStats().totalCalls).toBe(1);
    expect(b.getStats().totalCalls).toBe(0);
  });

  it('should swallow write failures', () => {
    const blocked = join(dir, 'blocked');
    writeFileSync(blocked, 'a file, not a directory');
    const cache = new ToolCallCache({ server: SERVER, dir: blocked });

    expect(() => cache.record(entry())).not.toThrow();
    expect(cache.getStats().totalCalls).toBe(0);
  });
});

describe('cache helpers', () => {
  it('should hash servers to 16 hex characters', () => {
    expect(hashServer(SERVER)).toMatch(/^[0-9a-f]{16}$/);
    expect(hashServer(SERVER)).toBe(hashServer(SERVER));
    expect(hashServer('other')).not.toBe(hashServer(SERVER));
  });

  it('should make operation names safe for directories', () => {
    expect(sanitizeOperationName('files/read all.v2')).toBe('files_read_allv2');
    expect(sanitizeOperationName('get-user_1')).toBe('get-user_1');
    expect(sanitizeOperationName('!!!')).toBe('unknown_operation');
  });

  it('should suffix operation directories with a short name hash', () => {
    expect(operationDirName('get.user')).toMatch(/^getuser_[0-9a-f]{8}$/);
    expect(operationDirName('getuser')).toMatch(/^getuser_[0-9a-f]{8}$/);
    expect(operationDirName('get.user')).not.toBe(operationDirName('getuser'));
    expect(operationDirName('getuser')).toBe(operationDirName('getuser'));
  });

  it('should expand the home directory', () => {
    expect(expandHome('~/.cache/x')).toBe(join(homedir(), '.cache/x'));
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('/tmp/x')).toBe('/tmp/x');
  });
});
