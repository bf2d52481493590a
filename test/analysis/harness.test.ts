import { describe, it, expect, vi, type Mock } from 'vitest';
import { AnalysisHarness } from '../../src/analysis/harness.js';
import type { ArgumentCorrector } from '../../src/correction/corrector.js';
import type { ResultSink } from '../../src/cache/tool-call-cache.js';
import {
  ConnectionError,
  RequestTimeoutError,
  ToolExecutionError,
  TransportFault,
  ValidationError,
} from '../../src/errors/index.js';
import { FakeAnalysisClient, failed, ok, textResponse, tool } from '../fixtures/fake-client.js';

function corrector(fix: ArgumentCorrector['correct']): { correct: Mock<ArgumentCorrector['correct']> } {
  return { correct: vi.fn<ArgumentCorrector['correct']>(fix) };
}

describe('AnalysisHarness', () => {
  it('should analyze every scenario of every tool', async () => {
    const listItems = tool('list_items', { limit: { type: 'integer' }, query: { type: 'string' } });
    const getUser = tool('get_user', { id: { type: 'string' } }, ['id']);
    const client = new FakeAnalysisClient([listItems, getUser], (name) =>
      name === 'list_items' ? ok(name, textResponse({ items: [{ name: 'a' }] })) : ok(name, textResponse('Ada'))
    );

    const report = await new AnalysisHarness(client).run();

    expect(report.target).toBe('node fake-server.js');
    expect(report.server).toEqual({ name: 'fake', version: '1.2.3', protocolVersion: '2025-11-25' });
    expect(report.transport).toBe('stdio');
    expect(report.operations.map((op) => op.operation)).toEqual(['list_items', 'get_user']);
    expect(report.operations[0]?.scenarios.map((metric) => metric.args)).toEqual([
      {},
      { limit: 10, query: 'sample query' },
      { limit: 1000 },
    ]);
    expect(report.operations[1]?.scenarios.map((metric) => metric.args)).toEqual([
      { id: 'sample_id' },
      { id: 'sample_id' },
      { id: 'sample_id' },
    ]);
    expect(report.statistics).toMatchObject({ operationsAnalyzed: 2, scenariosRun: 6, successes: 6, failures: 0 });
    expect(report.issues.map((found) => [found.operation, found.type])).toEqual([
      ['get_user', 'no_response_format_control'],
    ]);
    expect(report.recommendations).toEqual(['Add response format control (concise/detailed) to 1 tools']);
    expect(report.operations[0]?.scenarios[0]).toMatchObject({ outcome: 'success', collectionShaped: true, schemaValid: true });
    expect(client.calls).toHaveLength(6);
    expect(client.discoverCount).toBe(1);
    expect(client.closeCount).toBe(1);
  });

  it('should cap concurrent calls at the pool size', async () => {
    const tools = Array.from({ length: 10 }, (_, index) => tool(`tool_${index}`));
    const client = new FakeAnalysisClient(tools, undefined, { delayMs: 5 });

    const report = await new AnalysisHarness(client).run();

    expect(client.calls).toHaveLength(30);
    expect(client.maxInFlight).toBe(3);
    expect(report.statistics.scenariosRun).toBe(30);
  });

  it('should honor a configured pool size', async () => {
    const tools = Array.from({ length: 4 }, (_, index) => tool(`tool_${index}`));
    const client = new FakeAnalysisClient(tools, undefined, { delayMs: 2 });

    await new AnalysisHarness(client, { concurrency: 1 }).run();

    expect(client.maxInFlight).toBe(1);
  });

  describe('argument correction', () => {
    const strict = tool('strict', { mode: { type: 'string' } });
    const rejectUnlessFast = (name: string, args: Record<string, unknown>) =>
      args.mode === 'fast' ? ok(name, textResponse('done')) : failed(name, new ValidationError('mode must be one of: fast'));

    it('should retry once with corrected arguments', async () => {
      const client = new FakeAnalysisClient([strict], rejectUnlessFast);
      const fixer = corrector(async () => ({ mode: 'fast' }));

      const report = await new AnalysisHarness(client, { corrector: fixer }).run();

      const [metric] = report.operations[0]?.scenarios ?? [];
      expect(metric).toMatchObject({ outcome: 'corrected', args: { mode: 'fast' }, originalArgs: {} });
      expect(report.statistics.corrected).toBe(3);
      expect(fixer.correct).toHaveBeenCalledTimes(3);
      expect(client.calls).toHaveLength(6);
    });

    it('should not retry more than once', async () => {
      const client = new FakeAnalysisClient([strict], rejectUnlessFast);
      const fixer = corrector(async () => ({ mode: 'slow' }));

      const report = await new AnalysisHarness(client, { corrector: fixer }).run();

      expect(report.operations[0]?.scenarios.map((metric) => metric.outcome)).toEqual([
        'validation_failure',
        'validation_failure',
        'validation_failure',
      ]);
      expect(report.operations[0]?.scenarios[0]).toMatchObject({ args: { mode: 'slow' }, originalArgs: {} });
      expect(fixer.correct).toHaveBeenCalledTimes(3);
      expect(client.calls).toHaveLength(6);
    });

    it('should keep the validation failure when no correction is offered', async () => {
      const client = new FakeAnalysisClient([strict], rejectUnlessFast);

      const report = await new AnalysisHarness(client).run();

      const [metric] = report.operations[0]?.scenarios ?? [];
      expect(metric).toMatchObject({
        outcome: 'validation_failure',
        args: {},
        error: 'mode must be one of: fast',
        errorCode: 'TOOL_VALIDATION_FAILED',
        tokenEstimate: 0,
      });
      expect(metric?.originalArgs).toBeUndefined();
      expect(client.calls).toHaveLength(3);
    });

    it('should survive a corrector that throws', async () => {
      const client = new FakeAnalysisClient([strict], rejectUnlessFast);
      const fixer = corrector(async () => {
        throw new Error('provider down');
      });

      const report = await new AnalysisHarness(client, { corrector: fixer }).run();

      expect(report.statistics.failures).toBe(3);
      expect(client.calls).toHaveLength(3);
    });

    it('should not correct tool failures', async () => {
      const client = new FakeAnalysisClient([tool('flaky')], (name) => failed(name, new ToolExecutionError('disk full')));
      const fixer = corrector(async () => ({}));

      const report = await new AnalysisHarness(client, { corrector: fixer }).run();

      expect(report.operations[0]?.scenarios[0]).toMatchObject({
        outcome: 'tool_failure',
        error: 'disk full',
        errorCode: 'TOOL_EXECUTION_FAILED',
      });
      expect(fixer.correct).not.toHaveBeenCalled();
    });
  });

  it('should record request failures and keep going', async () => {
    const client = new FakeAnalysisClient([tool('slow'), tool('fine')], (name) => {
      if (name === 'slow') {
        throw new RequestTimeoutError('Request tools/call timed out after 10ms', 10);
      }
      return ok(name, textResponse('ok'));
    });

    const report = await new AnalysisHarness(client).run();

    expect(report.operations[0]?.scenarios.every((metric) => metric.outcome === 'transport_failure')).toBe(true);
    expect(report.operations[1]?.failureCount).toBe(0);
    expect(report.statistics.failures).toBe(3);
  });

  it('should end the run on a transport fault and still close', async () => {
    const fault = new TransportFault('Server closed the connection');
    const tools = Array.from({ length: 5 }, (_, index) => tool(`tool_${index}`));
    const client = new FakeAnalysisClient(tools, (name) => {
      if (name === 'tool_1') throw fault;
      return ok(name, textResponse('ok'));
    });

    await expect(new AnalysisHarness(client).run()).rejects.toBe(fault);
    expect(client.closeCount).toBe(1);
    expect(client.calls.length).toBeLessThan(15);
  });

  it('should close the session when connecting fails', async () => {
    const client = new FakeAnalysisClient([], undefined, { connectError: new ConnectionError('refused') });

    await expect(new AnalysisHarness(client).run()).rejects.toThrow('refused');
    expect(client.closeCount).toBe(1);
  });

  it('should note arguments that fail the input schema but still call the tool', async () => {
    const client = new FakeAnalysisClient([tool('named', { name: { type: 'string', minLength: 50 } }, ['name'])]);

    const report = await new AnalysisHarness(client).run();

    expect(report.operations[0]?.scenarios[0]).toMatchObject({ schemaValid: false, outcome: 'success' });
    expect(client.calls).toHaveLength(3);
  });

  it('should hand successful results to the sink', async () => {
    const record = vi.fn<ResultSink['record']>();
    const client = new FakeAnalysisClient([tool('echo')]);

    await new AnalysisHarness(client, { sink: { record } }).run();

    expect(record).toHaveBeenCalledTimes(3);
    expect(record).toHaveBeenCalledWith({
      operation: 'echo',
      scenario: 'minimal',
      input: {},
      output: textResponse('ok'),
      metrics: { tokenEstimate: 10, elapsedMs: 3, sizeBytes: 41, corrected: false },
    });
  });

  it('should ignore a failing sink', async () => {
    const client = new FakeAnalysisClient([tool('echo')]);
    const sink: ResultSink = {
      record: () => {
        throw new Error('disk full');
      },
    };

    const report = await new AnalysisHarness(client, { sink }).run();

    expect(report.statistics.successes).toBe(3);
  });

  it('should report progress', async () => {
    const planned = vi.fn();
    const completed = vi.fn();
    const client = new FakeAnalysisClient([tool('a'), tool('b')]);

    await new AnalysisHarness(client, { onScenariosPlanned: planned, onScenarioComplete: completed }).run();

    expect(planned).toHaveBeenCalledWith(6);
    expect(completed).toHaveBeenCalledTimes(6);
    expect(completed.mock.calls.map((call) => call[2])).toEqual([1, 2, 3, 4, 5, 6]);
    expect(completed.mock.calls.every((call) => call[3] === 6)).toBe(true);
  });
});
