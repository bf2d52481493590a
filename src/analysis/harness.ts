import { classifyOperation, type ClassifierOptions } from './issue-classifier.js';
import { aggregateOperation, computeStatistics } from './metrics.js';
import { generateRecommendations } from './recommendations.js';
import { NO_SIGNALS, compileIdentifierPatterns, readSignals } from './response-signals.js';
import type { AnalysisReport, Issue, OperationMetrics, ScenarioMetric, ScenarioOutcome } from './types.js';
import { NoopCorrector, type ArgumentCorrector } from '../correction/corrector.js';
import type { ResultSink } from '../cache/tool-call-cache.js';
import { ArgumentSynthesizer, type Scenario } from '../scenarios/argument-synthesizer.js';
import type { TransportType } from '../transport/base-transport.js';
import type { InvocationResult, InvocationSuccess, Operation, ServerIdentity } from '../transport/types.js';
import { SchemaValidator } from '../validation/schema-validator.js';
import { TOKEN_EFFICIENCY, COLLECTION_KEYS } from '../constants.js';
import { TransportFault, ValidationError, getErrorMessage, toError } from '../errors/types.js';
import { getLogger, startTiming } from '../logging/logger.js';
import { parallelLimit } from '../utils/concurrency.js';

/**
 * The session surface the harness drives. ProtocolClient implements it.
 */
export interface AnalysisClient {
  connect(): Promise<ServerIdentity>;
  discover(): Promise<Operation[]>;
  invoke(name: string, args: Record<string, unknown>): Promise<InvocationResult>;
  close(): Promise<void>;
  getTarget(): string;
  getTransportType(): TransportType | null;
  getFault(): TransportFault | null;
}

export interface HarnessOptions extends ClassifierOptions {
  /** Worker pool size (default 3) */
  concurrency?: number;
  collectionKeys?: readonly string[];
  /** Regex sources */
  verboseIdentifierPatterns?: readonly string[];
  paginationParams?: readonly string[];
  filterParams?: readonly string[];
  corrector?: ArgumentCorrector;
  /** Receives every successful scenario */
  sink?: ResultSink | null;
  validator?: SchemaValidator;
  /** Called as each scenario finishes */
  onScenarioComplete?: (metric: ScenarioMetric, operation: string, done: number, total: number) => void;
  /** Called once scenarios are built, before any is run */
  onScenariosPlanned?: (total: number) => void;
}

/**
 * Outcome of one invoke attempt. Thrown errors are kept as values so one
 * scenario can never abort another.
 */
type Attempt =
  | { kind: 'result'; result: InvocationResult }
  | { kind: 'thrown'; error: Error; elapsedMs: number };

/**
 * Runs every scenario of every operation against one server and builds
 * the analysis report.
 *
 * Discovery happens once, before any scenario starts. Scenarios run on a
 * bounded pool over the shared session. A TransportFault ends the run with
 * that fault once the pool has drained; the session is closed on every path.
 */
export class AnalysisHarness {
  private readonly logger = getLogger('harness');
  private readonly client: AnalysisClient;
  private readonly options: HarnessOptions;
  private readonly synthesizer: ArgumentSynthesizer;
  private readonly validator: SchemaValidator;
  private readonly corrector: ArgumentCorrector;
  private readonly identifierPatterns: RegExp[];
  private fault: TransportFault | null = null;

  constructor(client: AnalysisClient, options: HarnessOptions = {}) {
    this.client = client;
    this.options = options;
    this.synthesizer = new ArgumentSynthesizer({
      paginationParams: options.paginationParams,
      filterParams: options.filterParams,
    });
    this.validator = options.validator ?? new SchemaValidator();
    this.corrector = options.corrector ?? new NoopCorrector();
    this.identifierPatterns = compileIdentifierPatterns(options.verboseIdentifierPatterns);
  }

  async run(): Promise<AnalysisReport> {
    const startedAt = new Date();
    const timing = startTiming(this.logger, 'analysis');

    try {
      const server = await this.client.connect();
      const operations = await this.client.discover();
      const scenarios = operations.flatMap((operation) => this.synthesizer.synthesize(operation));
      this.logger.info(
        { operations: operations.length, scenarios: scenarios.length },
        'Running scenarios'
      );
      this.options.onScenariosPlanned?.(scenarios.length);

      const metrics = await this.runScenarios(scenarios);

      const fault = this.fault ?? this.client.getFault();
      if (fault) {
        throw fault;
      }

      const report = this.buildReport(server, operations, scenarios, metrics, startedAt);
      timing().log();
      return report;
    } finally {
      await this.client.close().catch((error: unknown) => {
        this.logger.warn({ error: getErrorMessage(error) }, 'Failed to close session');
      });
    }
  }

  private async runScenarios(scenarios: Scenario[]): Promise<ScenarioMetric[]> {
    let completed = 0;
    const tasks = scenarios.map((scenario) => async (): Promise<ScenarioMetric> => {
      const metric = await this.runScenario(scenario);
      completed++;
      this.options.onScenarioComplete?.(metric, scenario.operation.name, completed, scenarios.length);
      return metric;
    });

    const { results, errors } = await parallelLimit(tasks, {
      concurrency: this.options.concurrency ?? TOKEN_EFFICIENCY.DEFAULT_CONCURRENCY,
    });

    return scenarios.map((scenario, index) => {
      const metric = results[index];
      if (metric) {
        return metric;
      }
      const error = errors.get(index) ?? new Error('Scenario produced no result');
      this.logger.error({ tool: scenario.operation.name, scenario: scenario.name, error: error.message }, 'Scenario crashed');
      return this.failedMetric(scenario, scenario.args, 'transport_failure', error, 0);
    });
  }

  private async runScenario(scenario: Scenario): Promise<ScenarioMetric> {
    const { operation, args } = scenario;
    const schemaValid = this.validator.check(operation.inputSchema, args).valid;

    const first = await this.attempt(operation.name, args);
    if (first.kind === 'thrown') {
      return { ...this.failedMetric(scenario, args, 'transport_failure', first.error, first.elapsedMs), schemaValid };
    }
    if (first.result.ok) {
      return { ...this.successMetric(scenario, args, first.result, 'success'), schemaValid };
    }

    const failure = first.result;
    if (!(failure.error instanceof ValidationError)) {
      return { ...this.failedMetric(scenario, args, 'tool_failure', failure.error, failure.elapsedMs), schemaValid };
    }

    const corrected = await this.requestCorrection(scenario, failure.error);
    if (!corrected) {
      return { ...this.failedMetric(scenario, args, 'validation_failure', failure.error, failure.elapsedMs), schemaValid };
    }

    // One retry only; whatever happens now is final for the scenario.
    const second = await this.attempt(operation.name, corrected);
    const withOriginal = { schemaValid, originalArgs: args };
    if (second.kind === 'thrown') {
      return { ...this.failedMetric(scenario, corrected, 'transport_failure', second.error, second.elapsedMs), ...withOriginal };
    }
    if (second.result.ok) {
      return { ...this.successMetric(scenario, corrected, second.result, 'corrected'), ...withOriginal };
    }
    const outcome: ScenarioOutcome =
      second.result.error instanceof ValidationError ? 'validation_failure' : 'tool_failure';
    return {
      ...this.failedMetric(scenario, corrected, outcome, second.result.error, second.result.elapsedMs),
      ...withOriginal,
    };
  }

  private async attempt(name: string, args: Record<string, unknown>): Promise<Attempt> {
    if (this.fault) {
      return { kind: 'thrown', error: this.fault, elapsedMs: 0 };
    }
    const started = Date.now();
    try {
      return { kind: 'result', result: await this.client.invoke(name, args) };
    } catch (error) {
      const err = toError(error);
      if (err instanceof TransportFault && !this.fault) {
        this.fault = err;
        this.logger.error({ tool: name, error: err.message }, 'Session failed during analysis');
      }
      return { kind: 'thrown', error: err, elapsedMs: Date.now() - started };
    }
  }

  private async requestCorrection(
    scenario: Scenario,
    error: ValidationError
  ): Promise<Record<string, unknown> | null> {
    try {
      return await this.corrector.correct({ operation: scenario.operation, args: scenario.args, error });
    } catch (correctionError) {
      this.logger.warn(
        { tool: scenario.operation.name, scenario: scenario.name, error: getErrorMessage(correctionError) },
        'Corrector failed'
      );
      return null;
    }
  }

  private successMetric(
    scenario: Scenario,
    args: Record<string, unknown>,
    result: InvocationSuccess,
    outcome: 'success' | 'corrected'
  ): ScenarioMetric {
    const signals = readSignals(
      result.response,
      { collectionKeys: this.options.collectionKeys ?? COLLECTION_KEYS },
      this.identifierPatterns
    );
    this.store(scenario, args, result, outcome === 'corrected');

    return {
      scenario: scenario.name,
      args,
      outcome,
      tokenEstimate: result.tokenEstimate,
      elapsedMs: result.elapsedMs,
      sizeBytes: result.sizeBytes,
      schemaValid: null,
      ...signals,
    };
  }

  private failedMetric(
    scenario: Scenario,
    args: Record<string, unknown>,
    outcome: ScenarioOutcome,
    error: Error,
    elapsedMs: number
  ): ScenarioMetric {
    this.logger.debug(
      { tool: scenario.operation.name, scenario: scenario.name, outcome, error: error.message },
      'Scenario failed'
    );
    return {
      scenario: scenario.name,
      args,
      outcome,
      tokenEstimate: 0,
      elapsedMs,
      sizeBytes: 0,
      schemaValid: null,
      error: error.message,
      errorCode: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
      ...NO_SIGNALS,
    };
  }

  private store(
    scenario: Scenario,
    args: Record<string, unknown>,
    result: InvocationSuccess,
    corrected: boolean
  ): void {
    const sink = this.options.sink;
    if (!sink) {
      return;
    }
    try {
      sink.record({
        operation: scenario.operation.name,
        scenario: scenario.name,
        input: args,
        output: result.response,
        metrics: {
          tokenEstimate: result.tokenEstimate,
          elapsedMs: result.elapsedMs,
          sizeBytes: result.sizeBytes,
          corrected,
        },
      });
    } catch (error) {
      this.logger.warn({ tool: scenario.operation.name, error: getErrorMessage(error) }, 'Result sink failed');
    }
  }

  private buildReport(
    server: ServerIdentity,
    operations: Operation[],
    scenarios: Scenario[],
    metrics: ScenarioMetric[],
    startedAt: Date
  ): AnalysisReport {
    const threshold = this.options.oversizedTokenThreshold ?? TOKEN_EFFICIENCY.OVERSIZED_THRESHOLD;
    const byOperation = new Map<string, ScenarioMetric[]>();
    scenarios.forEach((scenario, index) => {
      const list = byOperation.get(scenario.operation.name) ?? [];
      list.push(metrics[index]);
      byOperation.set(scenario.operation.name, list);
    });

    const aggregates: OperationMetrics[] = [];
    const issues: Issue[] = [];
    for (const operation of operations) {
      const scenarioMetrics = byOperation.get(operation.name) ?? [];
      const classified = classifyOperation(
        {
          operation,
          paginationParams: this.synthesizer.paginationParamsOf(operation),
          filterParams: this.synthesizer.filterParamsOf(operation),
        },
        scenarioMetrics,
        { oversizedTokenThreshold: threshold, formatControlParams: this.options.formatControlParams }
      );
      aggregates.push(aggregateOperation(operation.name, scenarioMetrics, classified.flags));
      issues.push(...classified.issues);
    }

    const statistics = computeStatistics(aggregates, issues, threshold);
    return {
      target: this.client.getTarget(),
      server,
      transport: this.client.getTransportType(),
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      operations: aggregates,
      issues,
      statistics,
      recommendations: generateRecommendations(issues, statistics, threshold),
    };
  }
}
