import { JsonRpcAdapter, type TransportAdapter } from './adapter.js';
import type { BaseTransport, TransportType } from './base-transport.js';
import { detectUrlTransport } from './endpoint-probe.js';
import { createTransport } from './factory.js';
import type { InvocationResult, Operation, ServerIdentity } from './types.js';
import { isUrlTarget } from '../launch/command-parser.js';
import {
  ProcessLauncher,
  type LaunchState,
  type SpawnFunction,
} from '../launch/process-launcher.js';
import type { TransportChoice } from '../config/validator.js';
import { TIMEOUTS } from '../constants.js';
import {
  ConnectionError,
  ToolExecutionError,
  TransportFault,
  getErrorMessage,
  toError,
} from '../errors/types.js';
import type { RetryOptions } from '../errors/retry.js';
import { getLogger } from '../logging/logger.js';

export interface ProtocolClientOptions {
  /** Server URL, or a launch command optionally prefixed with `export K=V &&` */
  target: string;
  transport?: TransportChoice;
  /** Environment overrides for a launched server */
  env?: Record<string, string>;
  /** Working directory for a launched server */
  cwd?: string;
  /** Extra HTTP headers for URL transports */
  headers?: Record<string, string>;
  requestTimeout?: number;
  startupTimeout?: number;
  shutdownGrace?: number;
  logEnvironment?: boolean;
  sensitiveNames?: readonly string[];
  debug?: boolean;
  connectRetry?: RetryOptions;
  /** Process spawner for launched servers */
  spawn?: SpawnFunction;
  /** Readiness check for launched URL servers */
  probeUrl?: (url: string) => Promise<boolean>;
  /** Transport detection for URL targets in `auto` mode */
  detectTransport?: (url: string) => Promise<'http' | 'sse'>;
}

/**
 * One session against one server, whichever transport carries it.
 *
 * The client picks and builds the transport once, from the target, and
 * launches the server first when the target is a command. The catalog is
 * fetched once per session. A mid-session fault terminates the launched
 * process straight away, without waiting for close().
 */
export class ProtocolClient {
  private readonly logger = getLogger('protocol-client');
  private readonly options: ProtocolClientOptions;
  private adapter: TransportAdapter | null = null;
  private launcher: ProcessLauncher | null = null;
  private transportType: TransportType | null = null;
  private identity: ServerIdentity | null = null;
  private catalog: Promise<Operation[]> | null = null;
  private operations = new Map<string, Operation>();
  private fault: TransportFault | null = null;
  private faultTeardown: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: ProtocolClientOptions) {
    this.options = options;
  }

  /**
   * Target descriptor; used as the server identity for caching.
   */
  getTarget(): string {
    return this.options.target;
  }

  getTransportType(): TransportType | null {
    return this.transportType;
  }

  getIdentity(): ServerIdentity | null {
    return this.identity;
  }

  getLaunchState(): LaunchState | null {
    return this.launcher?.getState() ?? null;
  }

  /**
   * The fault that ended the session, if one did.
   */
  getFault(): TransportFault | null {
    return this.fault;
  }

  /**
   * Launch (when needed), connect and complete the handshake.
   * Everything acquired is released again if any step fails.
   */
  async connect(): Promise<ServerIdentity> {
    if (this.identity) {
      return this.identity;
    }
    if (this.closing) {
      throw new ConnectionError('Client is closed', { component: 'protocol-client' });
    }

    try {
      const transport = await this.buildTransport();
      const adapter = new JsonRpcAdapter(transport, {
        timeout: this.options.requestTimeout ?? TIMEOUTS.DEFAULT,
        connectRetry: this.options.connectRetry,
        onFault: (fault) => this.handleFault(fault),
      });
      this.adapter = adapter;
      this.identity = await adapter.connect();
      this.logger.info(
        { server: this.identity, transport: this.transportType },
        'Connected to server'
      );
      return this.identity;
    } catch (error) {
      await this.close().catch((closeError: unknown) => {
        this.logger.warn({ error: getErrorMessage(closeError) }, 'Cleanup after failed connect also failed');
      });
      throw error;
    }
  }

  /**
   * The operation catalog, fetched on first use and reused afterwards.
   */
  async discover(): Promise<Operation[]> {
    const adapter = this.requireAdapter();
    if (!this.catalog) {
      this.catalog = adapter.discover().then((operations) => {
        this.operations = new Map(operations.map((operation) => [operation.name, operation]));
        return operations;
      });
      this.catalog.catch(() => {
        this.catalog = null;
      });
    }
    return this.catalog;
  }

  /**
   * Call an operation by name. An unknown name is a tool-level failure.
   */
  async invoke(name: string, args: Record<string, unknown>): Promise<InvocationResult> {
    const adapter = this.requireAdapter();
    await this.discover();

    const operation = this.operations.get(name);
    if (!operation) {
      return {
        ok: false,
        operation: name,
        error: new ToolExecutionError(`Unknown operation: ${name}`, { context: { tool: name } }),
        elapsedMs: 0,
      };
    }
    return adapter.invoke(operation, args);
  }

  /**
   * Release the adapter, then stop the launched process. Both steps run
   * even when the first fails; the first error is rethrown afterwards.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.release();
    }
    return this.closing;
  }

  private async release(): Promise<void> {
    const errors: Error[] = [];

    if (this.adapter) {
      try {
        await this.adapter.close();
      } catch (error) {
        errors.push(toError(error));
      }
    }

    if (this.launcher) {
      try {
        await this.launcher.terminate();
      } catch (error) {
        errors.push(toError(error));
      }
    }

    for (const error of errors) {
      this.logger.warn({ error: error.message }, 'Error while closing session');
    }
    const [first] = errors;
    if (first) {
      throw first;
    }
  }

  /**
   * Resolves once teardown triggered by a fault has finished.
   */
  async faultSettled(): Promise<void> {
    await this.faultTeardown;
  }

  private handleFault(fault: TransportFault): void {
    this.fault = fault;
    this.logger.error({ error: fault.message }, 'Session failed, stopping server');
    if (this.launcher) {
      this.faultTeardown = this.launcher.terminate().catch((error: unknown) => {
        this.logger.warn({ error: getErrorMessage(error) }, 'Failed to stop server after fault');
      });
    }
  }

  private requireAdapter(): TransportAdapter {
    if (this.fault) {
      throw this.fault;
    }
    if (!this.adapter || !this.identity) {
      throw new ConnectionError('Client is not connected', { component: 'protocol-client' });
    }
    return this.adapter;
  }

  private async buildTransport(): Promise<BaseTransport> {
    const { target, headers, debug } = this.options;
    const choice = this.options.transport ?? 'auto';
    const factoryOptions = { timeout: this.options.requestTimeout, headers, debug };

    if (isUrlTarget(target)) {
      if (choice === 'stdio') {
        throw new ConnectionError('The stdio transport needs a launch command, not a URL', {
          component: 'protocol-client',
        });
      }
      const type = choice === 'auto' ? await this.detect(target) : choice;
      this.transportType = type;
      return createTransport({ type, url: target }, factoryOptions);
    }

    const launcher = new ProcessLauncher({
      command: target,
      mode: choice === 'http' || choice === 'sse' ? 'url' : 'stdio',
      env: this.options.env,
      cwd: this.options.cwd,
      startupTimeout: this.options.startupTimeout,
      shutdownGrace: this.options.shutdownGrace,
      logEnvironment: this.options.logEnvironment,
      sensitiveNames: this.options.sensitiveNames,
      spawn: this.options.spawn,
      probeUrl: this.options.probeUrl,
    });
    this.launcher = launcher;
    const launched = await launcher.launch();

    if (choice === 'http' || choice === 'sse') {
      if (!launched.url) {
        throw new ConnectionError('Launched server reported no endpoint', { component: 'protocol-client' });
      }
      this.transportType = choice;
      return createTransport({ type: choice, url: launched.url }, factoryOptions);
    }

    this.transportType = 'stdio';
    return createTransport({ type: 'stdio', input: launched.stdout, output: launched.stdin }, factoryOptions);
  }

  private detect(url: string): Promise<'http' | 'sse'> {
    const detect = this.options.detectTransport ?? ((target: string) => detectUrlTransport(target, { headers: this.options.headers }));
    return detect(url);
  }
}
