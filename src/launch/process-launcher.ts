import { spawn, type SpawnOptions } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { parseLaunchCommand, type ParsedCommand } from './command-parser.js';
import { filterSpawnEnv, redactEnv, summarizeEnv } from '../transport/env-filter.js';
import {
  FALLBACK_PORTS,
  LIMITS,
  SENSITIVE_NAME_PATTERNS,
  SERVER_URL_PATTERNS,
  TIMEOUTS,
} from '../constants.js';
import { LaunchError, StartupTimeoutError, getErrorMessage, toError } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

/**
 * Lifecycle of a launched server. Calls are only issued while `ready`;
 * `terminated` is reachable from every state.
 */
export type LaunchState = 'not_started' | 'starting' | 'ready' | 'terminated';

/**
 * `stdio`: the server talks JSON-RPC over its own stdin/stdout.
 * `url`: the server opens a local HTTP endpoint and prints where.
 */
export type ReadinessMode = 'stdio' | 'url';

/**
 * The parts of a child process the launcher relies on.
 * Node's ChildProcess satisfies it; tests pass a fake.
 */
export interface ChildHandle extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export interface ProcessLauncherOptions {
  /** Launch command, optionally prefixed with `export K=V &&` assignments */
  command: string;
  mode: ReadinessMode;
  /** Explicit environment overrides; they beat inline exports and the inherited environment */
  env?: Record<string, string>;
  cwd?: string;
  /** Readiness timeout in milliseconds (default: 30000) */
  startupTimeout?: number;
  /** Wait between SIGTERM and SIGKILL in milliseconds (default: 5000) */
  shutdownGrace?: number;
  /** Log a redacted summary of the child environment (default: true) */
  logEnvironment?: boolean;
  /** Name substrings whose values never reach the log */
  sensitiveNames?: readonly string[];
  /** Ports tried when the server never prints its address */
  fallbackPorts?: readonly number[];
  /** Interval between readiness checks in milliseconds (default: 100) */
  pollInterval?: number;
  /** Inherited environment (default: process.env) */
  baseEnv?: NodeJS.ProcessEnv;
  spawn?: SpawnFunction;
  /** Whether an endpoint answers; the default issues a short GET */
  probeUrl?: (url: string) => Promise<boolean>;
}

/**
 * A running server, once it is ready.
 */
export interface LaunchedServer {
  pid?: number;
  /** Local endpoint, in `url` mode */
  url?: string;
  /** Server stdin and stdout, in `stdio` mode */
  stdin: Writable | null;
  stdout: Readable | null;
}

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options);

/**
 * Whether something answers HTTP at the URL. Any status counts.
 */
export async function probeHttpEndpoint(url: string): Promise<boolean> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUTS.READY_PROBE);
  try {
    await fetch(url, { method: 'GET', signal: controller.signal });
    return true;
  } catch {
    return false;
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

/**
 * Pull a local server address out of a log line. Bare ports become
 * `http://localhost:<port>`; only localhost addresses are accepted.
 */
export function extractServerUrl(line: string): string | null {
  for (const pattern of SERVER_URL_PATTERNS) {
    const match = pattern.exec(line);
    const found = match?.[1];
    if (!found) continue;

    const value = found.replace(/[.,;]+$/, '');
    const url = /^\d+$/.test(value) ? `http://localhost:${value}` : value;
    if (/^https?:\/\//.test(url) && (url.includes('localhost') || url.includes('127.0.0.1'))) {
      return url;
    }
  }
  return null;
}

/**
 * Troubleshooting hints for a server that never became ready.
 */
export function buildStartupSuggestions(
  parsed: Pick<ParsedCommand, 'command' | 'args'>,
  output: string,
  running: boolean
): string[] {
  const suggestions: string[] = [];

  if (output.trim() === '') {
    suggestions.push(
      'The process produced no output; it may still be downloading (try a longer --startup-timeout)',
      'Check that the package name is correct'
    );
  }
  if (running) {
    suggestions.push(
      'The process is running but not answering; check whether it needs extra configuration or is waiting for input'
    );
  } else {
    suggestions.push('The process exited; check required environment variables and dependencies');
  }
  suggestions.push(`To debug manually, run: ${[parsed.command, ...parsed.args].join(' ')}`);
  return suggestions;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Starts a server process, waits until it can be talked to, and tears it
 * down again.
 *
 * The child's environment is the inherited one with credentials filtered
 * out, then inline exports, then explicit overrides.
 */
export class ProcessLauncher {
  private readonly logger = getLogger('launcher');
  private readonly options: ProcessLauncherOptions;
  private state: LaunchState = 'not_started';
  private child: ChildHandle | null = null;
  private exited = false;
  private exitCode: number | null = null;
  private spawnError: Error | null = null;
  private stderrTail = '';
  private detectedUrl: string | null = null;
  private readonly partial: Record<'stdout' | 'stderr', string> = { stdout: '', stderr: '' };
  private terminating: Promise<void> | null = null;

  constructor(options: ProcessLauncherOptions) {
    this.options = options;
  }

  getState(): LaunchState {
    return this.state;
  }

  /**
   * Last characters the child wrote to stderr.
   */
  getStderrTail(): string {
    return this.stderrTail;
  }

  /**
   * Build the environment the child will see.
   */
  buildEnvironment(parsed: ParsedCommand): Record<string, string> {
    return filterSpawnEnv(this.options.baseEnv ?? process.env, {
      ...parsed.inlineEnv,
      ...this.options.env,
    });
  }

  /**
   * Start the process and wait until it is ready. On any failure the
   * child is terminated before the error is thrown.
   */
  async launch(): Promise<LaunchedServer> {
    if (this.state !== 'not_started') {
      throw new LaunchError(`Cannot launch from state ${this.state}`);
    }

    const parsed = parseLaunchCommand(this.options.command);
    const env = this.buildEnvironment(parsed);
    this.state = 'starting';

    this.logger.info({ command: parsed.command, args: parsed.args, cwd: this.options.cwd }, 'Starting server process');
    if (this.options.logEnvironment ?? true) {
      const sensitiveNames = this.options.sensitiveNames ?? SENSITIVE_NAME_PATTERNS;
      this.logger.info({ env: summarizeEnv(env, sensitiveNames) }, 'Server environment');
      this.logger.debug({ env: redactEnv(env, sensitiveNames) }, 'Server environment values');
    } else {
      this.logger.debug('Environment logging disabled');
    }

    try {
      const child = (this.options.spawn ?? defaultSpawn)(parsed.command, parsed.args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        env,
        cwd: this.options.cwd,
      });
      this.child = child;
      this.watch(child);

      const url =
        this.options.mode === 'stdio'
          ? await this.waitForSpawn(child, parsed)
          : await this.waitForEndpoint(child, parsed);

      if (this.state !== 'starting') {
        throw new LaunchError('Launch was cancelled');
      }
      this.state = 'ready';
      this.logger.info({ pid: child.pid, url }, 'Server process ready');
      return { pid: child.pid, url, stdin: child.stdin, stdout: child.stdout };
    } catch (error) {
      await this.terminate();
      if (error instanceof LaunchError || error instanceof StartupTimeoutError) {
        throw error;
      }
      throw new LaunchError(
        `Failed to start ${parsed.command}: ${getErrorMessage(error)}`,
        { cause: toError(error), suggestions: buildStartupSuggestions(parsed, this.stderrTail, false) }
      );
    }
  }

  /**
   * Stop the process: SIGTERM, wait the grace period, then SIGKILL.
   * Idempotent and safe from any state.
   */
  terminate(): Promise<void> {
    if (this.terminating) {
      return this.terminating;
    }
    this.terminating = this.stop();
    return this.terminating;
  }

  private async stop(): Promise<void> {
    this.state = 'terminated';
    const child = this.child;
    if (!child || this.hasExited(child)) {
      return;
    }

    this.logger.debug({ pid: child.pid }, 'Stopping server process');
    this.signal(child, 'SIGTERM');
    if (await this.waitForExit(child, this.options.shutdownGrace ?? TIMEOUTS.SHUTDOWN_KILL)) {
      return;
    }

    this.logger.warn({ pid: child.pid }, 'Graceful shutdown timed out, forcing kill');
    this.signal(child, 'SIGKILL');
    if (!(await this.waitForExit(child, TIMEOUTS.KILL_CONFIRM))) {
      this.logger.warn({ pid: child.pid }, 'Server process did not confirm exit');
    }
  }

  private signal(child: ChildHandle, signal: NodeJS.Signals): void {
    try {
      child.kill(signal);
    } catch (error) {
      this.logger.warn({ signal, error: getErrorMessage(error) }, 'Failed to signal server process');
    }
  }

  private hasExited(child: ChildHandle): boolean {
    return this.exited || child.exitCode !== null || child.signalCode !== null;
  }

  private waitForExit(child: ChildHandle, timeoutMs: number): Promise<boolean> {
    if (this.hasExited(child)) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      child.once('exit', onExit);
    });
  }

  private watch(child: ChildHandle): void {
    child.on('error', (error: Error) => {
      this.spawnError = error;
      this.logger.error({ error: error.message }, 'Server process error');
    });
    child.on('exit', (code: number | null) => {
      this.exited = true;
      this.exitCode = code;
      if (this.state === 'ready') {
        this.logger.warn({ exitCode: code }, 'Server process exited');
      }
    });
    child.stderr?.on('data', (chunk: Buffer | string) => {
      const text = chunk.toString();
      this.stderrTail = (this.stderrTail + text).slice(-LIMITS.STDERR_TAIL);
      this.logger.debug({ stderr: text.trim() }, 'Server stderr');
      this.scanOutput(text, 'stderr');
    });
  }

  /**
   * Look for a server address in complete output lines, in `url` mode only.
   */
  private scanOutput(text: string, stream: 'stdout' | 'stderr'): void {
    if (this.options.mode !== 'url' || this.detectedUrl) {
      return;
    }
    const lines = (this.partial[stream] + text).split('\n');
    this.partial[stream] = lines.pop() ?? '';
    for (const line of lines) {
      const url = extractServerUrl(line);
      if (url) {
        this.logger.info({ url, stream }, 'Found server URL');
        this.detectedUrl = url;
        return;
      }
    }
  }

  private exitFailure(parsed: ParsedCommand): LaunchError {
    const tail = this.stderrTail.trim();
    return new LaunchError(
      `Server process exited before it was ready (exit code: ${this.exitCode ?? 'unknown'})` +
        (tail ? `\n${tail}` : ''),
      {
        exitCode: this.exitCode,
        suggestions: buildStartupSuggestions(parsed, this.stderrTail, false),
        context: { component: 'launcher', metadata: { stderr: tail } },
      }
    );
  }

  private spawnFailure(parsed: ParsedCommand, error: Error): LaunchError {
    return new LaunchError(`Failed to start ${parsed.command}: ${error.message}`, {
      cause: error,
      suggestions: [`Check that ${parsed.command} is installed and on PATH`],
      context: { component: 'launcher' },
    });
  }

  /**
   * Stdio readiness: the process has been spawned and is still alive.
   */
  private waitForSpawn(child: ChildHandle, parsed: ParsedCommand): Promise<undefined> {
    const timeoutMs = this.options.startupTimeout ?? TIMEOUTS.STARTUP;

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        child.off('spawn', onSpawn);
        child.off('error', onError);
        child.off('exit', onExit);
      };
      const onSpawn = (): void => {
        cleanup();
        resolve(undefined);
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(this.spawnFailure(parsed, error));
      };
      const onExit = (): void => {
        cleanup();
        reject(this.exitFailure(parsed));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(
          new StartupTimeoutError(timeoutMs, buildStartupSuggestions(parsed, this.stderrTail, !this.hasExited(child)), {
            component: 'launcher',
          })
        );
      }, timeoutMs);

      if (this.spawnError) {
        onError(this.spawnError);
        return;
      }
      if (this.hasExited(child)) {
        onExit();
        return;
      }
      child.on('spawn', onSpawn);
      child.on('error', onError);
      child.on('exit', onExit);
    });
  }

  /**
   * URL readiness: an address printed by the server, or else a fallback
   * local port, answers HTTP.
   */
  private async waitForEndpoint(child: ChildHandle, parsed: ParsedCommand): Promise<string> {
    const timeoutMs = this.options.startupTimeout ?? TIMEOUTS.STARTUP;
    const pollInterval = this.options.pollInterval ?? TIMEOUTS.SERVER_READY_POLL;
    const probeUrl = this.options.probeUrl ?? probeHttpEndpoint;
    const deadline = Date.now() + timeoutMs;

    child.stdout?.on('data', (chunk: Buffer | string) => {
      const text = chunk.toString();
      this.logger.debug({ stdout: text.trim() }, 'Server stdout');
      this.scanOutput(text, 'stdout');
    });

    this.logger.info({ timeoutMs }, 'Waiting for server endpoint');
    while (Date.now() < deadline) {
      if (this.spawnError) {
        throw this.spawnFailure(parsed, this.spawnError);
      }
      if (this.hasExited(child)) {
        throw this.exitFailure(parsed);
      }
      if (this.state !== 'starting') {
        throw new LaunchError('Launch was cancelled');
      }
      if (this.detectedUrl && (await probeUrl(this.detectedUrl))) {
        return this.detectedUrl;
      }
      await sleep(pollInterval);
    }

    if (this.hasExited(child)) {
      throw this.exitFailure(parsed);
    }

    this.logger.warn({ timeoutMs }, 'No server address detected, trying fallback ports');
    for (const port of this.options.fallbackPorts ?? FALLBACK_PORTS) {
      const url = `http://localhost:${port}`;
      if (await probeUrl(url)) {
        this.logger.info({ url }, 'Fallback detection found server');
        return url;
      }
    }

    throw new StartupTimeoutError(
      timeoutMs,
      buildStartupSuggestions(parsed, this.stderrTail, !this.hasExited(child)),
      { component: 'launcher', metadata: { detectedUrl: this.detectedUrl } }
    );
  }
}
