/**
 * Progress bar for scenario execution.
 */

import cliProgress from 'cli-progress';
import { suppressLogs, restoreLogLevel } from '../../logging/logger.js';

export interface ProgressBarOptions {
  /** Whether to show the progress bar */
  enabled?: boolean;
  /** Stream to write to (defaults to stderr) */
  stream?: NodeJS.WriteStream;
}

/**
 * Draws one bar over every planned scenario. Does nothing unless the
 * stream is a TTY.
 */
export class AnalysisProgressBar {
  private bar: cliProgress.SingleBar | null = null;
  private readonly enabled: boolean;
  private started = false;

  constructor(options: ProgressBarOptions = {}) {
    const stream = options.stream ?? process.stderr;
    this.enabled = (options.enabled ?? true) && (stream.isTTY ?? false);

    if (this.enabled) {
      this.bar = new cliProgress.SingleBar(
        {
          format: '{bar} {percentage}% | {value}/{total} scenarios | {tool}',
          barCompleteChar: '█',
          barIncompleteChar: '░',
          hideCursor: true,
          clearOnComplete: true,
          stream,
          linewrap: false,
          synchronousUpdate: true,
        },
        cliProgress.Presets.shades_classic
      );
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  start(totalScenarios: number): void {
    if (!this.bar || this.started) return;

    // Log lines would tear the bar apart
    suppressLogs();
    this.bar.start(totalScenarios, 0, { tool: '...' });
    this.started = true;
  }

  update(completed: number, tool: string): void {
    if (!this.bar || !this.started) return;
    this.bar.update(completed, { tool });
  }

  stop(): void {
    if (!this.bar || !this.started) return;

    this.bar.stop();
    this.started = false;
    restoreLogLevel();
  }
}
