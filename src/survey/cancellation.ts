/**
 * SIGINT handling for a survey run
 *
 * While a query is running, Ctrl-C aborts that query only: its records so far
 * are kept and the run moves on. Ctrl-C between queries, or a second Ctrl-C
 * while an aborted query winds down, asks the run to stop. The runner checks
 * `stopped` before each query, closes the output and exits with 130.
 */

import { logger } from '../utils/logger.js';
import type { QueryScope } from './executor.js';

/** Exit code of a run stopped by SIGINT (128 + 2) */
export const SIGINT_EXIT_CODE = 130;

export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

export class CancellationScope implements QueryScope {
  private current: AbortController | null = null;
  private installed = false;
  private cancelledCount = 0;
  private stopRequested = false;

  constructor(private readonly signals: SignalSource = process) {}

  private readonly handleInterrupt = (): void => {
    if (this.current && !this.current.signal.aborted) {
      this.cancelledCount++;
      this.current.abort();
      return;
    }
    if (!this.stopRequested) {
      logger.warn('Interrupted. Stopping the survey', 'survey');
    }
    this.stopRequested = true;
  };

  install(): void {
    if (this.installed) return;
    this.signals.on('SIGINT', this.handleInterrupt);
    this.installed = true;
  }

  dispose(): void {
    if (!this.installed) return;
    this.signals.removeListener('SIGINT', this.handleInterrupt);
    this.installed = false;
    this.current = null;
  }

  /** Number of queries aborted by the operator */
  get cancelled(): number {
    return this.cancelledCount;
  }

  /** Set once the operator asked the whole run to stop */
  get stopped(): boolean {
    return this.stopRequested;
  }

  /**
   * Run `fn` as the current query. Its signal fires on Ctrl-C.
   */
  async run<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    this.current = controller;
    try {
      return await fn(controller.signal);
    } finally {
      if (this.current === controller) {
        this.current = null;
      }
    }
  }
}
