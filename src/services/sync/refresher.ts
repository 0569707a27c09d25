/**
 * Periodic Refresher - re-runs a task on a fixed interval until stopped
 */

import { setTimeout as sleep } from "node:timers/promises";

import { syncLogger } from "../../logger.js";

export interface RefresherOptions {
  name: string;
  intervalMs: number;
  task: () => Promise<unknown>;
}

export class PeriodicRefresher {
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private iterations = 0;

  constructor(private options: RefresherOptions) {}

  get running(): boolean {
    return this.loop !== null;
  }

  /** Completed iterations, successful or not */
  get completedIterations(): number {
    return this.iterations;
  }

  /**
   * Start the loop. The first iteration runs immediately; calling again
   * while running does nothing.
   */
  start(): void {
    if (this.loop !== null) {
      return;
    }
    const controller = new AbortController();
    this.abort = controller;
    this.loop = this.run(controller.signal)
      .catch((error: unknown) => {
        syncLogger.error(
          { refresher: this.options.name, error },
          "Refresher loop crashed"
        );
      })
      .finally(() => {
        this.loop = null;
        this.abort = null;
      });
  }

  /**
   * Cancel the pending sleep and wait for the loop to exit. An iteration in
   * progress runs to completion first.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (loop === null) {
      return;
    }
    this.abort?.abort();
    await loop;
    syncLogger.info({ refresher: this.options.name }, "Refresher stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { name, intervalMs, task } = this.options;
    syncLogger.info({ refresher: name, intervalMs }, "Refresher started");

    while (!signal.aborted) {
      const startedAt = Date.now();
      try {
        await task();
        syncLogger.info(
          { refresher: name, durationMs: Date.now() - startedAt },
          "Refresh iteration completed"
        );
      } catch (error) {
        syncLogger.error({ refresher: name, error }, "Refresh iteration failed");
      }
      this.iterations++;

      if (signal.aborted) {
        break;
      }
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
    }
  }
}
