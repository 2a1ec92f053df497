/**
 * TaskSupervisor: runs detached background tasks.
 *
 * A spawned task has no deadline, no cancellation and no return channel.
 * Its rejection is logged and swallowed here so nothing it does can
 * reach the code that spawned it.
 */

import type { Logger } from "pino";

export class TaskSupervisor {
  private readonly _inFlight = new Set<Promise<void>>();
  private readonly _logger: Logger;

  constructor(logger: Logger) {
    this._logger = logger;
  }

  /**
   * Start `task` without awaiting it.
   */
  spawn(name: string, task: () => Promise<void>): void {
    const run = this._run(name, task);
    this._inFlight.add(run);
    void run.finally(() => {
      this._inFlight.delete(run);
    });
  }

  /**
   * Number of tasks that have not settled yet.
   */
  get inFlight(): number {
    return this._inFlight.size;
  }

  /**
   * Resolve once every task spawned so far, and any task they spawn,
   * has settled. Cancels nothing.
   */
  async drain(): Promise<void> {
    while (this._inFlight.size > 0) {
      await Promise.all([...this._inFlight]);
    }
  }

  private async _run(name: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (err: unknown) {
      this._logger.error({ err, task: name }, "background task failed");
    }
  }
}
