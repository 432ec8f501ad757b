/**
 * Long-running commands. A command started through `runhook cmd-...` may
 * hand back a CommandTask instead of finishing before it returns, so that
 * whoever started it decides when to wait for it or stop it.
 */

import { errorMessage } from "@charmhook/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "charmhook:command";

/**
 * A registered command. It receives the arguments that followed the
 * command selector and may return a task for work that keeps running.
 */
export type CommandFunc = (args: string[]) => CommandTask | void | Promise<CommandTask | void>;

/**
 * A running unit of work with await and cancel operations.
 */
export class CommandTask {
  private controller = new AbortController();
  private promise: Promise<void>;
  private finished = false;

  private constructor(run: (signal: AbortSignal) => Promise<void>) {
    this.promise = run(this.controller.signal).finally(() => {
      this.finished = true;
    });
    // A task may be cancelled and never waited for; wait() still rejects.
    this.promise.catch(() => undefined);
  }

  /**
   * Starts run immediately. The signal passed to it is aborted by cancel().
   */
  static start(run: (signal: AbortSignal) => Promise<void>): CommandTask {
    return new CommandTask(run);
  }

  /** Resolves when the work completes; rejects with its error. */
  wait(): Promise<void> {
    return this.promise;
  }

  /** Asks the work to stop. Has no effect once it has finished. */
  cancel(reason?: unknown): void {
    if (this.finished) return;
    this.controller.abort(reason);
  }

  get done(): boolean {
    return this.finished;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }
}

/**
 * Resolves once the signal is aborted. Long-running commands typically
 * `await untilAborted(signal)` after starting whatever they supervise.
 */
export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Waits for a task, stopping it when the process receives SIGTERM or SIGINT.
 */
export async function waitWithSignals(task: CommandTask, log: Logger = {}): Promise<void> {
  const stop = (signal: NodeJS.Signals): void => {
    log.info?.({ signal }, `${LOG_PREFIX}:waitWithSignals - Stopping command`);
    task.cancel(signal);
  };
  process.on("SIGTERM", stop);
  process.on("SIGINT", stop);
  try {
    await task.wait();
  } catch (err) {
    log.error?.({ error: errorMessage(err) }, `${LOG_PREFIX}:waitWithSignals - Command failed`);
    throw err;
  } finally {
    process.off("SIGTERM", stop);
    process.off("SIGINT", stop);
  }
}
