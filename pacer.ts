import { sleep as defaultSleep } from "./helpers";
import type { Sleep } from "./types";

/**
 * Single-worker queue with a mandatory post-item delay.
 *
 * Tasks run one at a time in submission order. Every task after the first
 * starts no earlier than `intervalMs` after the previous one settled, however
 * quickly that one finished.
 */
export class Pacer {
  private tail: Promise<void> = Promise.resolve();
  private started = false;

  constructor(
    private readonly intervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly signal?: AbortSignal
  ) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(async () => {
      if (this.started) await this.sleep(this.intervalMs, this.signal);
      this.started = true;
      return task();
    });

    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
