import type { Company } from "../types.js";

export type MonitorCommand =
  | { type: "run-now" }
  | { type: "stop" }
  | { type: "reconfigure"; watchlist?: Company[]; intervalMs?: number };

/** FIFO of commands with a timed take, so a sleeping loop can be woken. */
export class CommandQueue {
  private readonly items: MonitorCommand[] = [];
  private waiter: ((cmd: MonitorCommand | null) => void) | null = null;

  push(cmd: MonitorCommand): void {
    const wake = this.waiter;
    if (wake) {
      this.waiter = null;
      wake(cmd);
      return;
    }
    this.items.push(cmd);
  }

  /** Next command, or null once `timeoutMs` passes without one. */
  take(timeoutMs: number): Promise<MonitorCommand | null> {
    const queued = this.items.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.waiter = (cmd) => {
        clearTimeout(timer);
        resolve(cmd);
      };
    });
  }
}
