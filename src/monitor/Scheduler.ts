import { errMessage, log } from "../logger.js";
import type { RunOptions } from "../pipeline/orchestrator.js";
import type { Company, RunStats } from "../types.js";
import { CommandQueue, type MonitorCommand } from "./commands.js";

export type MonitorState = "idle" | "running" | "error" | "stopped";

export type MonitorStatus = {
  state: MonitorState;
  watchlist: string[];
  intervalMs: number;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  lastResult: RunStats | null;
  lastError: string | null;
};

export type RunFn = (companies: Company[], opts: RunOptions) => Promise<RunStats>;

export type SchedulerOptions = {
  watchlist: Company[];
  intervalMs: number;
  /** Longest single sleep between command checks (default 30 s). */
  sliceMs?: number;
  onStatus?: (status: MonitorStatus) => void;
  now?: () => number;
};

const DEFAULT_SLICE_MS = 30_000;

/**
 * Interval loop around one orchestrator run.
 * Commands arrive through `send`; a stop also sets the flag the running
 * orchestrator polls between companies.
 */
export class Scheduler {
  private readonly queue = new CommandQueue();
  private readonly sliceMs: number;
  private readonly now: () => number;
  private readonly onStatus?: (status: MonitorStatus) => void;

  private watchlist: Company[];
  private intervalMs: number;
  private state: MonitorState = "idle";
  private stopRequested = false;
  private lastRunAt: number | null = null;
  private nextRunAt: number | null = null;
  private lastResult: RunStats | null = null;
  private lastError: string | null = null;

  constructor(private readonly runFn: RunFn, opts: SchedulerOptions) {
    this.watchlist = opts.watchlist;
    this.intervalMs = opts.intervalMs;
    this.sliceMs = opts.sliceMs ?? DEFAULT_SLICE_MS;
    this.now = opts.now ?? Date.now;
    this.onStatus = opts.onStatus;
  }

  send(cmd: MonitorCommand): void {
    if (cmd.type === "stop") this.stopRequested = true;
    this.queue.push(cmd);
  }

  stop(): void {
    this.send({ type: "stop" });
  }

  status(): MonitorStatus {
    return {
      state: this.state,
      watchlist: this.watchlist.map((c) => c.name),
      intervalMs: this.intervalMs,
      lastRunAt: this.lastRunAt === null ? null : new Date(this.lastRunAt),
      nextRunAt: this.nextRunAt === null ? null : new Date(this.nextRunAt),
      lastResult: this.lastResult,
      lastError: this.lastError,
    };
  }

  /** Resolves once a stop has been processed. */
  async start(): Promise<void> {
    log.info("[MONITOR] started", {
      companies: this.watchlist.map((c) => c.name),
      intervalMinutes: this.intervalMs / 60_000,
    });
    this.emit();

    while (!this.stopRequested) {
      await this.runOnce();
      if (this.stopRequested) break;
      this.nextRunAt = this.now() + this.intervalMs;
      this.emit();
      await this.sleepUntilDue();
    }

    this.state = "stopped";
    this.nextRunAt = null;
    this.emit();
    log.info("[MONITOR] stopped");
  }

  private async runOnce(): Promise<void> {
    this.state = "running";
    this.lastRunAt = this.now();
    this.nextRunAt = null;
    this.emit();
    try {
      this.lastResult = await this.runFn(this.watchlist, {
        shouldStop: () => this.stopRequested,
      });
      this.lastError = null;
      this.state = "idle";
    } catch (err) {
      this.lastError = errMessage(err);
      this.state = "error";
      log.error("[MONITOR] run failed", { error: this.lastError });
    }
    this.emit();
  }

  private async sleepUntilDue(): Promise<void> {
    while (!this.stopRequested && this.nextRunAt !== null) {
      const remaining = this.nextRunAt - this.now();
      if (remaining <= 0) return;
      const cmd = await this.queue.take(Math.min(this.sliceMs, remaining));
      if (cmd && this.apply(cmd)) return;
    }
  }

  /** Returns true when the loop should run immediately. */
  private apply(cmd: MonitorCommand): boolean {
    switch (cmd.type) {
      case "stop":
        log.info("[MONITOR] stop requested");
        return false;
      case "run-now":
        log.info("[MONITOR] run requested");
        return true;
      case "reconfigure": {
        if (cmd.watchlist) this.watchlist = cmd.watchlist;
        if (cmd.intervalMs !== undefined && cmd.intervalMs > 0) {
          this.intervalMs = cmd.intervalMs;
          this.nextRunAt = (this.lastRunAt ?? this.now()) + this.intervalMs;
        }
        log.info("[MONITOR] reconfigured", {
          companies: this.watchlist.map((c) => c.name),
          intervalMinutes: this.intervalMs / 60_000,
        });
        this.emit();
        return false;
      }
    }
  }

  private emit(): void {
    this.onStatus?.(this.status());
  }
}
