import fs from "fs";
import path from "path";
import { errMessage, log } from "../logger.js";
import type { MonitorStatus } from "./Scheduler.js";

export type StatusDocument = {
  state: MonitorStatus["state"];
  watchlist: string[];
  interval_minutes: number;
  last_run: string | null;
  next_run: string | null;
  last_result: MonitorStatus["lastResult"];
  error: string | null;
  updated_at: string;
};

export function toStatusDocument(s: MonitorStatus, at = new Date()): StatusDocument {
  return {
    state: s.state,
    watchlist: s.watchlist,
    interval_minutes: s.intervalMs / 60_000,
    last_run: s.lastRunAt?.toISOString() ?? null,
    next_run: s.nextRunAt?.toISOString() ?? null,
    last_result: s.lastResult,
    error: s.lastError,
    updated_at: at.toISOString(),
  };
}

/** Status listener writing an advisory JSON file; write failures are logged only. */
export function statusFileWriter(file: string): (s: MonitorStatus) => void {
  return (s) => {
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify(toStatusDocument(s), null, 2));
    } catch (err) {
      log.warn("[MONITOR] status file not written", { file, error: errMessage(err) });
    }
  };
}
