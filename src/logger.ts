/** Tiny logger wrapper for consistent tags */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type Level = (typeof LOG_LEVELS)[number];

const ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let configured: Level | null = null;

function isLevel(v: string): v is Level {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

/** Pin the threshold; null falls back to LOG_LEVEL from the environment. */
export function setLogLevel(level: Level | null): void {
  configured = level;
}

function threshold(): number {
  if (configured) return ORDER[configured];
  const env = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLevel(env) ? ORDER[env] : ORDER.info;
}

const enabled = (level: Level) => ORDER[level] >= threshold();

export const log = {
  debug: (...a: unknown[]) => {
    if (enabled("debug")) console.debug(new Date().toISOString(), "[DEBUG]", ...a);
  },
  info: (...a: unknown[]) => {
    if (enabled("info")) console.log(new Date().toISOString(), "[INFO]", ...a);
  },
  warn: (...a: unknown[]) => {
    if (enabled("warn")) console.warn(new Date().toISOString(), "[WARN]", ...a);
  },
  error: (...a: unknown[]) => {
    if (enabled("error")) console.error(new Date().toISOString(), "[ERROR]", ...a);
  },
};

/** Reduce an unknown thrown value to a loggable message. */
export function errMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
