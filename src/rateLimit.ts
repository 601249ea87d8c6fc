import { log } from "./logger.js";

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Enforces a minimum spacing between calls to one upstream endpoint.
 * Callers queue on a shared promise chain, so spacing holds even when
 * several callers acquire at once.
 */
export class RateGate {
  private lastAt = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    readonly minIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  acquire(): Promise<void> {
    const turn = this.tail.then(async () => {
      const wait = this.lastAt + this.minIntervalMs - this.now();
      if (this.lastAt > 0 && wait > 0) {
        log.debug("[RATE] waiting", { endpoint: this.name, ms: wait });
        await sleep(wait);
      }
      this.lastAt = this.now();
    });
    this.tail = turn;
    return turn;
  }
}

const gates = new Map<string, RateGate>();

/**
 * Process-wide gate per endpoint class ("llm", "alphavantage", ...).
 * The first registration fixes the spacing for that class.
 */
export function rateGateFor(endpoint: string, minIntervalMs: number): RateGate {
  const existing = gates.get(endpoint);
  if (existing) {
    if (existing.minIntervalMs !== minIntervalMs) {
      log.warn("[RATE] interval ignored, gate already registered", {
        endpoint,
        registeredMs: existing.minIntervalMs,
        requestedMs: minIntervalMs,
      });
    }
    return existing;
  }
  const gate = new RateGate(endpoint, minIntervalMs);
  gates.set(endpoint, gate);
  return gate;
}
