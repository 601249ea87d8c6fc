import type { EventDB } from "../db/EventDB.js";
import { errMessage, log } from "../logger.js";
import type { AlertStatus, RiskEvent } from "../types.js";
import type { NotificationChannel } from "./channel.js";

export type Dispatch = { channel: string; status: AlertStatus };

type AlertLedger = Pick<EventDB, "recordAlert" | "markNotified">;

/**
 * Severity-based dispatch. RED goes out immediately on every channel;
 * YELLOW/GREEN stay unnotified for the digest.
 */
export class NotificationRouter {
  constructor(
    private readonly ledger: AlertLedger,
    private readonly channels: NotificationChannel[]
  ) {}

  get channelIds(): string[] {
    return this.channels.map((c) => c.id);
  }

  static isImmediate(event: RiskEvent): boolean {
    return event.severity === "RED";
  }

  /** One AlertRecord per attempt; `notified` flips once after all attempts. */
  async route(event: RiskEvent): Promise<Dispatch[]> {
    if (event.notified || !NotificationRouter.isImmediate(event)) {
      if (!event.notified) {
        log.debug("[ROUTE] deferred to digest", { eventId: event.id, severity: event.severity });
      }
      return [];
    }

    const attempts: Dispatch[] = [];
    for (const channel of this.channels) {
      let status: AlertStatus = "sent";
      try {
        await channel.send(event);
      } catch (err) {
        status = "failed";
        log.error("[ROUTE] channel failed", {
          eventId: event.id,
          channel: channel.id,
          error: errMessage(err),
        });
      }
      this.ledger.recordAlert(event.id, channel.id, status);
      attempts.push({ channel: channel.id, status });
    }

    this.ledger.markNotified(event.id);
    event.notified = true;
    return attempts;
  }
}
