import { log } from "../logger.js";
import type { RiskEvent } from "../types.js";
import { SEVERITY_ICON, type NotificationChannel } from "./channel.js";

/** Plain-text alert body. */
export function formatAlertText(event: RiskEvent): string {
  const strategies = event.mitigations.map((s) => `  • ${s}`).join("\n");
  return [
    `${SEVERITY_ICON[event.severity]} RISK ALERT: ${event.severity}`,
    `Company:    ${event.company}`,
    `Headline:   ${event.headline}`,
    `Impact:     ${event.impactEstimate || "N/A"}`,
    `Confidence: ${Math.round(event.confidence)}%`,
    `Mitigation:`,
    strategies,
    `Source:     ${event.sourceUrl || "N/A"}`,
  ].join("\n");
}

export class ConsoleChannel implements NotificationChannel {
  readonly id = "console";

  constructor(private readonly write: (text: string) => void = (t) => console.log(t)) {}

  async send(event: RiskEvent): Promise<void> {
    const rule = "=".repeat(60);
    this.write(`\n${rule}\n${formatAlertText(event)}\n${rule}\n`);
    log.info("[NOTIFY] console alert", { eventId: event.id });
  }
}
