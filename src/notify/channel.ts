import type { RiskEvent } from "../types.js";

/** A delivery target for immediate alerts. `send` rejects on failure. */
export interface NotificationChannel {
  readonly id: string;
  send(event: RiskEvent): Promise<void>;
}

export const SEVERITY_ICON: Record<RiskEvent["severity"], string> = {
  RED: "🔴",
  YELLOW: "🟡",
  GREEN: "🟢",
};
