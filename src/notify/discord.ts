import axios, { type AxiosInstance } from "axios";
import { log } from "../logger.js";
import type { RiskEvent, Severity } from "../types.js";
import { SEVERITY_ICON, type NotificationChannel } from "./channel.js";

// ---------- Types ----------
type EmbedField = { name: string; value: string; inline?: boolean };
type Embed = {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  timestamp?: string; // ISO
  fields?: EmbedField[];
  footer?: { text: string };
};

// ---------- Limits ----------
const LIMITS = {
  TITLE: 256,
  DESC: 4096,
  FIELDS: 25,
  FIELD_NAME: 256,
  FIELD_VALUE: 1024,
};

const COLORS: Record<Severity, number> = {
  RED: 0xef4444,
  YELLOW: 0xf59e0b,
  GREEN: 0x10b981,
};

const clip = (s: string, max: number) => (s.length > max ? s.slice(0, max - 1) + "…" : s);

function sanitizeEmbed(e: Embed): Embed {
  const out: Embed = { ...e };
  if (out.title) out.title = clip(out.title, LIMITS.TITLE);
  if (out.description) out.description = clip(out.description, LIMITS.DESC);
  if (out.fields) {
    out.fields = out.fields.slice(0, LIMITS.FIELDS).map((f) => ({
      name: clip(f.name || "-", LIMITS.FIELD_NAME),
      value: clip(f.value || "-", LIMITS.FIELD_VALUE),
      inline: f.inline,
    }));
  }
  return out;
}

export function buildRiskEmbed(event: RiskEvent): Embed {
  return sanitizeEmbed({
    title: `${SEVERITY_ICON[event.severity]} ${event.severity} risk: ${event.company}`,
    description: event.headline,
    url: event.sourceUrl || undefined,
    color: COLORS[event.severity],
    timestamp: event.createdAt,
    fields: [
      { name: "Impact", value: event.impactEstimate, inline: false },
      { name: "Rationale", value: event.rationale, inline: false },
      {
        name: "Mitigation",
        value: event.mitigations.map((m) => `• ${m}`).join("\n"),
        inline: false,
      },
      { name: "Confidence", value: `${Math.round(event.confidence)}%`, inline: true },
      {
        name: "Market",
        value: event.marketImpact == null ? "n/a" : `${event.marketImpact}%`,
        inline: true,
      },
      { name: "Weather", value: event.weatherCorrelation ?? "n/a", inline: true },
    ],
    footer: { text: `event #${event.id}` },
  });
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Seconds Discord asks us to wait on a 429, if it said so. */
function retryAfterMs(err: unknown): number | undefined {
  if (!axios.isAxiosError(err) || err.response?.status !== 429) return undefined;
  const data: unknown = err.response.data;
  const seconds =
    typeof data === "object" && data !== null && "retry_after" in data
      ? Number(data.retry_after)
      : NaN;
  return (Number.isFinite(seconds) ? seconds : 1) * 1000;
}

/** Bot token + channel id; one retry after a 429. */
export class DiscordChannel implements NotificationChannel {
  readonly id = "discord";
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(
    token: string,
    channelId: string,
    private readonly http: AxiosInstance = axios.create({ timeout: 8000 })
  ) {
    this.url = `https://discord.com/api/v10/channels/${channelId}/messages`;
    this.headers = {
      Authorization: `Bot ${token}`,
      "Content-Type": "application/json",
    };
  }

  async send(event: RiskEvent): Promise<void> {
    const body = { embeds: [buildRiskEmbed(event)] };
    try {
      await this.http.post(this.url, body, { headers: this.headers });
    } catch (err) {
      const wait = retryAfterMs(err);
      if (wait === undefined) throw err;
      log.warn("[DISCORD] rate limited, retrying", { waitMs: wait });
      await sleep(wait);
      await this.http.post(this.url, body, { headers: this.headers });
    }
    log.info("[NOTIFY] discord alert", { eventId: event.id });
  }
}
