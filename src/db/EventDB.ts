import type Database from "better-sqlite3";
import { createHash } from "crypto";
import { z } from "zod";
import { log } from "../logger.js";
import {
  SEVERITIES,
  type AlertRecord,
  type AlertStatus,
  type RiskEvent,
  type RiskEventCandidate,
  type Severity,
  type StoreResult,
} from "../types.js";

const HOUR_MS = 3_600_000;

/** SHA-256 of the trimmed, lower-cased headline. */
export function fingerprint(headline: string): string {
  return createHash("sha256").update(headline.trim().toLowerCase(), "utf8").digest("hex");
}

type EventRow = {
  id: number;
  company: string;
  category: string;
  severity: string;
  headline: string;
  fingerprint: string;
  source_url: string;
  market_impact: number | null;
  weather_correlation: string | null;
  rationale: string;
  impact_estimate: string;
  mitigations: string;
  confidence: number;
  created_at: string;
  notified: number;
};

type AlertRow = {
  id: number;
  risk_event_id: number;
  channel: string;
  status: string;
  sent_at: string;
};

type InsertParams = Omit<EventRow, "id" | "notified">;
type ClaimParams = { fingerprint: string; now: string; cutoff: string };

const SeveritySchema = z.enum(SEVERITIES);
const MitigationsSchema = z.array(z.string());
const AlertStatusSchema = z.enum(["sent", "failed"]);

function toEvent(row: EventRow): RiskEvent {
  return {
    id: row.id,
    company: row.company,
    category: row.category,
    severity: SeveritySchema.parse(row.severity),
    headline: row.headline,
    fingerprint: row.fingerprint,
    sourceUrl: row.source_url,
    marketImpact: row.market_impact,
    weatherCorrelation: row.weather_correlation,
    rationale: row.rationale,
    impactEstimate: row.impact_estimate,
    mitigations: MitigationsSchema.parse(JSON.parse(row.mitigations)),
    confidence: row.confidence,
    createdAt: row.created_at,
    notified: row.notified === 1,
  };
}

function toAlert(row: AlertRow): AlertRecord {
  return {
    id: row.id,
    riskEventId: row.risk_event_id,
    channel: row.channel,
    status: AlertStatusSchema.parse(row.status),
    sentAt: row.sent_at,
  };
}

export type EventDBOptions = {
  /** Trailing dedup window (default 24 h). */
  windowHours?: number;
  now?: () => Date;
};

/**
 * Risk-event persistence & duplicate prevention.
 *
 * Dedup is windowed: a headline is a duplicate only if the same
 * fingerprint was stored within the trailing window. The windowed read
 * is the fast pre-check; the `risk_fingerprints` claim (primary key on
 * fingerprint, taken over only once the previous claim has aged out of
 * the window) is the constraint that holds under concurrent writers.
 */
export class EventDB {
  private readonly windowMs: number;
  private readonly now: () => Date;

  private readonly qRecent: Database.Statement<[string, string], { id: number }>;
  private readonly qClaim: Database.Statement<[ClaimParams]>;
  private readonly qBindClaim: Database.Statement<[number, string]>;
  private readonly qInsert: Database.Statement<[InsertParams]>;
  private readonly qById: Database.Statement<[number], EventRow>;
  private readonly qMarkNotified: Database.Statement<[number]>;
  private readonly qInsertAlert: Database.Statement<[number, string, string, string]>;
  private readonly qAlertsFor: Database.Statement<[number], AlertRow>;
  private readonly qAlertById: Database.Statement<[number | bigint], AlertRow>;

  constructor(private readonly db: Database.Database, opts: EventDBOptions = {}) {
    this.windowMs = (opts.windowHours ?? 24) * HOUR_MS;
    this.now = opts.now ?? (() => new Date());

    this.qRecent = db.prepare<[string, string], { id: number }>(
      `SELECT id FROM risk_events
       WHERE fingerprint = ? AND created_at >= ?
       ORDER BY created_at DESC, id DESC LIMIT 1`
    );
    this.qClaim = db.prepare<ClaimParams>(
      `INSERT INTO risk_fingerprints (fingerprint, event_id, claimed_at)
       VALUES (@fingerprint, NULL, @now)
       ON CONFLICT (fingerprint) DO UPDATE
         SET claimed_at = excluded.claimed_at, event_id = NULL
         WHERE risk_fingerprints.claimed_at < @cutoff`
    );
    this.qBindClaim = db.prepare<[number, string]>(
      "UPDATE risk_fingerprints SET event_id = ? WHERE fingerprint = ?"
    );
    this.qInsert = db.prepare<InsertParams>(
      `INSERT INTO risk_events
        (company, category, severity, headline, fingerprint, source_url,
         market_impact, weather_correlation, rationale, impact_estimate,
         mitigations, confidence, created_at)
       VALUES
        (@company, @category, @severity, @headline, @fingerprint, @source_url,
         @market_impact, @weather_correlation, @rationale, @impact_estimate,
         @mitigations, @confidence, @created_at)`
    );
    this.qById = db.prepare<[number], EventRow>("SELECT * FROM risk_events WHERE id = ?");
    this.qMarkNotified = db.prepare<[number]>(
      "UPDATE risk_events SET notified = 1 WHERE id = ? AND notified = 0"
    );
    this.qInsertAlert = db.prepare<[number, string, string, string]>(
      `INSERT INTO alert_history (risk_event_id, channel, status, sent_at)
       VALUES (?, ?, ?, ?)`
    );
    this.qAlertsFor = db.prepare<[number], AlertRow>(
      "SELECT * FROM alert_history WHERE risk_event_id = ? ORDER BY id"
    );
    this.qAlertById = db.prepare<[number | bigint], AlertRow>("SELECT * FROM alert_history WHERE id = ?");
  }

  /** Dedup-check and insert in one IMMEDIATE transaction. */
  store(candidate: RiskEventCandidate): StoreResult {
    const fp = fingerprint(candidate.headline);
    const at = this.now();
    const createdAt = at.toISOString();
    const cutoff = new Date(at.getTime() - this.windowMs).toISOString();

    const tx = this.db.transaction((): StoreResult => {
      const existing = this.qRecent.get(fp, cutoff);
      if (existing) {
        return { kind: "duplicate", fingerprint: fp, existingId: existing.id };
      }
      const claimed = this.qClaim.run({ fingerprint: fp, now: createdAt, cutoff });
      if (claimed.changes === 0) {
        return { kind: "duplicate", fingerprint: fp, existingId: null };
      }

      const a = candidate.assessment;
      const info = this.qInsert.run({
        company: candidate.company,
        category: candidate.category ?? "supply_chain",
        severity: a.severity,
        headline: candidate.headline,
        fingerprint: fp,
        source_url: candidate.sourceUrl,
        market_impact: candidate.marketImpact ?? null,
        weather_correlation: candidate.weatherCorrelation ?? null,
        rationale: a.rationale,
        impact_estimate: a.impactEstimate,
        mitigations: JSON.stringify(a.mitigations),
        confidence: a.confidence,
        created_at: createdAt,
      });
      const id = Number(info.lastInsertRowid);
      this.qBindClaim.run(id, fp);
      const row = this.qById.get(id);
      if (!row) throw new Error(`risk event ${id} vanished after insert`);
      return { kind: "stored", event: toEvent(row) };
    });

    const result = tx.immediate();
    if (result.kind === "duplicate") {
      log.info("[STORE] duplicate skipped", {
        existingId: result.existingId,
        headline: candidate.headline.slice(0, 60),
      });
    } else {
      log.info("[STORE] stored", {
        id: result.event.id,
        severity: result.event.severity,
        company: result.event.company,
        headline: result.event.headline.slice(0, 60),
      });
    }
    return result;
  }

  getEvent(id: number): RiskEvent | undefined {
    const row = this.qById.get(id);
    return row ? toEvent(row) : undefined;
  }

  /** Flip `notified` once. Returns false if it was already set (or unknown id). */
  markNotified(id: number): boolean {
    return this.qMarkNotified.run(id).changes === 1;
  }

  recordAlert(riskEventId: number, channel: string, status: AlertStatus): AlertRecord {
    const info = this.qInsertAlert.run(riskEventId, channel, status, this.now().toISOString());
    const row = this.qAlertById.get(info.lastInsertRowid);
    if (!row) throw new Error(`alert ${String(info.lastInsertRowid)} vanished after insert`);
    return toAlert(row);
  }

  alertsFor(riskEventId: number): AlertRecord[] {
    return this.qAlertsFor.all(riskEventId).map(toAlert);
  }

  /** Events not yet notified (the digest backlog), newest first. */
  pendingEvents(severity?: Severity): RiskEvent[] {
    const rows = severity
      ? this.db
          .prepare<[string], EventRow>(
            "SELECT * FROM risk_events WHERE notified = 0 AND severity = ? ORDER BY created_at DESC, id DESC"
          )
          .all(severity)
      : this.db
          .prepare<[], EventRow>(
            "SELECT * FROM risk_events WHERE notified = 0 ORDER BY created_at DESC, id DESC"
          )
          .all();
    return rows.map(toEvent);
  }

  /** Events created in the last `hours`, optionally for one company. */
  recentEvents(hours = 24, company?: string): RiskEvent[] {
    const cutoff = new Date(this.now().getTime() - hours * HOUR_MS).toISOString();
    const rows = company
      ? this.db
          .prepare<[string, string], EventRow>(
            "SELECT * FROM risk_events WHERE created_at >= ? AND company = ? ORDER BY created_at DESC, id DESC"
          )
          .all(cutoff, company)
      : this.db
          .prepare<[string], EventRow>(
            "SELECT * FROM risk_events WHERE created_at >= ? ORDER BY created_at DESC, id DESC"
          )
          .all(cutoff);
    return rows.map(toEvent);
  }
}
