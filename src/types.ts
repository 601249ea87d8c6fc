/**
 * Shared types across the pipeline
 */
export const SEVERITIES = ["RED", "YELLOW", "GREEN"] as const;

/** Traffic-light risk level, RED > YELLOW > GREEN. */
export type Severity = (typeof SEVERITIES)[number];

export type NodeKind = "company" | "supplier" | "location" | "event";

/** One upstream dependency of a tracked company. */
export type SupplyNode = {
  entity: string; // supplier name, e.g. "TSMC"
  location: string; // e.g. "Tainan, Taiwan"
  kind: string; // free-form category: semiconductor, assembly, raw_material...
  coordinates: [lat: number, lon: number];
};

export type Company = {
  name: string;
  ticker: string;
  keywords: string[];
  nodes: SupplyNode[];
};

/* ---------------- signals ---------------- */

export type NewsItem = {
  title: string;
  description: string;
  url: string;
  publishedAt: string; // as published by the source
  source: string;
};

export type VolatilityLabel = "high" | "normal" | "unknown";

export type MarketSnapshot = {
  ticker: string;
  price: number;
  previousClose: number;
  percentChange: number;
  volatilityLabel: VolatilityLabel;
};

export type WeatherAlert = {
  time: string;
  description: string;
  severity: string;
};

export type WeatherReport = {
  location: string;
  temperatureC: number;
  description: string;
  conditionCode: number;
  isSevere: boolean;
  severityLabel: string; // normal | severe_weather | extreme_heat | extreme_cold | unknown
  upcomingAlerts: WeatherAlert[];
};

/* ---------------- analysis ---------------- */

/** Correlated signals handed to the analyzer. */
export type RiskSignals = {
  company: string;
  nodeLocation: string;
  nodeType: string;
  headline: string;
  summary: string;
  volatility: number; // percent change
  weatherDescription: string;
  weatherSeverity: string;
};

export type RiskAssessment = {
  severity: Severity;
  impactEstimate: string;
  rationale: string;
  mitigations: string[];
  confidence: number; // 0..100
  /** Set when the assessment is the conservative default rather than a model answer. */
  fallbackReason?: string;
};

/* ---------------- persisted records ---------------- */

export type RiskEventCandidate = {
  company: string;
  category?: string; // default "supply_chain"
  headline: string;
  sourceUrl: string;
  marketImpact?: number | null;
  weatherCorrelation?: string | null;
  assessment: RiskAssessment;
};

export type RiskEvent = {
  id: number;
  company: string;
  category: string;
  severity: Severity;
  headline: string;
  fingerprint: string;
  sourceUrl: string;
  marketImpact: number | null;
  weatherCorrelation: string | null;
  rationale: string;
  impactEstimate: string;
  mitigations: string[];
  confidence: number;
  createdAt: string; // ISO
  notified: boolean;
};

export type StoreResult =
  | { kind: "stored"; event: RiskEvent }
  | { kind: "duplicate"; fingerprint: string; existingId: number | null };

export type AlertStatus = "sent" | "failed";

export type AlertRecord = {
  id: number;
  riskEventId: number;
  channel: string;
  status: AlertStatus;
  sentAt: string;
};

export type GraphEdgeRecord = {
  source: string;
  target: string;
  relation: string;
  company: string;
  confidence: number;
};

/* ---------------- run summary ---------------- */

export type RunStats = {
  companies: number;
  totalArticles: number;
  admitted: number;
  eventsStored: number;
  duplicatesSkipped: number;
  alertsDispatched: number;
  errors: number;
  durationMs: number;
};
