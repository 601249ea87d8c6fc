import { SignalCache } from "../cache.js";
import type { EventDB } from "../db/EventDB.js";
import type { SupplyGraph } from "../graph/SupplyGraph.js";
import { errMessage, log } from "../logger.js";
import type { NotificationRouter } from "../notify/router.js";
import type { SignalSources } from "../providers/index.js";
import { unknownSnapshot } from "../providers/market.js";
import { unknownWeather } from "../providers/weather.js";
import type {
  Company,
  MarketSnapshot,
  NewsItem,
  RunStats,
  SupplyNode,
  WeatherReport,
} from "../types.js";
import type { RiskAnalyzer } from "./analyze.js";
import { triage, type RelevanceGate } from "./gate.js";

export type Phase = "FETCH" | "GATE" | "ENRICH" | "ANALYZE" | "STORE" | "ROUTE" | "GRAPH";

export type OrchestratorDeps = {
  sources: SignalSources;
  gate: RelevanceGate;
  analyzer: RiskAnalyzer;
  store: Pick<EventDB, "store">;
  router: Pick<NotificationRouter, "route">;
  graph: SupplyGraph;
  cache?: SignalCache;
};

export type RunOptions = {
  /** Checked before each company; true stops the run after the current one. */
  shouldStop?: () => boolean;
};

export function emptyStats(): RunStats {
  return {
    companies: 0,
    totalArticles: 0,
    admitted: 0,
    eventsStored: 0,
    duplicatesSkipped: 0,
    alertsDispatched: 0,
    errors: 0,
    durationMs: 0,
  };
}

/** First node mentioned in the article, else the first node. */
export function pickNode(company: Company, article: NewsItem): SupplyNode | undefined {
  const text = `${article.title} ${article.description}`.toLowerCase();
  const mentioned = company.nodes.find(
    (n) =>
      text.includes(n.entity.toLowerCase()) ||
      text.includes(n.location.split(",")[0].trim().toLowerCase())
  );
  return mentioned ?? company.nodes[0];
}

export function eventLabel(headline: string): string {
  return headline.length > 50 ? `News: ${headline.slice(0, 50)}…` : `News: ${headline}`;
}

/**
 * One pass over the tracked companies:
 * FETCH → GATE → ENRICH → ANALYZE → STORE → ROUTE per company.
 * A company is the failure domain; the run itself never rejects.
 * A topology failure ends the run before any company is processed.
 */
export class Orchestrator {
  private readonly cache: SignalCache;

  constructor(private readonly deps: OrchestratorDeps) {
    this.cache = deps.cache ?? new SignalCache();
  }

  async run(companies: Company[], opts: RunOptions = {}): Promise<RunStats> {
    const started = Date.now();
    const stats = emptyStats();
    log.info("[RUN] start", { companies: companies.map((c) => c.name) });

    this.cache.clear();
    try {
      this.deps.graph.addStaticTopology(companies);
    } catch (err) {
      stats.errors++;
      log.error("[RUN] topology build failed, aborting run", { error: errMessage(err) });
      return this.finish(stats, started);
    }

    for (const company of companies) {
      if (opts.shouldStop?.()) {
        log.info("[RUN] stop requested, skipping remaining companies", {
          next: company.name,
        });
        break;
      }
      stats.companies++;
      const ctx: { phase: Phase } = { phase: "FETCH" };
      try {
        await this.processCompany(company, stats, ctx);
      } catch (err) {
        stats.errors++;
        log.error("[RUN] company failed", {
          company: company.name,
          phase: ctx.phase,
          error: errMessage(err),
        });
      }
    }

    return this.finish(stats, started);
  }

  private finish(stats: RunStats, started: number): RunStats {
    stats.durationMs = Date.now() - started;
    this.logSummary(stats);
    return stats;
  }

  private async processCompany(
    company: Company,
    stats: RunStats,
    ctx: { phase: Phase }
  ): Promise<void> {
    log.info("[RUN] processing", { company: company.name, ticker: company.ticker });

    ctx.phase = "FETCH";
    const articles =
      (await this.degrade(stats, "news", company.name, () =>
        this.deps.sources.news.fetchNews(company)
      )) ?? [];
    stats.totalArticles += articles.length;
    if (!articles.length) {
      log.info("[RUN] no articles", { company: company.name });
      return;
    }

    ctx.phase = "GATE";
    const { admitted, failedOpen } = await triage(this.deps.gate, company.name, articles);
    stats.errors += failedOpen;
    stats.admitted += admitted.length;
    if (!admitted.length) {
      log.info("[RUN] all articles filtered out", { company: company.name });
      return;
    }

    ctx.phase = "ENRICH";
    const market = await this.marketFor(company.ticker, stats);

    for (const article of admitted) {
      await this.processArticle(company, article, market, stats, ctx);
    }

    ctx.phase = "GRAPH";
    this.deps.graph.persist(company.name);
  }

  private async processArticle(
    company: Company,
    article: NewsItem,
    market: MarketSnapshot,
    stats: RunStats,
    ctx: { phase: Phase }
  ): Promise<void> {
    ctx.phase = "ENRICH";
    const node = pickNode(company, article);
    const weather = node
      ? await this.weatherFor(node, stats)
      : unknownWeather("Unknown");

    ctx.phase = "ANALYZE";
    const assessment = await this.deps.analyzer.analyze({
      company: company.name,
      nodeLocation: node?.location ?? "Unknown",
      nodeType: node?.kind ?? "unknown",
      headline: article.title,
      summary: article.description,
      volatility: market.percentChange,
      weatherDescription: weather.description,
      weatherSeverity: weather.severityLabel,
    });
    if (assessment.fallbackReason) stats.errors++;

    if (node) {
      this.deps.graph.addEvent(eventLabel(article.title), node.location, "event", assessment.severity);
    }

    ctx.phase = "STORE";
    const result = this.deps.store.store({
      company: company.name,
      headline: article.title,
      sourceUrl: article.url,
      marketImpact: market.percentChange,
      weatherCorrelation: weather.description,
      assessment,
    });
    if (result.kind === "duplicate") {
      stats.duplicatesSkipped++;
      return;
    }
    stats.eventsStored++;

    ctx.phase = "ROUTE";
    const dispatches = await this.deps.router.route(result.event);
    for (const d of dispatches) {
      if (d.status === "sent") stats.alertsDispatched++;
      else stats.errors++;
    }
  }

  private async marketFor(ticker: string, stats: RunStats): Promise<MarketSnapshot> {
    const cached = this.cache.getMarket(ticker);
    if (cached) return cached;
    const snapshot = await this.degrade(stats, "market", ticker, () =>
      this.deps.sources.market.fetchQuote(ticker)
    );
    if (!snapshot) return unknownSnapshot(ticker);
    this.cache.setMarket(snapshot);
    return snapshot;
  }

  private async weatherFor(node: SupplyNode, stats: RunStats): Promise<WeatherReport> {
    const [lat, lon] = node.coordinates;
    const cached = this.cache.getWeather(lat, lon);
    if (cached) return cached;
    const report = await this.degrade(stats, "weather", node.location, () =>
      this.deps.sources.weather.fetchWeather(lat, lon, node.location)
    );
    if (!report) return unknownWeather(node.location);
    this.cache.setWeather(lat, lon, report);
    return report;
  }

  /** Run one external fetch; on failure count it and resolve to null. */
  private async degrade<T>(
    stats: RunStats,
    signal: string,
    subject: string,
    fetch: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await fetch();
    } catch (err) {
      stats.errors++;
      log.warn("[RUN] signal unavailable, using neutral value", {
        signal,
        subject,
        error: errMessage(err),
      });
      return null;
    }
  }

  private logSummary(s: RunStats): void {
    const noiseReduction =
      s.totalArticles > 0
        ? ((s.totalArticles - s.admitted) / s.totalArticles) * 100
        : 0;
    log.info("[RUN] summary", {
      durationSec: Number((s.durationMs / 1000).toFixed(1)),
      companies: s.companies,
      totalArticles: s.totalArticles,
      admitted: s.admitted,
      noiseReductionPct: Number(noiseReduction.toFixed(1)),
      eventsStored: s.eventsStored,
      duplicatesSkipped: s.duplicatesSkipped,
      alertsDispatched: s.alertsDispatched,
      errors: s.errors,
    });
  }
}
