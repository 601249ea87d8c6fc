import type Database from "better-sqlite3";
import { SignalCache } from "../../cache.js";
import { openDatabase } from "../../db/database.js";
import { EdgeDB } from "../../db/EdgeDB.js";
import { EventDB, fingerprint } from "../../db/EventDB.js";
import { SupplyGraph } from "../../graph/SupplyGraph.js";
import type { NotificationChannel } from "../../notify/channel.js";
import { NotificationRouter } from "../../notify/router.js";
import type { SignalSources } from "../../providers/index.js";
import type {
  Company,
  MarketSnapshot,
  NewsItem,
  RiskAssessment,
  RiskEvent,
  RiskSignals,
  WeatherReport,
} from "../../types.js";
import { fallbackAssessment, type RiskAnalyzer } from "../analyze.js";
import type { GateVerdict, RelevanceGate } from "../gate.js";
import { eventLabel, Orchestrator, pickNode, type OrchestratorDeps } from "../orchestrator.js";

const apple: Company = {
  name: "Apple Inc",
  ticker: "AAPL",
  keywords: ["semiconductor"],
  nodes: [
    { entity: "TSMC", location: "Tainan, Taiwan", kind: "semiconductor", coordinates: [23.1243, 120.3029] },
    { entity: "Foxconn", location: "Shenzhen, China", kind: "assembly", coordinates: [22.5431, 114.0579] },
  ],
};
const nvidia: Company = { name: "NVIDIA Corporation", ticker: "NVDA", keywords: [], nodes: [] };
const tesla: Company = {
  name: "Tesla Inc",
  ticker: "TSLA",
  keywords: [],
  nodes: [{ entity: "SQM", location: "Atacama, Chile", kind: "lithium", coordinates: [-23.5, -68.2] }],
};

const article = (title: string, description = title): NewsItem => ({
  title,
  description,
  url: "https://example.com/news/1",
  publishedAt: "Sun, 01 Mar 2026 10:00:00 GMT",
  source: "Wire",
});

const quote = (ticker: string, percentChange: number): MarketSnapshot => ({
  ticker,
  price: 170.1,
  previousClose: 177.55,
  percentChange,
  volatilityLabel: Math.abs(percentChange) > 3 ? "high" : "normal",
});

const storm = (location: string): WeatherReport => ({
  location,
  temperatureC: 27.5,
  description: "thunderstorm",
  conditionCode: 211,
  isSevere: true,
  severityLabel: "severe_weather",
  upcomingAlerts: [],
});

const red: RiskAssessment = {
  severity: "RED",
  impactEstimate: "$2B revenue at risk",
  rationale: "Fab outage and storm coincide with a 4.2% drop.",
  mitigations: ["Shift orders", "Expedite inventory", "Notify customers"],
  confidence: 88,
};

const passAll: RelevanceGate = {
  async evaluate(): Promise<GateVerdict> {
    return { pass: true, failedOpen: false };
  },
};

class RecordingAnalyzer implements RiskAnalyzer {
  readonly seen: RiskSignals[] = [];
  constructor(private readonly result: RiskAssessment = red) {}
  async analyze(signals: RiskSignals): Promise<RiskAssessment> {
    this.seen.push(signals);
    return { ...this.result, mitigations: [...this.result.mitigations] };
  }
}

class CapturingChannel implements NotificationChannel {
  readonly sent: RiskEvent[] = [];
  constructor(readonly id: string, private readonly fail = false) {}
  async send(event: RiskEvent): Promise<void> {
    if (this.fail) throw new Error(`${this.id} unreachable`);
    this.sent.push(event);
  }
}

function sources(over: Partial<SignalSources> = {}): SignalSources {
  return {
    news: { fetchNews: async (c) => [article(`${c.name}: TSMC halts production at Tainan fab`)] },
    market: { fetchQuote: async (t) => quote(t, -4.2) },
    weather: { fetchWeather: async (_lat, _lon, loc) => storm(loc) },
    ...over,
  };
}

describe("Orchestrator", () => {
  let sqlite: Database.Database;
  let events: EventDB;
  let graph: SupplyGraph;
  let channel: CapturingChannel;

  beforeEach(() => {
    sqlite = openDatabase(":memory:");
    events = new EventDB(sqlite);
    graph = new SupplyGraph(new EdgeDB(sqlite));
    channel = new CapturingChannel("console");
  });

  afterEach(() => {
    sqlite.close();
  });

  function build(over: Partial<OrchestratorDeps> = {}): Orchestrator {
    return new Orchestrator({
      sources: sources(),
      gate: passAll,
      analyzer: new RecordingAnalyzer(),
      store: events,
      router: new NotificationRouter(events, [channel]),
      graph,
      ...over,
    });
  }

  it("turns a correlated RED signal into a stored, notified event", async () => {
    const analyzer = new RecordingAnalyzer();
    const stats = await build({ analyzer }).run([apple]);

    expect(stats).toMatchObject({
      companies: 1,
      totalArticles: 1,
      admitted: 1,
      eventsStored: 1,
      duplicatesSkipped: 0,
      alertsDispatched: 1,
      errors: 0,
    });
    expect(analyzer.seen[0]).toMatchObject({
      company: "Apple Inc",
      nodeLocation: "Tainan, Taiwan",
      nodeType: "semiconductor",
      volatility: -4.2,
      weatherDescription: "thunderstorm",
      weatherSeverity: "severe_weather",
    });

    const [stored] = events.recentEvents(1);
    expect(stored).toMatchObject({ severity: "RED", notified: true, marketImpact: -4.2 });
    expect(events.alertsFor(stored.id).map((a) => [a.channel, a.status])).toEqual([
      ["console", "sent"],
    ]);
    expect(channel.sent.map((e) => e.id)).toEqual([stored.id]);

    const label = eventLabel("Apple Inc: TSMC halts production at Tainan fab");
    expect(graph.reachableCompaniesFrom(label)).toEqual(["Apple Inc"]);
    expect(new EdgeDB(sqlite).edgesFor("Apple Inc")).toHaveLength(5);
  });

  it("fingerprints the stored headline and dedupes a repeat", async () => {
    const news = { fetchNews: async () => [article("TSMC warns of chip disruptions")] };
    await build({ sources: sources({ news }) }).run([apple]);

    const [stored] = events.recentEvents(1);
    expect(stored.severity).toBe("RED");
    expect(stored.fingerprint).toBe(fingerprint("tsmc warns of chip disruptions"));

    const again = events.store({
      company: "Apple Inc",
      headline: "TSMC warns of chip disruptions",
      sourceUrl: "",
      assessment: red,
    });
    expect(again).toEqual({
      kind: "duplicate",
      fingerprint: stored.fingerprint,
      existingId: stored.id,
    });
  });

  it("skips the same headline on a second run", async () => {
    const orchestrator = build();
    await orchestrator.run([apple]);
    const second = await orchestrator.run([apple]);

    expect(second).toMatchObject({ eventsStored: 0, duplicatesSkipped: 1, alertsDispatched: 0 });
    expect(channel.sent).toHaveLength(1);
  });

  it("leaves non-RED events for the digest", async () => {
    const yellow: RiskAssessment = { ...red, severity: "YELLOW" };
    const stats = await build({ analyzer: new RecordingAnalyzer(yellow) }).run([apple]);

    expect(stats.eventsStored).toBe(1);
    expect(stats.alertsDispatched).toBe(0);
    expect(channel.sent).toEqual([]);
    expect(events.pendingEvents("YELLOW")).toHaveLength(1);
  });

  it("isolates a failing fetch to its company", async () => {
    const fetchNews = jest.fn(async (c: Company): Promise<NewsItem[]> => {
      if (c.name === nvidia.name) throw new Error("feed down");
      return [article(`${c.name} supplier fire`)];
    });
    const stats = await build({ sources: sources({ news: { fetchNews } }) }).run([
      apple,
      nvidia,
      tesla,
    ]);

    expect(fetchNews).toHaveBeenCalledTimes(3);
    expect(stats).toMatchObject({ companies: 3, eventsStored: 2, errors: 1 });
    expect(events.recentEvents(1).map((e) => e.company).sort()).toEqual(["Apple Inc", "Tesla Inc"]);
  });

  it("counts a company that fails mid-pipeline and moves on", async () => {
    const errors = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const analyzer: RiskAnalyzer = {
      async analyze(s) {
        if (s.company === apple.name) throw new Error("analyzer crashed");
        return red;
      },
    };

    const stats = await build({ analyzer }).run([apple, tesla]);

    expect(stats).toMatchObject({ companies: 2, eventsStored: 1, errors: 1 });
    expect(errors).toHaveBeenCalledWith(
      expect.any(String),
      "[ERROR]",
      "[RUN] company failed",
      expect.objectContaining({ company: "Apple Inc", phase: "ANALYZE" })
    );
    errors.mockRestore();
  });

  it("ends the run without touching sources when the topology cannot be built", async () => {
    const errors = jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(graph, "addStaticTopology").mockImplementation(() => {
      throw new Error("duplicate node");
    });
    const fetchNews = jest.fn(async (): Promise<NewsItem[]> => [article("TSMC fab fire")]);
    const fetchQuote = jest.fn(async (t: string) => quote(t, -4.2));

    const stats = await build({ sources: sources({ news: { fetchNews }, market: { fetchQuote } }) }).run([
      apple,
      tesla,
    ]);

    expect(fetchNews).not.toHaveBeenCalled();
    expect(fetchQuote).not.toHaveBeenCalled();
    expect(stats).toMatchObject({ companies: 0, totalArticles: 0, eventsStored: 0, errors: 1 });
    expect(events.recentEvents(1)).toEqual([]);
    expect(errors).toHaveBeenCalledWith(
      expect.any(String),
      "[ERROR]",
      "[RUN] topology build failed, aborting run",
      { error: "duplicate node" }
    );
    errors.mockRestore();
  });

  it("still resolves with a summary when every source fails", async () => {
    const down = async (): Promise<never> => {
      throw new Error("offline");
    };
    const stats = await build({
      sources: { news: { fetchNews: down }, market: { fetchQuote: down }, weather: { fetchWeather: down } },
    }).run([apple, nvidia, tesla]);

    expect(stats).toMatchObject({
      companies: 3,
      totalArticles: 0,
      eventsStored: 0,
      alertsDispatched: 0,
      errors: 3,
    });
    expect(stats.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("substitutes neutral market and weather values", async () => {
    const analyzer = new RecordingAnalyzer();
    const down = async (): Promise<never> => {
      throw new Error("quota exceeded");
    };
    const stats = await build({
      analyzer,
      sources: sources({ market: { fetchQuote: down }, weather: { fetchWeather: down } }),
    }).run([apple]);

    expect(stats.errors).toBe(2);
    expect(stats.eventsStored).toBe(1);
    expect(analyzer.seen[0]).toMatchObject({
      volatility: 0,
      weatherDescription: "unknown",
      weatherSeverity: "unknown",
    });
  });

  it("counts fallback assessments and fail-open verdicts as errors", async () => {
    const failOpen: RelevanceGate = {
      async evaluate() {
        return { pass: true, failedOpen: true };
      },
    };
    const stats = await build({
      gate: failOpen,
      analyzer: new RecordingAnalyzer(fallbackAssessment("timeout")),
    }).run([apple]);

    expect(stats).toMatchObject({ admitted: 1, eventsStored: 1, alertsDispatched: 0, errors: 2 });
  });

  it("counts failed channels without failing the run", async () => {
    const router = new NotificationRouter(events, [channel, new CapturingChannel("discord", true)]);
    const stats = await build({ router }).run([apple]);

    expect(stats).toMatchObject({ eventsStored: 1, alertsDispatched: 1, errors: 1 });
  });

  it("fetches a quote once per company and weather once per node", async () => {
    const fetchQuote = jest.fn(async (t: string) => quote(t, 1.1));
    const fetchWeather = jest.fn(async (_lat: number, _lon: number, loc: string) => storm(loc));
    const news = {
      fetchNews: async (): Promise<NewsItem[]> => [
        article("TSMC fab fire"),
        article("TSMC fab evacuated"),
        article("Foxconn plant strike"),
      ],
    };
    const stats = await build({
      sources: sources({ news, market: { fetchQuote }, weather: { fetchWeather } }),
      cache: new SignalCache(),
    }).run([apple]);

    expect(stats.eventsStored).toBe(3);
    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(fetchWeather.mock.calls.map((c) => c[2])).toEqual(["Tainan, Taiwan", "Shenzhen, China"]);
  });

  it("stops before the next company once asked", async () => {
    let processed = 0;
    const fetchNews = async (c: Company): Promise<NewsItem[]> => {
      processed++;
      return [article(`${c.name} update`)];
    };
    const stats = await build({ sources: sources({ news: { fetchNews } }) }).run(
      [apple, nvidia, tesla],
      { shouldStop: () => processed >= 1 }
    );

    expect(stats.companies).toBe(1);
    expect(processed).toBe(1);
  });

  it("handles an empty news day", async () => {
    const stats = await build({
      sources: sources({ news: { fetchNews: async () => [] } }),
    }).run([apple]);
    expect(stats).toMatchObject({ companies: 1, totalArticles: 0, admitted: 0, errors: 0 });
  });
});

describe("pickNode", () => {
  it("prefers the node the article mentions", () => {
    expect(pickNode(apple, article("Strike at Foxconn"))?.entity).toBe("Foxconn");
    expect(pickNode(apple, article("Flooding in Shenzhen"))?.entity).toBe("Foxconn");
  });

  it("falls back to the first node", () => {
    expect(pickNode(apple, article("Chip tariffs rise"))?.entity).toBe("TSMC");
    expect(pickNode(nvidia, article("Chip tariffs rise"))).toBeUndefined();
  });
});

describe("eventLabel", () => {
  it("truncates long headlines", () => {
    expect(eventLabel("short")).toBe("News: short");
    expect(eventLabel("x".repeat(60))).toBe(`News: ${"x".repeat(50)}…`);
  });
});
