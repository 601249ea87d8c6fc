import { buildPipeline } from "../app.js";
import { parseCompanies } from "../companies.js";
import { loadConfig } from "../config.js";
import { setLogLevel } from "../logger.js";
import { MockMarketSource, MockNewsSource, MockWeatherSource } from "../providers/mock.js";
import { createSignalSources } from "../providers/index.js";
import { GoogleNewsSource } from "../providers/news.js";
import { AlphaVantageSource } from "../providers/market.js";
import { OpenWeatherSource } from "../providers/weather.js";

describe("createSignalSources", () => {
  it("uses mocks in dry-run mode even with keys", () => {
    const s = createSignalSources(
      loadConfig({ DRY_RUN: "true", ALPHA_VANTAGE_KEY: "test-key", OPENWEATHER_KEY: "test-key" })
    );
    expect(s.news).toBeInstanceOf(MockNewsSource);
    expect(s.market).toBeInstanceOf(MockMarketSource);
    expect(s.weather).toBeInstanceOf(MockWeatherSource);
  });

  it("uses live adapters where keys are present", () => {
    const s = createSignalSources(loadConfig({ ALPHA_VANTAGE_KEY: "test-key", OPENWEATHER_KEY: "test-key" }));
    expect(s.news).toBeInstanceOf(GoogleNewsSource);
    expect(s.market).toBeInstanceOf(AlphaVantageSource);
    expect(s.weather).toBeInstanceOf(OpenWeatherSource);
  });

  it("falls back to mocks per missing key", () => {
    const s = createSignalSources(loadConfig({ OPENWEATHER_KEY: "test-key" }));
    expect(s.news).toBeInstanceOf(GoogleNewsSource);
    expect(s.market).toBeInstanceOf(MockMarketSource);
    expect(s.weather).toBeInstanceOf(OpenWeatherSource);
  });
});

describe("buildPipeline", () => {
  it("runs offline end to end in dry-run mode", async () => {
    const pipeline = buildPipeline(loadConfig({ DRY_RUN: "true", DB_PATH: ":memory:" }));
    const companies = parseCompanies({
      target_companies: [
        {
          name: "Apple Inc",
          ticker: "AAPL",
          supply_chain_nodes: [
            { entity: "TSMC", location: "Tainan, Taiwan", type: "semiconductor", coordinates: [23.1243, 120.3029] },
          ],
        },
        { name: "Tesla Inc", ticker: "TSLA" },
      ],
    });

    const stats = await pipeline.orchestrator.run(companies);

    expect(stats).toMatchObject({ companies: 2, totalArticles: 2, errors: 0, alertsDispatched: 0 });
    expect(stats.eventsStored).toBe(stats.admitted);
    expect(pipeline.events.pendingEvents("YELLOW")).toHaveLength(stats.eventsStored);
    expect(pipeline.graph.kindOf("Apple Inc")).toBe("company");
    pipeline.close();
  });

  it("applies the configured log level", () => {
    const info = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const pipeline = buildPipeline(loadConfig({ DRY_RUN: "true", DB_PATH: ":memory:", LOG_LEVEL: "WARN" }));

    expect(info).not.toHaveBeenCalled();
    pipeline.close();
    setLogLevel(null);
    info.mockRestore();
  });
});
