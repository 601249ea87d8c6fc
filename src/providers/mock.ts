import type { Company, MarketSnapshot, NewsItem, WeatherReport } from "../types.js";
import type { MarketSource } from "./market.js";
import type { NewsSource } from "./news.js";
import type { WeatherSource } from "./weather.js";

/** Offline stand-ins used in dry-run mode or when a source has no key. */
export class MockNewsSource implements NewsSource {
  async fetchNews(company: Company): Promise<NewsItem[]> {
    return [
      {
        title: `Mock: supply chain disruption reported for ${company.name}`,
        description: `A mock supply chain event for ${company.name}.`,
        url: "https://example.com/mock",
        publishedAt: new Date().toISOString(),
        source: "MockNews",
      },
    ];
  }
}

export class MockMarketSource implements MarketSource {
  async fetchQuote(ticker: string): Promise<MarketSnapshot> {
    return {
      ticker,
      price: 185.42,
      previousClose: 182.1,
      percentChange: 1.82,
      volatilityLabel: "normal",
    };
  }
}

export class MockWeatherSource implements WeatherSource {
  async fetchWeather(_lat: number, _lon: number, location: string): Promise<WeatherReport> {
    return {
      location: location || "Mock Location",
      temperatureC: 28,
      description: "scattered clouds",
      conditionCode: 802,
      isSevere: false,
      severityLabel: "normal",
      upcomingAlerts: [],
    };
  }
}
