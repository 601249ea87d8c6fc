import type { Config } from "../config.js";
import { log } from "../logger.js";
import { rateGateFor } from "../rateLimit.js";
import { AlphaVantageSource, type MarketSource } from "./market.js";
import { MockMarketSource, MockNewsSource, MockWeatherSource } from "./mock.js";
import { GoogleNewsSource, type NewsSource } from "./news.js";
import { OpenWeatherSource, type WeatherSource } from "./weather.js";

export type SignalSources = {
  news: NewsSource;
  market: MarketSource;
  weather: WeatherSource;
};

/** Live adapters where configured; mock stand-ins otherwise. */
export function createSignalSources(
  config: Pick<
    Config,
    | "DRY_RUN"
    | "ALPHA_VANTAGE_KEY"
    | "OPENWEATHER_KEY"
    | "NEWS_MAX_RESULTS"
    | "MARKET_MIN_INTERVAL_MS"
  >
): SignalSources {
  const dry = config.DRY_RUN;
  if (dry) log.info("[SOURCES] dry run, using mock signals");

  const news: NewsSource = dry
    ? new MockNewsSource()
    : new GoogleNewsSource(config.NEWS_MAX_RESULTS);

  let market: MarketSource;
  if (dry || !config.ALPHA_VANTAGE_KEY) {
    if (!dry) log.warn("[SOURCES] ALPHA_VANTAGE_KEY missing, using mock quotes");
    market = new MockMarketSource();
  } else {
    market = new AlphaVantageSource(
      config.ALPHA_VANTAGE_KEY,
      rateGateFor("alphavantage", config.MARKET_MIN_INTERVAL_MS)
    );
  }

  let weather: WeatherSource;
  if (dry || !config.OPENWEATHER_KEY) {
    if (!dry) log.warn("[SOURCES] OPENWEATHER_KEY missing, using mock weather");
    weather = new MockWeatherSource();
  } else {
    weather = new OpenWeatherSource(config.OPENWEATHER_KEY);
  }

  return { news, market, weather };
}
