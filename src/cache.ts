import type { MarketSnapshot, WeatherReport } from "./types.js";

/**
 * Signal cache owned by one orchestrator and cleared at the start of
 * every run, so a long-lived process never serves a previous run's data.
 */
export class SignalCache {
  private readonly market = new Map<string, MarketSnapshot>();
  private readonly weather = new Map<string, WeatherReport>();

  static coordKey(lat: number, lon: number): string {
    return `${lat.toFixed(4)},${lon.toFixed(4)}`;
  }

  getMarket(ticker: string): MarketSnapshot | undefined {
    return this.market.get(ticker.toUpperCase());
  }

  setMarket(snapshot: MarketSnapshot): void {
    this.market.set(snapshot.ticker.toUpperCase(), snapshot);
  }

  getWeather(lat: number, lon: number): WeatherReport | undefined {
    return this.weather.get(SignalCache.coordKey(lat, lon));
  }

  setWeather(lat: number, lon: number, report: WeatherReport): void {
    this.weather.set(SignalCache.coordKey(lat, lon), report);
  }

  clear(): void {
    this.market.clear();
    this.weather.clear();
  }
}
