import type { AxiosInstance } from "axios";
import { z } from "zod";
import { log } from "../logger.js";
import type { RateGate } from "../rateLimit.js";
import type { MarketSnapshot } from "../types.js";
import { httpClient, toProviderError } from "./http.js";

export interface MarketSource {
  fetchQuote(ticker: string): Promise<MarketSnapshot>;
}

const AV_BASE = "https://www.alphavantage.co/query";
/** |% change| above this is labelled "high". */
export const VOLATILITY_HIGH_THRESHOLD = 3.0;

/** Neutral value used when no quote is available. */
export function unknownSnapshot(ticker: string): MarketSnapshot {
  return {
    ticker,
    price: 0,
    previousClose: 0,
    percentChange: 0,
    volatilityLabel: "unknown",
  };
}

const numeric = z.coerce.number().finite();

const GlobalQuoteSchema = z.object({
  "Global Quote": z
    .object({
      "05. price": numeric,
      "08. previous close": numeric,
      "10. change percent": z
        .string()
        .transform((s) => Number(s.replace("%", "").trim()))
        .pipe(z.number().finite()),
    })
    .partial()
    .optional(),
});

/** Map an Alpha Vantage GLOBAL_QUOTE payload; empty/unknown shape = zero change. */
export function parseGlobalQuote(ticker: string, data: unknown): MarketSnapshot {
  const parsed = GlobalQuoteSchema.safeParse(data);
  const quote = parsed.success ? parsed.data["Global Quote"] : undefined;
  const price = quote?.["05. price"];
  const previousClose = quote?.["08. previous close"];
  const change = quote?.["10. change percent"];
  if (price === undefined || previousClose === undefined || change === undefined) {
    return unknownSnapshot(ticker);
  }
  const percentChange = Math.round(change * 100) / 100;
  return {
    ticker,
    price,
    previousClose,
    percentChange,
    volatilityLabel:
      Math.abs(percentChange) > VOLATILITY_HIGH_THRESHOLD ? "high" : "normal",
  };
}

export class AlphaVantageSource implements MarketSource {
  constructor(
    private readonly apiKey: string,
    private readonly gate: RateGate,
    private readonly http: AxiosInstance = httpClient
  ) {}

  async fetchQuote(ticker: string): Promise<MarketSnapshot> {
    await this.gate.acquire();
    try {
      const { data } = await this.http.get<unknown>(AV_BASE, {
        params: { function: "GLOBAL_QUOTE", symbol: ticker, apikey: this.apiKey },
      });
      const snapshot = parseGlobalQuote(ticker, data);
      if (snapshot.volatilityLabel === "unknown") {
        log.warn("[MARKET] empty quote", { ticker });
      } else {
        log.info("[MARKET] quote", {
          ticker,
          price: snapshot.price,
          changePct: snapshot.percentChange,
        });
      }
      return snapshot;
    } catch (err) {
      throw toProviderError("alphavantage", err);
    }
  }
}
