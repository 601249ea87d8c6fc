import axios from "axios";
import { ProviderError } from "../errors.js";

export const httpClient = axios.create({
  timeout: 15000,
  headers: { "User-Agent": "supply-risk-monitor/0.1" },
});

/** Normalize an axios (or other) failure into a ProviderError. */
export function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return new ProviderError(
      provider,
      status ? `HTTP ${status}` : err.code ?? err.message,
      { status, cause: err }
    );
  }
  return new ProviderError(
    provider,
    err instanceof Error ? err.message : String(err),
    { cause: err }
  );
}
