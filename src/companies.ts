import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import type { Company } from "./types.js";

const SupplyNodeSchema = z
  .object({
    entity: z.string().trim().min(1),
    location: z.string().trim().min(1),
    type: z.string().trim().min(1).default("unknown"),
    coordinates: z.tuple([
      z.number().min(-90).max(90),
      z.number().min(-180).max(180),
    ]),
  })
  .transform((n) => ({
    entity: n.entity,
    location: n.location,
    kind: n.type,
    coordinates: n.coordinates,
  }));

const CompanySchema = z
  .object({
    name: z.string().trim().min(1),
    ticker: z.string().trim().min(1).toUpperCase(),
    risk_keywords: z.array(z.string().trim().min(1)).default([]),
    supply_chain_nodes: z.array(SupplyNodeSchema).default([]),
  })
  .transform(
    (c): Company => ({
      name: c.name,
      ticker: c.ticker,
      keywords: c.risk_keywords,
      nodes: c.supply_chain_nodes,
    })
  );

const CompaniesFileSchema = z.object({
  target_companies: z.array(CompanySchema).min(1),
});

/** Validate an already-parsed companies document. */
export function parseCompanies(doc: unknown): Company[] {
  const parsed = CompaniesFileSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid company config: ${issues}`);
  }
  return parsed.data.target_companies;
}

/** Read and validate the static topology file. Missing/invalid = fatal. */
export function loadCompanies(path: string): Company[] {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`company config not found at ${path}`, {
      cause: err,
    });
  }
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`company config at ${path} is not valid JSON`, {
      cause: err,
    });
  }
  const companies = parseCompanies(doc);
  log.info("[CONFIG] companies loaded", { path, count: companies.length });
  return companies;
}

/**
 * Narrow the configured companies to the requested names/tickers
 * (case-insensitive). Unknown requests get a minimal ad-hoc entry so
 * the pipeline still runs for them.
 */
export function selectCompanies(
  all: Company[],
  requested?: string[]
): Company[] {
  if (!requested?.length) return all;

  const wanted = new Set(requested.map((r) => r.trim().toLowerCase()));
  const picked = all.filter(
    (c) => wanted.has(c.name.toLowerCase()) || wanted.has(c.ticker.toLowerCase())
  );

  for (const name of requested) {
    const key = name.trim().toLowerCase();
    if (!key) continue;
    const known = picked.some(
      (c) => c.name.toLowerCase() === key || c.ticker.toLowerCase() === key
    );
    if (known) continue;
    log.warn("[CONFIG] unknown company, running without topology", { name });
    picked.push({
      name: name.trim(),
      ticker: name.trim().toUpperCase().slice(0, 4),
      keywords: ["supply chain", "disruption"],
      nodes: [],
    });
  }
  return picked;
}
