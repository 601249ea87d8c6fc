import { createHash } from "crypto";
import { errMessage, log } from "../logger.js";
import type { NewsItem } from "../types.js";
import type { ChatCompleter } from "./llm.js";

const SYSTEM_PROMPT =
  "You are a fast triage assistant for a supply-chain risk monitoring system. " +
  "Your ONLY job is to decide if a news article is directly relevant to " +
  "supply-chain disruption, manufacturing delays, logistics problems, " +
  "or significant financial risk for a specific company. " +
  "Answer with a single word: YES or NO. No explanation.";

function userPrompt(company: string, headline: string, summary: string) {
  return [
    `Analyze this news headline and summary for supply chain or financial risk relevance to ${company}.`,
    "",
    `Headline: ${headline}`,
    `Summary: ${summary}`,
    "",
    `Is this directly relevant to supply chain disruption, manufacturing delays, or significant financial risk for ${company}?`,
    'Answer ONLY with "YES" or "NO". No explanation.',
  ].join("\n");
}

export type GateVerdict = {
  pass: boolean;
  /** True when the classifier failed and the item was admitted by default. */
  failedOpen: boolean;
};

export interface RelevanceGate {
  evaluate(company: string, headline: string, summary: string): Promise<GateVerdict>;
}

/** Leading YES/NO word of a classifier answer; anything else is unclear. */
export function readVerdict(answer: string): "yes" | "no" | "unclear" {
  const word = /^[^A-Za-z]*([A-Za-z]+)/.exec(answer)?.[1]?.toUpperCase();
  if (word === "YES") return "yes";
  if (word === "NO") return "no";
  return "unclear";
}

/** Deterministic ~30% pass rate for offline runs. */
export function dryRunVerdict(headline: string): boolean {
  const digest = createHash("md5").update(headline).digest();
  return digest.readUInt32BE(digest.length - 4) % 10 < 3;
}

/**
 * Binary relevance classifier in front of the analyzer.
 * Fail-open: a failed or unclear classification admits the item and
 * is reported as `failedOpen`.
 */
export class LlmRelevanceGate implements RelevanceGate {
  constructor(
    private readonly llm: ChatCompleter | null,
    private readonly model: string
  ) {}

  async evaluate(company: string, headline: string, summary: string): Promise<GateVerdict> {
    if (!this.llm) {
      const pass = dryRunVerdict(headline);
      log.info("[GATE] dry run", { headline: headline.slice(0, 60), pass });
      return { pass, failedOpen: false };
    }

    try {
      const answer = await this.llm.complete({
        model: this.model,
        system: SYSTEM_PROMPT,
        user: userPrompt(company, headline, summary),
        temperature: 0,
        maxTokens: 5,
      });
      const verdict = readVerdict(answer);
      if (verdict === "unclear") {
        log.warn("[GATE] unclear answer, admitting", { company, answer: answer.slice(0, 40) });
        return { pass: true, failedOpen: true };
      }
      const pass = verdict === "yes";
      log.info("[GATE] verdict", { company, headline: headline.slice(0, 50), pass });
      return { pass, failedOpen: false };
    } catch (err) {
      log.error("[GATE] classifier error, admitting", { company, error: errMessage(err) });
      return { pass: true, failedOpen: true };
    }
  }

  async admits(company: string, headline: string, summary: string): Promise<boolean> {
    return (await this.evaluate(company, headline, summary)).pass;
  }
}

/** Filter a batch sequentially; counts fail-open verdicts for the caller. */
export async function triage(
  gate: RelevanceGate,
  company: string,
  items: NewsItem[]
): Promise<{ admitted: NewsItem[]; failedOpen: number }> {
  const admitted: NewsItem[] = [];
  let failedOpen = 0;
  for (const item of items) {
    const verdict = await gate.evaluate(company, item.title, item.description);
    if (verdict.failedOpen) failedOpen++;
    if (verdict.pass) admitted.push(item);
  }
  log.info("[GATE] batch", { company, passed: admitted.length, total: items.length });
  return { admitted, failedOpen };
}
