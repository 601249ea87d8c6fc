import { z } from "zod";
import { DecodeError } from "../errors.js";
import { errMessage, log } from "../logger.js";
import { SEVERITIES, type RiskAssessment, type RiskSignals } from "../types.js";
import type { ChatCompleter } from "./llm.js";

const SYSTEM_PROMPT =
  "You are a Senior Supply Chain Risk Consultant. You correlate " +
  "multi-source signals (news, stock movement, weather) and produce " +
  "a structured risk assessment. Always respond in valid JSON.";

function userPrompt(s: RiskSignals): string {
  return `Analyze the following correlated signals:

COMPANY: ${s.company}
SUPPLY CHAIN NODE: ${s.nodeLocation} (${s.nodeType})
NEWS: ${s.headline} - ${s.summary}
STOCK MOVEMENT: ${s.volatility}% change in last trading session
WEATHER CONDITIONS: ${s.weatherDescription} (severity: ${s.weatherSeverity})

TASK:
1. Correlate these signals and estimate business impact (revenue at risk, timeline)
2. Assess severity: HIGH (RED), MEDIUM (YELLOW), or LOW (GREEN)
3. Provide reasoning in 2-3 sentences
4. Suggest 3 mitigation strategies

Respond ONLY with a JSON object:
{
  "severity": "RED|YELLOW|GREEN",
  "impact_estimate": "string",
  "reasoning": "string",
  "mitigation_strategies": ["string", "string", "string"],
  "confidence_score": 0-100
}`;
}

const AssessmentSchema = z.object({
  severity: z
    .string()
    .transform((v) => v.trim().toUpperCase())
    .pipe(z.enum(SEVERITIES)),
  impact_estimate: z.string().trim().min(1),
  reasoning: z.string().trim().min(1),
  mitigation_strategies: z.array(z.string().trim().min(1)).min(1),
  confidence_score: z.number().min(0).max(100),
});

/** Strict decoder: a typed assessment or a DecodeError, nothing in between. */
export function decodeAssessment(raw: string): RiskAssessment {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError("analyzer output is not JSON", { cause: err });
  }
  const parsed = AssessmentSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new DecodeError(`analyzer output has wrong shape: ${issues}`);
  }
  const a = parsed.data;
  return {
    severity: a.severity,
    impactEstimate: a.impact_estimate,
    rationale: a.reasoning,
    mitigations: a.mitigation_strategies,
    confidence: a.confidence_score,
  };
}

/** Conservative default: the event is still recorded, flagged for review. */
export function fallbackAssessment(reason: string): RiskAssessment {
  return {
    severity: "YELLOW",
    impactEstimate: "Unable to fully assess; manual review recommended.",
    rationale: `Automated analysis encountered an error: ${reason}`,
    mitigations: [
      "Escalate to human analyst for manual review.",
      "Monitor news feed for follow-up developments.",
      "Review supply-chain contingency plans.",
    ],
    confidence: 20,
    fallbackReason: reason,
  };
}

const MOCK_ASSESSMENT: RiskAssessment = {
  severity: "YELLOW",
  impactEstimate:
    "Potential 5-10% revenue impact over next quarter if disruption persists.",
  rationale:
    "The headline indicates a moderate supply-chain concern. Stock movement " +
    "is within normal range and weather does not exacerbate the situation.",
  mitigations: [
    "Engage secondary supplier for critical components.",
    "Increase safety stock at regional distribution centres.",
    "Activate business continuity communication plan with key stakeholders.",
  ],
  confidence: 62,
};

export interface RiskAnalyzer {
  /** Never rejects: failures come back as the fallback assessment. */
  analyze(signals: RiskSignals): Promise<RiskAssessment>;
}

export class LlmRiskAnalyzer implements RiskAnalyzer {
  constructor(
    private readonly llm: ChatCompleter | null,
    private readonly model: string
  ) {}

  async analyze(signals: RiskSignals): Promise<RiskAssessment> {
    if (!this.llm) {
      log.info("[ANALYST] dry run, mock assessment", {
        headline: signals.headline.slice(0, 60),
      });
      return { ...MOCK_ASSESSMENT, mitigations: [...MOCK_ASSESSMENT.mitigations] };
    }

    try {
      const raw = await this.llm.complete({
        model: this.model,
        system: SYSTEM_PROMPT,
        user: userPrompt(signals),
        temperature: 0.3,
        maxTokens: 1024,
        json: true,
      });
      const assessment = decodeAssessment(raw);
      log.info("[ANALYST] assessment", {
        company: signals.company,
        severity: assessment.severity,
        confidence: assessment.confidence,
      });
      return assessment;
    } catch (err) {
      log.error("[ANALYST] falling back to default assessment", {
        company: signals.company,
        error: errMessage(err),
      });
      return fallbackAssessment(errMessage(err));
    }
  }
}
