import OpenAI from "openai";
import type { RateGate } from "../rateLimit.js";

export type ChatRequest = {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  /** Ask the endpoint for a JSON object response. */
  json?: boolean;
};

/** The only thing the gate and analyzer need from a reasoning endpoint. */
export interface ChatCompleter {
  complete(req: ChatRequest): Promise<string>;
}

/**
 * OpenAI-compatible chat endpoint (Groq by default). All calls share one
 * rate gate, so spacing holds across companies and callers.
 */
export class OpenAIChatCompleter implements ChatCompleter {
  private readonly client: OpenAI;

  constructor(
    opts: { apiKey: string; baseURL?: string; timeoutMs?: number },
    private readonly gate: RateGate
  ) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs ?? 60_000,
      maxRetries: 1,
    });
  }

  async complete(req: ChatRequest): Promise<string> {
    await this.gate.acquire();
    const resp = await this.client.chat.completions.create({
      model: req.model,
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.user },
      ],
      temperature: req.temperature,
      max_tokens: req.maxTokens,
      ...(req.json ? { response_format: { type: "json_object" as const } } : {}),
    });
    return resp.choices[0]?.message?.content?.trim() ?? "";
  }
}
