import type Database from "better-sqlite3";
import type { Config } from "./config.js";
import { openDatabase } from "./db/database.js";
import { EdgeDB } from "./db/EdgeDB.js";
import { EventDB } from "./db/EventDB.js";
import { SupplyGraph } from "./graph/SupplyGraph.js";
import { log, setLogLevel } from "./logger.js";
import type { NotificationChannel } from "./notify/channel.js";
import { ConsoleChannel } from "./notify/console.js";
import { DiscordChannel } from "./notify/discord.js";
import { NotificationRouter } from "./notify/router.js";
import { LlmRiskAnalyzer } from "./pipeline/analyze.js";
import { LlmRelevanceGate } from "./pipeline/gate.js";
import { OpenAIChatCompleter, type ChatCompleter } from "./pipeline/llm.js";
import { Orchestrator } from "./pipeline/orchestrator.js";
import { createSignalSources } from "./providers/index.js";
import { rateGateFor } from "./rateLimit.js";

export type Pipeline = {
  orchestrator: Orchestrator;
  events: EventDB;
  graph: SupplyGraph;
  db: Database.Database;
  close: () => void;
};

function createChatCompleter(config: Config): ChatCompleter | null {
  if (config.DRY_RUN) return null;
  if (!config.LLM_API_KEY) {
    log.warn("[APP] LLM_API_KEY missing, gate and analyzer run in dry mode");
    return null;
  }
  return new OpenAIChatCompleter(
    { apiKey: config.LLM_API_KEY, baseURL: config.LLM_BASE_URL },
    rateGateFor("llm", config.LLM_MIN_INTERVAL_MS)
  );
}

function createChannels(config: Config): NotificationChannel[] {
  const channels: NotificationChannel[] = [new ConsoleChannel()];
  if (config.DISCORD_BOT_TOKEN && config.DISCORD_CHANNEL_ID) {
    channels.push(new DiscordChannel(config.DISCORD_BOT_TOKEN, config.DISCORD_CHANNEL_ID));
  }
  return channels;
}

/** Wire the store, sources, reasoning steps and channels into one orchestrator. */
export function buildPipeline(config: Config): Pipeline {
  setLogLevel(config.LOG_LEVEL);
  const db = openDatabase(config.DB_PATH);
  const events = new EventDB(db, { windowHours: config.DEDUP_WINDOW_HOURS });
  const graph = new SupplyGraph(new EdgeDB(db));
  const llm = createChatCompleter(config);
  const router = new NotificationRouter(events, createChannels(config));

  const orchestrator = new Orchestrator({
    sources: createSignalSources(config),
    gate: new LlmRelevanceGate(llm, config.GATE_MODEL),
    analyzer: new LlmRiskAnalyzer(llm, config.ANALYST_MODEL),
    store: events,
    router,
    graph,
  });

  log.info("[APP] pipeline ready", {
    db: config.DB_PATH,
    dryRun: config.DRY_RUN,
    channels: router.channelIds,
  });

  return { orchestrator, events, graph, db, close: () => db.close() };
}
