#!/usr/bin/env node
import { parseArgs } from "node:util";
import { buildPipeline } from "./app.js";
import { loadCompanies, selectCompanies } from "./companies.js";
import { cfg } from "./config.js";
import { ConfigError } from "./errors.js";
import { errMessage, log } from "./logger.js";
import { Scheduler } from "./monitor/Scheduler.js";
import { statusFileWriter } from "./monitor/statusFile.js";

const USAGE = "usage: run_monitor [--once] [--interval <minutes>] [company ...]";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      once: { type: "boolean", default: false },
      interval: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const intervalMinutes =
    values.interval === undefined ? cfg.MONITOR_INTERVAL_MINUTES : Number(values.interval);
  if (!Number.isFinite(intervalMinutes) || intervalMinutes <= 0) {
    throw new ConfigError(`--interval must be a positive number of minutes, got ${values.interval}`);
  }

  const companies = selectCompanies(loadCompanies(cfg.COMPANIES_PATH), positionals);
  const pipeline = buildPipeline(cfg);

  try {
    if (values.once) {
      await pipeline.orchestrator.run(companies);
      return 0;
    }

    const scheduler = new Scheduler((list, opts) => pipeline.orchestrator.run(list, opts), {
      watchlist: companies,
      intervalMs: intervalMinutes * 60_000,
      onStatus: statusFileWriter(cfg.STATUS_PATH),
    });
    const onSignal = () => scheduler.stop();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    await scheduler.start();
    return 0;
  } finally {
    pipeline.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ConfigError) log.error("[CONFIG]", err.message);
    else log.error("[FATAL]", errMessage(err));
    process.exitCode = 2;
  }
);
