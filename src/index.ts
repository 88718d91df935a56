#!/usr/bin/env node
import axios from "axios";
import * as cron from "node-cron";
import { ConfigError, loadConfigFromEnvironment, type AppConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { runMonitorOnce, type MonitorDeps } from "./monitor.js";
import { PushNotifier } from "./notifier.js";
import { FileCursorStore } from "./store.js";

function buildDeps(config: AppConfig, logger: Logger): MonitorDeps {
  const http = axios.create();
  return {
    config,
    http,
    logger,
    store: new FileCursorStore(config.CURSOR_PATH, logger),
    notifier: new PushNotifier({
      http,
      logger,
      endpoint: config.NOTIFY_ENDPOINT,
      channelToken: config.NOTIFY_CHANNEL_TOKEN,
      recipientId: config.NOTIFY_RECIPIENT_ID,
      timeoutMs: config.SEND_TIMEOUT_MS,
    }),
  };
}

function schedule(expression: string, deps: MonitorDeps): void {
  const { logger } = deps;
  let running = false;

  cron.schedule(expression, async () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    logger.info({ at: new Date().toISOString() }, "Scheduled run started");
    try {
      await runMonitorOnce(deps);
      logger.info("Scheduled run completed");
    } catch (err) {
      logger.error({ err }, "Scheduled run error");
    } finally {
      running = false;
    }
  });
}

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const logger = createLogger(config.LOG_LEVEL);
  if (config.CRON_SCHEDULE && !cron.validate(config.CRON_SCHEDULE)) {
    throw new ConfigError(["CRON_SCHEDULE: not a valid cron expression"]);
  }
  const deps = buildDeps(config, logger);

  logger.info({ profile: config.PROFILE_URL, schedule: config.CRON_SCHEDULE ?? null }, "Post notifier starting");

  if (!config.CRON_SCHEDULE) {
    await runMonitorOnce(deps);
    return;
  }

  // Run immediately at startup, then on the schedule
  try {
    await runMonitorOnce(deps);
    logger.info("Initial run completed");
  } catch (err) {
    logger.error({ err }, "Initial run error");
  }
  schedule(config.CRON_SCHEDULE, deps);
}

main().catch((e: unknown) => {
  createLogger("fatal").fatal({ err: e }, "Fatal");
  process.exitCode = 1;
});
