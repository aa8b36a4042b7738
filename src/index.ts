#!/usr/bin/env node
import { randomUUID } from "crypto";
import { IbkrBroker } from "./broker/ibkr.js";
import { config } from "./config.js";
import { assertConfig } from "./config-validator.js";
import { Store } from "./db/store.js";
import { FatalConfig, errorMessage } from "./errors.js";
import { UnusualWhalesClient } from "./flow/client.js";
import { loadExcludedTickers } from "./flow/excluded.js";
import { logger, pruneOldLogs } from "./logging.js";
import { YahooMarketData } from "./market/yahoo.js";
import { WebhookNotifier } from "./notify/webhook.js";
import { AnthropicOracle } from "./oracle/anthropic.js";
import { Scheduler } from "./scheduler.js";

async function main() {
  const sessionId = randomUUID();
  logger.info({ sessionId, shadowMode: config.shadowMode, pid: process.pid }, "flow-gate starting");

  const validation = assertConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);

  pruneOldLogs();

  const store = new Store(config.db.path);
  const broker = new IbkrBroker(config.broker);
  try {
    await broker.connect();
    logger.info("Broker connected");
  } catch (e: unknown) {
    // The connection keeps retrying in the background; cycles record broker failures until it is up.
    logger.warn({ err: errorMessage(e) }, "Broker not available at startup");
  }

  const scheduler = new Scheduler({
    flow: new UnusualWhalesClient({
      apiKey: config.flow.apiKey,
      baseUrl: config.flow.baseUrl,
      timeoutMs: config.flow.requestTimeoutMs,
      minPremium: config.flow.minPremium,
      limit: config.flow.fetchLimit,
    }),
    market: new YahooMarketData({ timeoutMs: config.scheduler.fetchTimeoutMs }),
    broker,
    oracle: new AnthropicOracle(config.oracle),
    notifier: new WebhookNotifier({ url: config.notify.webhookUrl, dedupWindowMs: config.notify.dedupWindowMs }),
    store,
    config,
    excluded: loadExcludedTickers(),
    sessionId,
  });
  scheduler.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    await scheduler.stop();
    broker.disconnect();
    store.close();
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e: unknown) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown().catch((e: unknown) => logger.error({ err: e }, "Shutdown error")); });

  // Transient broker/network errors can surface through timer callbacks; log and keep running.
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err: unknown) => {
  if (err instanceof FatalConfig) {
    for (const e of err.errors) logger.error(e);
    logger.fatal("Configuration invalid; not starting");
  } else {
    logger.fatal({ err }, "Fatal error");
  }
  process.exit(1);
});
