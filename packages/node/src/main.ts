/**
 * @stellar-compass/node: Entry point.
 *
 * Loads `.env` and config, wires Horizon, prices and notification channels,
 * starts the HTTP server, and stops the agents on shutdown.
 */

import { config as loadEnv } from "dotenv";
import { serve } from "@hono/node-server";
import pino from "pino";
import {
  HorizonObserver,
  NETWORKS,
  StaticPriceOracle,
  parsePriceOverrides,
} from "@stellar-compass/horizon";
import {
  NodemailerEmailChannel,
  Notifier,
  TwilioSmsChannel,
} from "@stellar-compass/notifier";
import { loadConfig, parseCorsOrigins } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  loadEnv();
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const network = NETWORKS[config.STELLAR_NETWORK];
  const observer = new HorizonObserver({
    network,
    horizonUrl: config.HORIZON_URL,
    timeoutMs: config.HORIZON_TIMEOUT_MS,
  });
  await observer.connect();

  const email = new NodemailerEmailChannel({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    user: config.EMAIL_ADDRESS,
    password: config.EMAIL_PASSWORD,
  });
  const sms = new TwilioSmsChannel({
    accountSid: config.TWILIO_ACCOUNT_SID,
    authToken: config.TWILIO_AUTH_TOKEN,
    fromNumber: config.TWILIO_PHONE_NUMBER,
  });
  const notifier = new Notifier({
    email,
    sms,
    recipients: { email: config.USER_EMAIL, phone: config.USER_PHONE },
    logger,
    networkName: network.name,
  });

  if (!notifier.emailEnabled) {
    logger.warn("Email notifications disabled (EMAIL_ADDRESS / EMAIL_PASSWORD / USER_EMAIL)");
  }
  if (!notifier.smsEnabled) {
    logger.warn("SMS notifications disabled (TWILIO_* / USER_PHONE)");
  }

  const { app, agents } = createApp({
    serviceConfig: {
      network,
      observer,
      oracle: new StaticPriceOracle(parsePriceOverrides(config.PRICE_OVERRIDES)),
      notifier,
      logger,
      idleThresholdDays: config.IDLE_THRESHOLD_DAYS,
      defaultRiskTolerance: config.DEFAULT_RISK_TOLERANCE,
    },
    logFn: (entry) => {
      const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
      logger[level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    corsOrigins: parseCorsOrigins(config.CORS_ORIGINS),
    agentIntervalMs: config.AGENT_INTERVAL_MS,
    agentDefaults: {
      phoneNumber: config.USER_PHONE,
      smsNotifications: notifier.smsEnabled,
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, network: network.name },
    "Stellar Compass API started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    agents.stopAll();
    server.close();
    await observer.disconnect();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
