/**
 * @redpacket/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { parseBalance } from "@redpacket/ledger";
import { loadConfig, parseApiKeys, parseGenesisBalances } from "./config.js";
import { createApp } from "./app.js";
import { IntervalClock } from "./clock.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode (X-Account-Id)");
  }

  const genesis =
    config.GENESIS_TIME !== undefined ? Date.parse(config.GENESIS_TIME) : Date.now();
  const genesisBalances = parseGenesisBalances(config.GENESIS_BALANCES);

  const { app, service } = createApp({
    serviceConfig: {
      clock: new IntervalClock({ genesis, blockTimeMs: config.BLOCK_TIME_MS }),
      existentialDeposit: parseBalance(config.EXISTENTIAL_DEPOSIT),
      genesisBalances,
      unknownPacket: config.UNKNOWN_PACKET_POLICY,
      logger: logger.child({ module: "redpacket" }),
    },
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      blockTimeMs: config.BLOCK_TIME_MS,
      blockNumber: service.blockNumber(),
      genesisAccounts: genesisBalances.length,
    },
    "Red packet node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
