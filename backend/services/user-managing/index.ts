// backend/services/user-managing/index.ts
/**
 * Start-up: load env → validate config → init logger → assemble app → listen.
 * Any failure before the server is listening exits with code 1.
 */

import { SERVICE_NAME, loadServiceEnv, parseListenArgs } from "./src/bootstrap";
import { describeConfig, loadConfig } from "./src/config";
import { createApp } from "./src/app";
import { initLogger, logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  const listen = parseListenArgs(process.argv.slice(2));
  const envFiles = loadServiceEnv();
  const config = loadConfig();
  const log = initLogger({ service: SERVICE_NAME, level: config.logLevel });

  log.info({ envFiles, config: describeConfig(config) }, "configuration loaded");

  const { app } = createApp(config);
  await startHttpService({
    app,
    port: listen.port ?? config.port,
    host: listen.host ?? "0.0.0.0",
    serviceName: SERVICE_NAME,
    logger: log,
  });
}

start().catch((err: unknown) => {
  logger.fatal({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
