/**
 * Shade Relay Controller - Application Entry Point
 *
 * - Loads and validates the cover mapping
 * - Connects to the MQTT broker and starts one controller per shade
 * - Serves the status API (request ID tracing, global error handling)
 * - Exits non-zero on the first fatal shade failure
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { routes } from "./api/routes.js";
import { config, getMqttConfig, getShadeDefaults } from "./config.js";
import { formatCoverConfigError, readCoverConfigFile } from "./cover-config/index.js";
import { createLogger } from "./logger.js";
import { connectMqttBus } from "./mqtt/index.js";
import {
  formatSupervisorError,
  startSupervisor,
  stopSupervisor,
  waitForShutdown,
} from "./supervisor/index.js";

const log = createLogger("api");

// =============================================================================
// CONFIGURATION SUMMARY
// =============================================================================

const defaults = getShadeDefaults();
const mqttConfig = getMqttConfig();

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    mqttBroker: mqttConfig.brokerUrl,
    mqttClientId: mqttConfig.clientId ?? "(generated)",
    coverBaseTopic: defaults.coverBaseTopic,
    relayBaseTopic: defaults.relayBaseTopic,
    tickIntervalMs: defaults.tickIntervalMs,
    maxTravelTimeMs: defaults.maxTravelTimeMs,
    maxPosition: defaults.maxPosition,
    feedbackTimeoutMs: defaults.feedbackTimeoutMs ?? "disabled",
    shadesConfig: config.SHADES_CONFIG_PATH,
  },
  "Configuration loaded",
);

// =============================================================================
// SHADES
// =============================================================================

const rawCoverConfig = await readCoverConfigFile(config.SHADES_CONFIG_PATH);
if (rawCoverConfig.isErr()) {
  log.fatal({ error: formatCoverConfigError(rawCoverConfig.error) }, "Cannot load cover config");
  process.exit(1);
}

const started = await startSupervisor({
  rawCoverConfig: rawCoverConfig.value,
  defaults,
  connectBus: () => connectMqttBus(mqttConfig),
});
if (started.isErr()) {
  log.fatal({ error: formatSupervisorError(started.error) }, "Startup failed");
  process.exit(1);
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", routes);

const server = serve({
  fetch: app.fetch,
  port: config.PORT,
  hostname: "0.0.0.0",
});

log.info(
  { port: config.PORT, shades: started.value },
  `🚀 Shade controller listening on port ${config.PORT}`,
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string, exitCode: number) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  await stopSupervisor();
  server.close();

  log.info("Shutdown complete");
  process.exit(exitCode);
};

process.on("SIGTERM", () => void shutdown("SIGTERM", 0));
process.on("SIGINT", () => void shutdown("SIGINT", 0));

const outcome = await waitForShutdown();
if (outcome.isErr()) {
  log.fatal({ error: formatSupervisorError(outcome.error) }, "Shade controller failed");
  await shutdown("FATAL", 1);
}
