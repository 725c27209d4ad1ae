/**
 * Status API routes.
 *
 * - /api/health - liveness and bus connectivity
 * - /api/shades - snapshots of every shade
 * - /api/shades/:name - one shade
 * - /api/shades/:name/command - queue OPEN, CLOSE or STOP
 */
import { Hono } from "hono";
import { z } from "zod";

import { createLogger } from "../logger.js";
import { CoverCommandSchema } from "../shade/index.js";
import {
  dispatchShadeCommand,
  formatSupervisorError,
  getShadeSnapshot,
  getShadeSnapshots,
  isBusConnected,
} from "../supervisor/index.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

const CommandBodySchema = z.object({
  command: CoverCommandSchema,
});

export const routes = new Hono();

// =============================================================================
// Health Check
// =============================================================================

routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  return c.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    requestId,
    version: APP_VERSION,
    mqttConnected: isBusConnected(),
    shades: getShadeSnapshots().length,
  });
});

// =============================================================================
// Shade Status
// =============================================================================

routes.get("/api/shades", (c) => {
  const requestId = c.get("requestId");
  return c.json({ shades: getShadeSnapshots(), requestId });
});

routes.get("/api/shades/:name", (c) => {
  const requestId = c.get("requestId");
  const name = c.req.param("name");

  const snapshot = getShadeSnapshot(name);
  if (!snapshot) {
    return c.json({ error: "Shade not found", requestId }, 404);
  }
  return c.json(snapshot);
});

// =============================================================================
// Shade Commands
// =============================================================================

/**
 * Queue a command. Accepted means queued, not executed: the shade state
 * changes once relay feedback confirms it.
 */
routes.post("/api/shades/:name/command", async (c) => {
  const requestId = c.get("requestId");
  const name = c.req.param("name");

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    body = null;
  }

  const parsed = CommandBodySchema.safeParse(body);
  if (!parsed.success) {
    log.warn({ requestId, shade: name }, "Rejected invalid command body");
    return c.json(
      {
        error: "Invalid command",
        issues: parsed.error.issues.map((issue) => issue.message),
        requestId,
      },
      400,
    );
  }

  const { command } = parsed.data;
  const result = dispatchShadeCommand(name, command);
  if (result.isErr()) {
    log.warn(
      { requestId, error: formatSupervisorError(result.error) },
      "Command rejected",
    );
    return c.json({ error: "Shade not found", requestId }, 404);
  }

  log.info({ requestId, shade: name, command }, `POST ${command} queued`);
  return c.json({ accepted: true, shade: name, command, requestId }, 202);
});
