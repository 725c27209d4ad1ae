/**
 * Supervisor Module - Service Layer
 *
 * Owns the bus connection and one controller per configured shade.
 * The cover mapping is validated before any connection is attempted;
 * a lost connection terminates every controller.
 */
import { type Result, err, ok } from "neverthrow";

import {
  formatCoverConfigError,
  toShadeMappings,
  validateCoverConfig,
} from "../cover-config/index.js";
import { createLogger } from "../logger.js";
import { type MessageBus, formatBusError } from "../mqtt/index.js";
import {
  type CoverCommand,
  type ShadeController,
  type ShadeSnapshot,
  busFailure,
  createShadeController,
} from "../shade/index.js";
import type { SupervisorError } from "./errors.js";
import {
  alreadyRunning,
  busUnavailable,
  invalidCoverConfig,
  shadeFailed,
  unknownShade,
} from "./errors.js";
import type { SupervisorOptions } from "./schema.js";

const log = createLogger("supervisor");

// =============================================================================
// Module State
// =============================================================================

let bus: MessageBus | null = null;
let controllers = new Map<string, ShadeController>();

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Validate the cover mapping, connect the bus and start every shade.
 *
 * @returns Names of the started shades
 */
export async function startSupervisor(
  options: SupervisorOptions,
): Promise<Result<readonly string[], SupervisorError>> {
  if (bus !== null) return err(alreadyRunning());

  const validated = validateCoverConfig(options.rawCoverConfig);
  if (validated.isErr()) {
    log.error(
      { error: formatCoverConfigError(validated.error) },
      "Cover config rejected, not connecting",
    );
    return err(invalidCoverConfig(validated.error));
  }

  const mappings = toShadeMappings(validated.value);
  log.info(
    {
      shades: mappings.map(
        (m) => `${m.name} (open=${m.openRelay}, close=${m.closeRelay})`,
      ),
    },
    `Cover config valid: ${mappings.length} shade(s)`,
  );

  const connected = await options.connectBus();
  if (connected.isErr()) {
    log.error(
      { error: formatBusError(connected.error) },
      "Failed to connect message bus",
    );
    return err(busUnavailable(connected.error));
  }

  const activeBus = connected.value;
  const created = new Map<string, ShadeController>();
  for (const mapping of mappings) {
    created.set(
      mapping.name,
      createShadeController({
        settings: { ...options.defaults, ...mapping },
        bus: activeBus,
      }),
    );
  }

  bus = activeBus;
  controllers = created;

  activeBus.onConnectionLost((error) => {
    log.fatal(
      { error: formatBusError(error) },
      "Message bus connection lost, terminating all shades",
    );
    for (const controller of created.values()) {
      controller.terminate(busFailure(controller.name, error));
    }
  });

  for (const controller of created.values()) {
    const started = await controller.start();
    if (started.isErr()) {
      await stopSupervisor();
      return err(shadeFailed(started.error));
    }
  }

  const names = [...created.keys()];
  log.info({ shades: names }, "All shades started");
  return ok(names);
}

/**
 * Resolve with the first fatal shade failure, or ok once every
 * controller has stopped.
 */
export function waitForShutdown(): Promise<Result<void, SupervisorError>> {
  const active = [...controllers.values()];
  if (active.length === 0) return Promise.resolve(ok(undefined));

  return new Promise((resolve) => {
    let remaining = active.length;
    for (const controller of active) {
      void controller.done.then((result) => {
        if (result.isErr()) {
          resolve(err(shadeFailed(result.error)));
          return;
        }
        remaining -= 1;
        if (remaining === 0) resolve(ok(undefined));
      });
    }
  });
}

/**
 * Stop every controller and close the bus. Pending feedback waits end
 * immediately; no shade has to reach a resting state first.
 */
export async function stopSupervisor(): Promise<void> {
  const activeBus = bus;
  const active = [...controllers.values()];
  bus = null;
  controllers = new Map();

  for (const controller of active) {
    controller.stop();
  }
  if (activeBus) {
    await activeBus.disconnect();
  }
  log.info({ shades: active.length }, "Supervisor stopped");
}

// =============================================================================
// Status Queries and Commands
// =============================================================================

export function getShadeSnapshots(): ShadeSnapshot[] {
  return [...controllers.values()].map((controller) => controller.getSnapshot());
}

export function getShadeSnapshot(name: string): ShadeSnapshot | null {
  return controllers.get(name)?.getSnapshot() ?? null;
}

/**
 * Queue a command for a shade, exactly as if it arrived on the bus.
 */
export function dispatchShadeCommand(
  name: string,
  command: CoverCommand,
): Result<void, SupervisorError> {
  const controller = controllers.get(name);
  if (!controller) return err(unknownShade(name));

  log.info({ shade: name, command }, "Command from status API");
  controller.dispatchCommand(command);
  return ok(undefined);
}

export function isBusConnected(): boolean {
  return bus?.isConnected() ?? false;
}
