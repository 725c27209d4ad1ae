/**
 * Supervisor Module - Error Types
 */
import type { CoverConfigError } from "../cover-config/index.js";
import { formatCoverConfigError } from "../cover-config/index.js";
import type { BusError } from "../mqtt/index.js";
import { formatBusError } from "../mqtt/index.js";
import type { ShadeError } from "../shade/index.js";
import { formatShadeError } from "../shade/index.js";

export type SupervisorError =
  | {
      readonly type: "INVALID_COVER_CONFIG";
      readonly cause: CoverConfigError;
    }
  | {
      readonly type: "BUS_UNAVAILABLE";
      readonly cause: BusError;
    }
  | {
      readonly type: "SHADE_FAILED";
      readonly shade: string;
      readonly cause: ShadeError;
    }
  | {
      readonly type: "UNKNOWN_SHADE";
      readonly shade: string;
    }
  | {
      readonly type: "ALREADY_RUNNING";
    };

export function invalidCoverConfig(cause: CoverConfigError): SupervisorError {
  return { type: "INVALID_COVER_CONFIG", cause };
}

export function busUnavailable(cause: BusError): SupervisorError {
  return { type: "BUS_UNAVAILABLE", cause };
}

export function shadeFailed(cause: ShadeError): SupervisorError {
  return { type: "SHADE_FAILED", shade: cause.shade, cause };
}

export function unknownShade(shade: string): SupervisorError {
  return { type: "UNKNOWN_SHADE", shade };
}

export function alreadyRunning(): SupervisorError {
  return { type: "ALREADY_RUNNING" };
}

/**
 * Format a SupervisorError for logging.
 */
export function formatSupervisorError(error: SupervisorError): string {
  switch (error.type) {
    case "INVALID_COVER_CONFIG":
      return formatCoverConfigError(error.cause);
    case "BUS_UNAVAILABLE":
      return `Message bus unavailable: ${formatBusError(error.cause)}`;
    case "SHADE_FAILED":
      return formatShadeError(error.cause);
    case "UNKNOWN_SHADE":
      return `Unknown shade: ${error.shade}`;
    case "ALREADY_RUNNING":
      return "Supervisor is already running";
  }
}
