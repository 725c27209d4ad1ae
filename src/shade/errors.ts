/**
 * Shade Module - Error Types
 *
 * Typed error unions for shade control.
 * Errors are values, not exceptions.
 */
import { type BusError, formatBusError } from "../mqtt/index.js";
import type { RelaySnapshot } from "../relays/index.js";
import type { ShadeState } from "./schema.js";

/**
 * Errors that can occur while driving a shade.
 */
export type ShadeError =
  | {
      readonly type: "RELAY_NOT_RESPONDING";
      readonly shade: string;
      readonly target: ShadeState;
      readonly timeoutMs: number;
      readonly observed: RelaySnapshot;
    }
  | {
      readonly type: "BUS_FAILURE";
      readonly shade: string;
      readonly cause: BusError;
    }
  | {
      readonly type: "INTERNAL_ERROR";
      readonly shade: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "ABORTED";
      readonly shade: string;
    };

/**
 * Create a RELAY_NOT_RESPONDING error.
 */
export function relayNotResponding(
  shade: string,
  target: ShadeState,
  timeoutMs: number,
  observed: RelaySnapshot,
): ShadeError {
  return { type: "RELAY_NOT_RESPONDING", shade, target, timeoutMs, observed };
}

/**
 * Create a BUS_FAILURE error.
 */
export function busFailure(shade: string, cause: BusError): ShadeError {
  return { type: "BUS_FAILURE", shade, cause };
}

/**
 * Create an INTERNAL_ERROR from anything thrown.
 */
export function internalError(shade: string, thrown: unknown): ShadeError {
  if (thrown instanceof Error) {
    return { type: "INTERNAL_ERROR", shade, message: thrown.message, cause: thrown };
  }
  return { type: "INTERNAL_ERROR", shade, message: String(thrown) };
}

/**
 * Create an ABORTED error.
 */
export function aborted(shade: string): ShadeError {
  return { type: "ABORTED", shade };
}

/**
 * Only relay timeouts and shutdown leave the controller usable.
 */
export function isFatalShadeError(error: ShadeError): boolean {
  return error.type === "BUS_FAILURE" || error.type === "INTERNAL_ERROR";
}

/**
 * Format a ShadeError for logging.
 */
export function formatShadeError(error: ShadeError): string {
  switch (error.type) {
    case "RELAY_NOT_RESPONDING":
      return `Shade ${error.shade}: relay not responding, no feedback for ${error.target} within ${error.timeoutMs}ms (open=${error.observed.open}, close=${error.observed.close})`;
    case "BUS_FAILURE":
      return `Shade ${error.shade}: ${formatBusError(error.cause)}`;
    case "INTERNAL_ERROR":
      return `Shade ${error.shade}: internal error: ${error.message}`;
    case "ABORTED":
      return `Shade ${error.shade}: aborted`;
  }
}
