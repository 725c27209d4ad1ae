/**
 * Relays Module - Error Types
 *
 * Typed error unions for feedback waits.
 * Errors are values, not exceptions.
 */
import type { RelaySnapshot } from "./schema.js";

/**
 * Errors that can end a wait for relay feedback.
 */
export type RelayWaitError =
  | {
      readonly type: "FEEDBACK_TIMEOUT";
      readonly timeoutMs: number;
      readonly observed: RelaySnapshot;
    }
  | {
      readonly type: "WAIT_ABORTED";
      readonly observed: RelaySnapshot;
    };

/**
 * Create a FEEDBACK_TIMEOUT error.
 */
export function feedbackTimeout(
  timeoutMs: number,
  observed: RelaySnapshot,
): RelayWaitError {
  return { type: "FEEDBACK_TIMEOUT", timeoutMs, observed };
}

/**
 * Create a WAIT_ABORTED error.
 */
export function waitAborted(observed: RelaySnapshot): RelayWaitError {
  return { type: "WAIT_ABORTED", observed };
}

/**
 * Format a RelayWaitError for logging.
 */
export function formatRelayWaitError(error: RelayWaitError): string {
  switch (error.type) {
    case "FEEDBACK_TIMEOUT":
      return `No relay feedback within ${error.timeoutMs}ms (open=${error.observed.open}, close=${error.observed.close})`;
    case "WAIT_ABORTED":
      return "Wait for relay feedback aborted";
  }
}
