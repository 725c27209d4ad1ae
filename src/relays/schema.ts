/**
 * Relays Module - Schemas and Types
 *
 * Relay payloads and the observed relay pair of a shade.
 */
import { z } from "zod";

// =============================================================================
// Wire Payloads
// =============================================================================

/**
 * Relay set/state payload.
 * Topic: {relay_base}/relay/{relay_id}/set|state
 */
export const RelayPayloadSchema = z.enum(["ON", "OFF"]);

export type RelayPayload = z.infer<typeof RelayPayloadSchema>;

// =============================================================================
// Relay Pair
// =============================================================================

/**
 * Which of the shade's two relays.
 */
export type RelayRole = "open" | "close";

/**
 * Last reported ON/OFF state of both relays.
 */
export type RelaySnapshot = Readonly<{
  open: boolean;
  close: boolean;
}>;

/**
 * Relays are assumed OFF until feedback says otherwise.
 */
export const INITIAL_RELAY_SNAPSHOT: RelaySnapshot = {
  open: false,
  close: false,
};

export type RelayPredicate = (snapshot: RelaySnapshot) => boolean;

/**
 * Options for waiting on relay feedback.
 */
export type WaitOptions = Readonly<{
  /** Give up after this many ms; null waits forever */
  timeoutMs: number | null;
  signal?: AbortSignal;
}>;
