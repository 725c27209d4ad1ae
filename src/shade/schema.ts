/**
 * Shade Module - Schemas and Types
 *
 * Logical state, commands and settings of one two-relay shade.
 */
import { z } from "zod";

import type { Direction } from "../position/index.js";
import type { RelayRole, RelaySnapshot } from "../relays/index.js";

// =============================================================================
// Commands
// =============================================================================

/**
 * Cover command payload.
 * Topic: {cover_base}/cover/{shade}/set
 */
export const CoverCommandSchema = z.enum(["OPEN", "CLOSE", "STOP"]);

export type CoverCommand = z.infer<typeof CoverCommandSchema>;

// =============================================================================
// Logical State
// =============================================================================

/**
 * Controller's belief about motion, committed only after relay feedback.
 */
export const ShadeStateSchema = z.enum(["stopped", "opening", "closing"]);

export type ShadeState = z.infer<typeof ShadeStateSchema>;

/**
 * Payloads published on {cover_base}/cover/{shade}/state.
 * "open" and "closed" are inferred from the position estimate.
 */
export type CoverStatePayload = "opening" | "closing" | "open" | "closed";

/**
 * One relay write issued during a transition.
 */
export type RelayWrite = Readonly<{
  role: RelayRole;
  on: boolean;
}>;

// =============================================================================
// Settings
// =============================================================================

export type ShadeSettings = Readonly<{
  name: string;
  openRelay: string;
  closeRelay: string;
  coverBaseTopic: string;
  relayBaseTopic: string;
  tickIntervalMs: number;
  maxTravelTimeMs: number;
  maxPosition: number;
  /** null waits for relay feedback forever */
  feedbackTimeoutMs: number | null;
}>;

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Recorded when relays did not confirm a transition in time.
 * Cleared by the next confirmed transition.
 */
export type ShadeFault = Readonly<{
  type: "RELAY_NOT_RESPONDING";
  target: ShadeState;
  timeoutMs: number;
  observed: RelaySnapshot;
  since: number;
}>;

/**
 * Read-only view of a shade.
 */
export type ShadeSnapshot = Readonly<{
  name: string;
  openRelay: string;
  closeRelay: string;
  state: ShadeState;
  direction: Direction;
  position: number;
  maxPosition: number;
  relays: RelaySnapshot;
  fault: ShadeFault | null;
}>;
