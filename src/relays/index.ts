/**
 * Relays Module - Public API
 */

// Types
export type {
  RelayPayload,
  RelayPredicate,
  RelayRole,
  RelaySnapshot,
  WaitOptions,
} from "./schema.js";
export type { RelayWaitError } from "./errors.js";

export { INITIAL_RELAY_SNAPSHOT, RelayPayloadSchema } from "./schema.js";

// Error utilities
export { formatRelayWaitError } from "./errors.js";

// Service
export { createRelayTracker } from "./service.js";
export type { RelayTracker } from "./service.js";

// Pure transformations
export {
  applyRelayFeedback,
  isConflicting,
  parseRelayPayload,
  relayPayloadFor,
  snapshotsEqual,
} from "./transform.js";
