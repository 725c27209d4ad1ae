/**
 * Shade Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  CoverCommand,
  CoverStatePayload,
  RelayWrite,
  ShadeFault,
  ShadeSettings,
  ShadeSnapshot,
  ShadeState,
} from "./schema.js";
export type { ShadeError } from "./errors.js";

export { CoverCommandSchema } from "./schema.js";

// Error utilities
export { busFailure, formatShadeError, isFatalShadeError } from "./errors.js";

// Service
export { createShadeController } from "./service.js";
export type { ShadeController, ShadeControllerDeps } from "./service.js";

// Pure transformations
export {
  RELAY_TARGETS,
  boundaryPayload,
  directionFor,
  matchesTarget,
  parseCoverCommand,
  planTransition,
  relayWritesFor,
  statePayloadFor,
} from "./transform.js";
