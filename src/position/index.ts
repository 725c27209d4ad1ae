/**
 * Position Module - Public API
 */

// Types
export type { Boundary, Direction, EstimatorSettings } from "./schema.js";

export { DIRECTION } from "./schema.js";

// Pure transformations
export {
  advancePosition,
  boundaryAt,
  clampPosition,
  computeIncrement,
  isInterior,
} from "./transform.js";
