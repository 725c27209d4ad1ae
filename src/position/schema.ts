/**
 * Position Module - Schemas and Types
 *
 * Open-loop position estimate: 0 is fully closed, maxPosition fully open.
 */

/**
 * Sign applied to the increment on every tick.
 */
export const DIRECTION = {
  opening: 1,
  closing: -1,
  stopped: 0,
} as const;

export type Direction = (typeof DIRECTION)[keyof typeof DIRECTION];

/**
 * Which end of travel the estimate has reached.
 */
export type Boundary = "open" | "closed";

export type EstimatorSettings = Readonly<{
  maxPosition: number;
  tickIntervalMs: number;
  maxTravelTimeMs: number;
}>;
