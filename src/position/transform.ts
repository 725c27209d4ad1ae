/**
 * Position Module - Pure Transformations
 *
 * Tick arithmetic for the position estimate. No timers here; the shade
 * controller owns the tick loop.
 */
import type { Boundary, Direction, EstimatorSettings } from "./schema.js";

/**
 * Round to the nearest integer, ties to the even neighbour (2.5 -> 2).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Position units travelled per tick.
 *
 * @example
 * computeIncrement({ maxPosition: 100, tickIntervalMs: 500, maxTravelTimeMs: 30000 })
 * // => 2
 */
export function computeIncrement(settings: EstimatorSettings): number {
  return roundHalfEven(
    (settings.maxPosition * settings.tickIntervalMs) / settings.maxTravelTimeMs,
  );
}

export function clampPosition(position: number, maxPosition: number): number {
  return Math.max(0, Math.min(maxPosition, position));
}

/**
 * Advance the estimate by one tick.
 */
export function advancePosition(
  position: number,
  direction: Direction,
  increment: number,
  maxPosition: number,
): number {
  return clampPosition(position + direction * increment, maxPosition);
}

/**
 * Strictly between the two ends of travel.
 */
export function isInterior(position: number, maxPosition: number): boolean {
  return position > 0 && position < maxPosition;
}

/**
 * Boundary the estimate sits on, if any.
 * Only meaningful while the shade is moving.
 */
export function boundaryAt(
  position: number,
  maxPosition: number,
): Boundary | null {
  if (position <= 0) return "closed";
  if (position >= maxPosition) return "open";
  return null;
}
