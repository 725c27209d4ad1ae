/**
 * Position Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import { DIRECTION, type Direction } from "../schema.js";
import {
  advancePosition,
  boundaryAt,
  clampPosition,
  computeIncrement,
  isInterior,
  roundHalfEven,
} from "../transform.js";

describe("computeIncrement", () => {
  it("rounds max * tick / travel", () => {
    expect(
      computeIncrement({
        maxPosition: 100,
        tickIntervalMs: 500,
        maxTravelTimeMs: 30000,
      }),
    ).toBe(2);
  });

  it("is exact when the ratio divides evenly", () => {
    expect(
      computeIncrement({
        maxPosition: 100,
        tickIntervalMs: 1000,
        maxTravelTimeMs: 20000,
      }),
    ).toBe(5);
  });

  it("rounds an exact half to the even neighbour", () => {
    expect(
      computeIncrement({
        maxPosition: 100,
        tickIntervalMs: 500,
        maxTravelTimeMs: 20000,
      }),
    ).toBe(2);
    expect(
      computeIncrement({
        maxPosition: 100,
        tickIntervalMs: 700,
        maxTravelTimeMs: 20000,
      }),
    ).toBe(4);
  });
});

describe("roundHalfEven", () => {
  it.each([
    [0.5, 0],
    [1.5, 2],
    [2.5, 2],
    [3.5, 4],
    [2.4, 2],
    [2.6, 3],
    [7, 7],
  ])("rounds %d to %d", (value, expected) => {
    expect(roundHalfEven(value)).toBe(expected);
  });
});

describe("clampPosition", () => {
  it("keeps values inside 0..max", () => {
    expect(clampPosition(-3, 100)).toBe(0);
    expect(clampPosition(42, 100)).toBe(42);
    expect(clampPosition(101, 100)).toBe(100);
  });
});

describe("advancePosition", () => {
  it("moves up while opening and down while closing", () => {
    expect(advancePosition(50, DIRECTION.opening, 2, 100)).toBe(52);
    expect(advancePosition(50, DIRECTION.closing, 2, 100)).toBe(48);
  });

  it("holds still when stopped", () => {
    expect(advancePosition(50, DIRECTION.stopped, 2, 100)).toBe(50);
  });

  it("clamps instead of overshooting", () => {
    expect(advancePosition(1, DIRECTION.closing, 2, 100)).toBe(0);
    expect(advancePosition(99, DIRECTION.opening, 2, 100)).toBe(100);
  });

  it("stays within bounds for any direction history", () => {
    const history: Direction[] = [1, 1, 1, -1, -1, 0, -1, -1, -1, -1, 1, 0];
    let position = 95;
    for (let round = 0; round < 40; round++) {
      for (const direction of history) {
        position = advancePosition(position, direction, 7, 100);
        expect(position).toBeGreaterThanOrEqual(0);
        expect(position).toBeLessThanOrEqual(100);
      }
    }
  });
});

describe("isInterior", () => {
  it("excludes both ends", () => {
    expect(isInterior(0, 100)).toBe(false);
    expect(isInterior(1, 100)).toBe(true);
    expect(isInterior(99, 100)).toBe(true);
    expect(isInterior(100, 100)).toBe(false);
  });
});

describe("boundaryAt", () => {
  it("reports closed at 0 and open at max", () => {
    expect(boundaryAt(0, 100)).toBe("closed");
    expect(boundaryAt(100, 100)).toBe("open");
    expect(boundaryAt(50, 100)).toBeNull();
  });
});
