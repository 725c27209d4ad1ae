/**
 * Shade Module - Pure Transformations
 *
 * Transition table and relay combinations for the shade state machine.
 * No side effects, no I/O - just data in, data out.
 */
import { DIRECTION, type Boundary, type Direction } from "../position/index.js";
import type { RelaySnapshot } from "../relays/index.js";
import { snapshotsEqual } from "../relays/index.js";
import type {
  CoverCommand,
  CoverStatePayload,
  RelayWrite,
  ShadeState,
} from "./schema.js";
import { CoverCommandSchema } from "./schema.js";

// =============================================================================
// Command Parsing
// =============================================================================

/**
 * Parse a cover command payload.
 *
 * @param payload - Raw message payload (Buffer or string)
 * @returns The command, or null for anything outside OPEN/CLOSE/STOP
 */
export function parseCoverCommand(payload: unknown): CoverCommand | null {
  let str: string;

  if (Buffer.isBuffer(payload)) {
    str = payload.toString();
  } else if (typeof payload === "string") {
    str = payload;
  } else {
    return null;
  }

  const parsed = CoverCommandSchema.safeParse(str);
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// Transition Table
// =============================================================================

/**
 * States to pass through, in order, to execute a command.
 * Reversing direction always stops first; an empty plan is a no-op.
 */
export function planTransition(
  current: ShadeState,
  command: CoverCommand,
): readonly ShadeState[] {
  switch (command) {
    case "STOP":
      return ["stopped"];
    case "OPEN":
      return planMove(current, "opening");
    case "CLOSE":
      return planMove(current, "closing");
  }
}

function planMove(
  current: ShadeState,
  target: "opening" | "closing",
): readonly ShadeState[] {
  if (current === target) return [];
  if (current === "stopped") return [target];
  return ["stopped", target];
}

// =============================================================================
// Relay Combinations
// =============================================================================

/**
 * Relay feedback that corroborates each state.
 */
export const RELAY_TARGETS: Readonly<Record<ShadeState, RelaySnapshot>> = {
  stopped: { open: false, close: false },
  opening: { open: true, close: false },
  closing: { open: false, close: true },
};

/**
 * Writes that drive the relays towards a state.
 * OFF writes come before the ON write, so the commanded pair is never
 * both ON.
 */
export function relayWritesFor(target: ShadeState): readonly RelayWrite[] {
  switch (target) {
    case "stopped":
      return [
        { role: "close", on: false },
        { role: "open", on: false },
      ];
    case "opening":
      return [
        { role: "close", on: false },
        { role: "open", on: true },
      ];
    case "closing":
      return [
        { role: "open", on: false },
        { role: "close", on: true },
      ];
  }
}

export function matchesTarget(
  snapshot: RelaySnapshot,
  target: ShadeState,
): boolean {
  return snapshotsEqual(snapshot, RELAY_TARGETS[target]);
}

// =============================================================================
// Derived Values
// =============================================================================

export function directionFor(state: ShadeState): Direction {
  switch (state) {
    case "opening":
      return DIRECTION.opening;
    case "closing":
      return DIRECTION.closing;
    case "stopped":
      return DIRECTION.stopped;
  }
}

/**
 * State payload published when a state is committed.
 * Stopping publishes nothing; "open"/"closed" come from the boundary path.
 */
export function statePayloadFor(state: ShadeState): CoverStatePayload | null {
  switch (state) {
    case "opening":
      return "opening";
    case "closing":
      return "closing";
    case "stopped":
      return null;
  }
}

export function boundaryPayload(boundary: Boundary): CoverStatePayload {
  return boundary === "open" ? "open" : "closed";
}
