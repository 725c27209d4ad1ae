/**
 * Relays Module - Pure Transformations
 *
 * Payload parsing and snapshot updates. No I/O.
 */
import type { RelayPayload, RelayRole, RelaySnapshot } from "./schema.js";
import { RelayPayloadSchema } from "./schema.js";

/**
 * Parse a relay state payload.
 *
 * @param payload - Raw message payload (Buffer or string)
 * @returns true for ON, false for OFF, null for anything else
 */
export function parseRelayPayload(payload: unknown): boolean | null {
  let str: string;

  if (Buffer.isBuffer(payload)) {
    str = payload.toString();
  } else if (typeof payload === "string") {
    str = payload;
  } else {
    return null;
  }

  const parsed = RelayPayloadSchema.safeParse(str);
  if (!parsed.success) return null;

  return parsed.data === "ON";
}

export function relayPayloadFor(isOn: boolean): RelayPayload {
  return isOn ? "ON" : "OFF";
}

/**
 * Overwrite one relay's state. Last write wins.
 */
export function applyRelayFeedback(
  snapshot: RelaySnapshot,
  role: RelayRole,
  isOn: boolean,
): RelaySnapshot {
  return { ...snapshot, [role]: isOn };
}

/**
 * Both relays reporting ON at once. The controller never commands this,
 * so it can only come from the devices themselves.
 */
export function isConflicting(snapshot: RelaySnapshot): boolean {
  return snapshot.open && snapshot.close;
}

export function snapshotsEqual(a: RelaySnapshot, b: RelaySnapshot): boolean {
  return a.open === b.open && a.close === b.close;
}
