/**
 * Relays Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import { INITIAL_RELAY_SNAPSHOT } from "../schema.js";
import {
  applyRelayFeedback,
  isConflicting,
  parseRelayPayload,
  relayPayloadFor,
} from "../transform.js";

describe("parseRelayPayload", () => {
  it("parses ON and OFF from strings", () => {
    expect(parseRelayPayload("ON")).toBe(true);
    expect(parseRelayPayload("OFF")).toBe(false);
  });

  it("handles Buffer payload", () => {
    expect(parseRelayPayload(Buffer.from("ON"))).toBe(true);
  });

  it.each(["on", "off", "1", "", " ON", "TOGGLE"])(
    "returns null for %j",
    (payload) => {
      expect(parseRelayPayload(payload)).toBeNull();
    },
  );

  it("returns null for non-string payloads", () => {
    expect(parseRelayPayload(1)).toBeNull();
    expect(parseRelayPayload(null)).toBeNull();
  });
});

describe("relayPayloadFor", () => {
  it("maps booleans to wire payloads", () => {
    expect(relayPayloadFor(true)).toBe("ON");
    expect(relayPayloadFor(false)).toBe("OFF");
  });
});

describe("applyRelayFeedback", () => {
  it("overwrites only the addressed relay", () => {
    const updated = applyRelayFeedback(INITIAL_RELAY_SNAPSHOT, "close", true);
    expect(updated).toEqual({ open: false, close: true });
  });

  it("does not mutate the input snapshot", () => {
    const before = { open: true, close: false };
    applyRelayFeedback(before, "open", false);
    expect(before).toEqual({ open: true, close: false });
  });
});

describe("isConflicting", () => {
  it("flags both relays on", () => {
    expect(isConflicting({ open: true, close: true })).toBe(true);
    expect(isConflicting({ open: true, close: false })).toBe(false);
    expect(isConflicting({ open: false, close: false })).toBe(false);
  });
});
