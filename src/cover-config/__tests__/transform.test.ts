/**
 * Cover Config Module - Validation Tests
 */
import { describe, expect, test } from "vitest";

import { toShadeMappings, validateCoverConfig } from "../transform.js";

function issuesOf(raw: unknown): readonly string[] {
  const error = validateCoverConfig(raw)._unsafeUnwrapErr();
  if (error.type !== "INVALID_CONFIG") {
    throw new Error(`Expected INVALID_CONFIG, got ${error.type}`);
  }
  return error.issues;
}

describe("validateCoverConfig", () => {
  test("accepts a valid mapping", () => {
    const raw = {
      kitchen: { open: "relay_1", close: "relay_2" },
      living_room: { open: "relay_3", close: "relay_4" },
    };

    expect(validateCoverConfig(raw)._unsafeUnwrap()).toEqual(raw);
  });

  test("rejects a relay shared between two shades", () => {
    const raw = {
      kitchen: { open: "relay_1", close: "relay_2" },
      living_room: { open: "relay_2", close: "relay_3" },
    };

    expect(issuesOf(raw)).toEqual([
      'living_room.open: relay "relay_2" is already assigned to kitchen.close',
    ]);
  });

  test("rejects the same relay for open and close", () => {
    expect(issuesOf({ kitchen: { open: "relay_1", close: "relay_1" } })).toEqual(
      ['kitchen: open and close relay are both "relay_1"'],
    );
  });

  test("reports every issue, not just the first", () => {
    const raw = {
      kitchen: { open: "relay_1", close: "relay_1" },
      bedroom: { open: "relay_2", close: "relay_3" },
      office: { open: "relay_4", close: "relay_3" },
    };

    expect(issuesOf(raw)).toEqual([
      'kitchen: open and close relay are both "relay_1"',
      'office.close: relay "relay_3" is already assigned to bedroom.close',
    ]);
  });

  test("requires at least one shade", () => {
    expect(issuesOf({})).toEqual([
      "(root): at least one shade must be configured",
    ]);
  });

  test("rejects keys other than open and close", () => {
    const issues = issuesOf({
      kitchen: { open: "relay_1", close: "relay_2", stop: "relay_3" },
    });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^kitchen: Unrecognized key/);
  });

  test("requires both relays", () => {
    expect(issuesOf({ kitchen: { open: "relay_1" } })).toEqual([
      "kitchen.close: Required",
    ]);
  });

  test("rejects names that cannot be topic segments", () => {
    expect(
      issuesOf({ "living-room": { open: "relay_1", close: "relay_2" } }),
    ).toEqual([
      "living-room: shade name must contain only letters, digits and underscores",
    ]);
    expect(issuesOf({ kitchen: { open: "relay/1", close: "relay_2" } })).toEqual(
      ["kitchen.open: relay id must contain only letters, digits and underscores"],
    );
  });

  test("rejects non-object documents", () => {
    expect(validateCoverConfig(["kitchen"])._unsafeUnwrapErr().type).toBe(
      "INVALID_CONFIG",
    );
    expect(validateCoverConfig(null).isErr()).toBe(true);
  });
});

describe("toShadeMappings", () => {
  test("flattens shades in file order", () => {
    expect(
      toShadeMappings({
        kitchen: { open: "relay_1", close: "relay_2" },
        bedroom: { open: "relay_3", close: "relay_4" },
      }),
    ).toEqual([
      { name: "kitchen", openRelay: "relay_1", closeRelay: "relay_2" },
      { name: "bedroom", openRelay: "relay_3", closeRelay: "relay_4" },
    ]);
  });
});
