/**
 * Supervisor Service Tests
 *
 * Runs the supervisor against the in-memory bus.
 */
import { err, ok } from "neverthrow";
import { afterEach, describe, expect, test, vi } from "vitest";

import { connectionFailed } from "../../mqtt/index.js";
import {
  type InMemoryBus,
  createInMemoryBus,
  settle,
} from "../../test-utils/in-memory-bus.js";
import type { ConnectBus, ShadeDefaults } from "../schema.js";
import {
  dispatchShadeCommand,
  getShadeSnapshot,
  getShadeSnapshots,
  isBusConnected,
  startSupervisor,
  stopSupervisor,
  waitForShutdown,
} from "../service.js";

const DEFAULTS: ShadeDefaults = {
  coverBaseTopic: "homeassistant",
  relayBaseTopic: "shady",
  // Long enough that no tick fires after the first one
  tickIntervalMs: 60_000,
  maxTravelTimeMs: 30_000,
  maxPosition: 100,
  feedbackTimeoutMs: null,
};

const COVERS = {
  kitchen: { open: "relay_1", close: "relay_2" },
  living_room: { open: "relay_3", close: "relay_4" },
};

function connectTo(bus: InMemoryBus) {
  return vi.fn<ConnectBus>(async () => ok(bus));
}

describe("Supervisor", () => {
  afterEach(async () => {
    await stopSupervisor();
  });

  describe("startSupervisor", () => {
    test("never connects when a relay is shared between shades", async () => {
      const connectBus = connectTo(createInMemoryBus());

      const result = await startSupervisor({
        rawCoverConfig: {
          kitchen: { open: "relay_1", close: "relay_2" },
          living_room: { open: "relay_2", close: "relay_3" },
        },
        defaults: DEFAULTS,
        connectBus,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_COVER_CONFIG",
        cause: {
          type: "INVALID_CONFIG",
          issues: [
            'living_room.open: relay "relay_2" is already assigned to kitchen.close',
          ],
        },
      });
      expect(connectBus).not.toHaveBeenCalled();
      expect(getShadeSnapshots()).toEqual([]);
    });

    test("starts one controller per shade", async () => {
      const bus = createInMemoryBus({ relayEcho: true });

      const result = await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });

      expect(result._unsafeUnwrap()).toEqual(["kitchen", "living_room"]);
      expect(bus.subscriptions()).toEqual([
        "homeassistant/cover/kitchen/set",
        "shady/relay/relay_1/state",
        "shady/relay/relay_2/state",
        "homeassistant/cover/living_room/set",
        "shady/relay/relay_3/state",
        "shady/relay/relay_4/state",
      ]);
      expect(getShadeSnapshots().map((s) => [s.name, s.state, s.position])).toEqual(
        [
          ["kitchen", "stopped", 100],
          ["living_room", "stopped", 100],
        ],
      );
      expect(isBusConnected()).toBe(true);
    });

    test("reports BUS_UNAVAILABLE when the connection fails", async () => {
      const failure = connectionFailed("connect ECONNREFUSED");

      const result = await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: async () => err(failure),
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "BUS_UNAVAILABLE",
        cause: failure,
      });
      expect(isBusConnected()).toBe(false);
    });

    test("refuses to start twice", async () => {
      const options = {
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(createInMemoryBus()),
      };
      await startSupervisor(options);

      const second = await startSupervisor(options);

      expect(second._unsafeUnwrapErr()).toEqual({ type: "ALREADY_RUNNING" });
    });
  });

  describe("commands and snapshots", () => {
    test("routes bus commands to the named shade only", async () => {
      const bus = createInMemoryBus({ relayEcho: true });
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });

      bus.deliver("homeassistant/cover/living_room/set", "CLOSE");
      await settle();

      expect(getShadeSnapshot("living_room")?.state).toBe("closing");
      expect(getShadeSnapshot("kitchen")?.state).toBe("stopped");
    });

    test("dispatches commands by shade name", async () => {
      const bus = createInMemoryBus({ relayEcho: true });
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });

      const result = dispatchShadeCommand("kitchen", "OPEN");
      await settle();

      expect(result.isOk()).toBe(true);
      expect(getShadeSnapshot("kitchen")).toMatchObject({
        state: "opening",
        relays: { open: true, close: false },
      });
      expect(bus.publishedTo("homeassistant/cover/kitchen/state")).toEqual([
        "opening",
      ]);
    });

    test("rejects commands for unknown shades", async () => {
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(createInMemoryBus()),
      });

      expect(dispatchShadeCommand("attic", "OPEN")._unsafeUnwrapErr()).toEqual({
        type: "UNKNOWN_SHADE",
        shade: "attic",
      });
      expect(getShadeSnapshot("attic")).toBeNull();
    });
  });

  describe("shutdown", () => {
    test("terminates every shade when the connection is lost", async () => {
      const bus = createInMemoryBus();
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });
      const shutdown = waitForShutdown();

      bus.loseConnection("Broker went away");
      const result = await shutdown;

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SHADE_FAILED",
        shade: "kitchen",
        cause: {
          type: "BUS_FAILURE",
          shade: "kitchen",
          cause: { type: "CONNECTION_LOST", message: "Broker went away" },
        },
      });
      expect(isBusConnected()).toBe(false);

      bus.deliver("homeassistant/cover/living_room/set", "OPEN");
      await settle();
      expect(bus.relayWrites()).toEqual([]);
    });

    test("resolves ok after a graceful stop", async () => {
      const bus = createInMemoryBus();
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });
      const shutdown = waitForShutdown();

      await stopSupervisor();

      expect((await shutdown).isOk()).toBe(true);
      expect(bus.isConnected()).toBe(false);
      expect(getShadeSnapshots()).toEqual([]);
    });

    test("ends pending feedback waits on stop", async () => {
      const bus = createInMemoryBus();
      await startSupervisor({
        rawCoverConfig: COVERS,
        defaults: DEFAULTS,
        connectBus: connectTo(bus),
      });
      dispatchShadeCommand("kitchen", "CLOSE");
      await settle();
      const shutdown = waitForShutdown();

      await stopSupervisor();

      expect((await shutdown).isOk()).toBe(true);
    });
  });
});
