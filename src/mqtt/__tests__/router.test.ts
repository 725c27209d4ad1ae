/**
 * MQTT Module - Topic Router Tests
 */
import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";

import { createTopicRouter } from "../router.js";

describe("createTopicRouter", () => {
  const log = pino({ level: "silent" });

  it("delivers to every handler registered for the exact topic", () => {
    const router = createTopicRouter(log);
    const first = vi.fn();
    const second = vi.fn();
    router.add("shady/relay/relay_1/state", first);
    router.add("shady/relay/relay_1/state", second);

    const payload = Buffer.from("ON");
    const delivered = router.dispatch("shady/relay/relay_1/state", payload);

    expect(delivered).toBe(2);
    expect(first).toHaveBeenCalledWith("shady/relay/relay_1/state", payload);
    expect(second).toHaveBeenCalledWith("shady/relay/relay_1/state", payload);
  });

  it("ignores well-formed topics nobody subscribed to", () => {
    const router = createTopicRouter(log);
    const handler = vi.fn();
    router.add("shady/relay/relay_1/state", handler);

    expect(router.dispatch("shady/relay/relay_9/state", Buffer.from("ON"))).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it("drops malformed topics even when a handler matches the string", () => {
    const router = createTopicRouter(log);
    const handler = vi.fn();
    router.add("shady/relay/relay 1/state", handler);

    expect(router.dispatch("shady/relay/relay 1/state", Buffer.from("ON"))).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it("lists registered topics", () => {
    const router = createTopicRouter(log);
    router.add("homeassistant/cover/kitchen/set", vi.fn());
    router.add("shady/relay/relay_1/state", vi.fn());

    expect(router.topics()).toEqual([
      "homeassistant/cover/kitchen/set",
      "shady/relay/relay_1/state",
    ]);
  });
});
