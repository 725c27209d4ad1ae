/**
 * In-memory MessageBus for tests.
 *
 * Routes deliveries through the real topic router and records every
 * publish and delivery in order. With relay echo enabled it behaves like
 * a responsive relay: each ".../relay/{id}/set" publish is answered with
 * the same payload on ".../relay/{id}/state".
 */
import { type Result, err, ok } from "neverthrow";
import { pino } from "pino";

import {
  type BusError,
  type ConnectionLostListener,
  type MessageBus,
  connectionLost,
  createTopicRouter,
  publishFailed,
} from "../mqtt/index.js";
import { parseTopic, topicFor } from "../topics/index.js";

export type BusEvent = Readonly<{
  kind: "publish" | "deliver";
  topic: string;
  payload: string;
}>;

export type InMemoryBus = MessageBus &
  Readonly<{
    events: BusEvent[];
    /** Answer relay set commands with matching state feedback */
    setRelayEcho: (enabled: boolean) => void;
    /** Relay ids that never answer, even with echo enabled */
    muteRelay: (relayId: string) => void;
    unmuteRelay: (relayId: string) => void;
    failPublishes: (enabled: boolean) => void;
    deliver: (topic: string, payload: string) => number;
    loseConnection: (reason?: string) => void;
    publishedTo: (topic: string) => string[];
    relayWrites: () => Array<{ relay: string; payload: string }>;
    subscriptions: () => string[];
    clear: () => void;
  }>;

export function createInMemoryBus(
  options: { relayEcho?: boolean } = {},
): InMemoryBus {
  const router = createTopicRouter(pino({ level: "silent" }));
  const events: BusEvent[] = [];
  const lostListeners: ConnectionLostListener[] = [];
  const muted = new Set<string>();
  let relayEcho = options.relayEcho ?? false;
  let failing = false;
  let connected = true;

  function deliver(topic: string, payload: string): number {
    events.push({ kind: "deliver", topic, payload });
    return router.dispatch(topic, Buffer.from(payload));
  }

  function echo(topic: string, payload: string): void {
    const parsed = parseTopic(topic);
    if (
      !relayEcho ||
      parsed === null ||
      parsed.entity !== "relay" ||
      parsed.action !== "command" ||
      muted.has(parsed.name)
    ) {
      return;
    }
    const stateTopic = topicFor(parsed.base, "relay", parsed.name, "state");
    queueMicrotask(() => {
      deliver(stateTopic, payload);
    });
  }

  return {
    events,

    async subscribe(topic, handler): Promise<Result<void, BusError>> {
      router.add(topic, handler);
      return ok(undefined);
    },

    async publish(topic, payload): Promise<Result<void, BusError>> {
      if (failing || !connected) {
        return err(publishFailed(topic, "Bus unavailable"));
      }
      events.push({ kind: "publish", topic, payload });
      echo(topic, payload);
      return ok(undefined);
    },

    onConnectionLost(listener) {
      lostListeners.push(listener);
    },

    isConnected: () => connected,

    async disconnect() {
      connected = false;
    },

    setRelayEcho(enabled) {
      relayEcho = enabled;
    },

    muteRelay(relayId) {
      muted.add(relayId);
    },

    unmuteRelay(relayId) {
      muted.delete(relayId);
    },

    failPublishes(enabled) {
      failing = enabled;
    },

    deliver,

    loseConnection(reason = "Broker connection closed") {
      connected = false;
      const error = connectionLost(reason);
      for (const listener of lostListeners) {
        listener(error);
      }
    },

    publishedTo(topic) {
      return events
        .filter((event) => event.kind === "publish" && event.topic === topic)
        .map((event) => event.payload);
    },

    relayWrites() {
      return events.flatMap((event) => {
        const parsed = parseTopic(event.topic);
        if (
          event.kind !== "publish" ||
          parsed === null ||
          parsed.entity !== "relay" ||
          parsed.action !== "command"
        ) {
          return [];
        }
        return [{ relay: parsed.name, payload: event.payload }];
      });
    },

    subscriptions: () => router.topics(),

    clear() {
      events.length = 0;
    },
  };
}

/**
 * Let queued microtasks and I/O callbacks run.
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
