/**
 * MQTT Module - Topic Router
 *
 * Dispatches inbound messages to handlers registered for an exact topic.
 * Traffic that does not follow the topic layout is dropped before lookup.
 */
import type { Logger } from "pino";

import { parseTopic } from "../topics/index.js";
import type { MessageHandler } from "./schema.js";

export type TopicRouter = Readonly<{
  add: (topic: string, handler: MessageHandler) => void;
  dispatch: (topic: string, payload: Buffer) => number;
  topics: () => string[];
}>;

/**
 * Create an empty router.
 */
export function createTopicRouter(log: Logger): TopicRouter {
  const handlers = new Map<string, MessageHandler[]>();

  return {
    add(topic, handler) {
      const existing = handlers.get(topic) ?? [];
      handlers.set(topic, [...existing, handler]);
    },

    /**
     * @returns Number of handlers the message reached
     */
    dispatch(topic, payload) {
      if (parseTopic(topic) === null) {
        log.trace({ topic }, "Ignoring message on unrecognized topic");
        return 0;
      }

      const targets = handlers.get(topic);
      if (!targets) {
        log.trace({ topic }, "No handler for topic");
        return 0;
      }

      for (const handler of targets) {
        handler(topic, payload);
      }
      return targets.length;
    },

    topics: () => [...handlers.keys()],
  };
}
