/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and message handling.
 * Connects to the broker and exposes it as a MessageBus. Reconnects are
 * disabled: controllers depend on feedback delivery, so a dropped
 * connection is reported to them instead of being retried silently.
 */
import { type Result, err, ok } from "neverthrow";
import { connect } from "mqtt";
import type { MqttClient } from "mqtt";

import { createLogger } from "../logger.js";
import type { BusError } from "./errors.js";
import {
  connectionFailed,
  connectionLost,
  formatBusError,
  publishFailed,
  subscribeFailed,
} from "./errors.js";
import { createTopicRouter } from "./router.js";
import type {
  ConnectionLostListener,
  MessageBus,
  MqttConnectionConfig,
} from "./schema.js";

const log = createLogger("mqtt");

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

// =============================================================================
// Connection
// =============================================================================

/**
 * Connect to the broker.
 *
 * @returns The bus once the first CONNACK arrives, or CONNECTION_FAILED
 */
export function connectMqttBus(
  options: MqttConnectionConfig,
): Promise<Result<MessageBus, BusError>> {
  log.info({ broker: options.brokerUrl }, "Connecting to MQTT broker...");

  const client = connect(options.brokerUrl, {
    reconnectPeriod: 0,
    connectTimeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    ...(options.clientId ? { clientId: options.clientId } : {}),
  });

  return new Promise((resolve) => {
    const cleanup = () => {
      client.off("connect", onConnect);
      client.off("error", onError);
      client.off("close", onClose);
    };

    const onConnect = () => {
      cleanup();
      log.info("Connected to MQTT broker");
      resolve(ok(createMqttBus(client)));
    };

    const onError = (error: Error) => {
      cleanup();
      client.end(true);
      log.error({ error: error.message }, "MQTT connection failed");
      resolve(err(connectionFailed(error.message, error)));
    };

    const onClose = () => {
      cleanup();
      client.end(true);
      log.error("MQTT connection closed before it was established");
      resolve(err(connectionFailed("Connection closed before CONNACK")));
    };

    client.on("connect", onConnect);
    client.on("error", onError);
    client.on("close", onClose);
  });
}

// =============================================================================
// Bus
// =============================================================================

/**
 * Wrap a connected client as a MessageBus.
 */
function createMqttBus(client: MqttClient): MessageBus {
  const router = createTopicRouter(log);
  const lostListeners: ConnectionLostListener[] = [];
  let closing = false;
  let lost = false;

  const notifyLost = (reason: string) => {
    if (closing || lost) return;
    lost = true;
    const error = connectionLost(reason);
    log.error({ error: formatBusError(error) }, "MQTT connection lost");
    for (const listener of lostListeners) {
      listener(error);
    }
  };

  client.on("message", (topic, payload) => {
    router.dispatch(topic, payload);
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });

  client.on("close", () => {
    notifyLost("Broker connection closed");
  });

  return {
    subscribe(topic, handler) {
      router.add(topic, handler);

      return new Promise((resolve) => {
        client.subscribe(topic, (error, granted) => {
          if (error) {
            log.error(
              { topic, error: error.message },
              "Failed to subscribe to topic",
            );
            resolve(err(subscribeFailed(topic, error.message, error)));
            return;
          }
          if (granted?.some((grant) => grant.qos === 128)) {
            log.error({ topic }, "Broker rejected subscription");
            resolve(err(subscribeFailed(topic, "Subscription rejected")));
            return;
          }
          log.debug({ topic }, "Subscribed to topic");
          resolve(ok(undefined));
        });
      });
    },

    publish(topic, payload) {
      return new Promise((resolve) => {
        client.publish(topic, payload, (error) => {
          if (error) {
            log.error({ topic, error: error.message }, "Failed to publish");
            resolve(err(publishFailed(topic, error.message, error)));
            return;
          }
          log.debug({ topic, payload }, "Published");
          resolve(ok(undefined));
        });
      });
    },

    onConnectionLost(listener) {
      lostListeners.push(listener);
    },

    isConnected: () => client.connected,

    disconnect() {
      closing = true;
      log.info("Disconnecting MQTT client...");
      return new Promise((resolve) => {
        client.end(false, {}, () => resolve());
      });
    },
  };
}
