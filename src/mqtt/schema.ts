/**
 * MQTT Module - Schemas and Types
 *
 * The message bus seam used by shade controllers. The MQTT client
 * implements it in production; tests use an in-memory stand-in.
 */
import type { Result } from "neverthrow";

import type { BusError } from "./errors.js";

/**
 * Handler for one inbound message.
 */
export type MessageHandler = (topic: string, payload: Buffer) => void;

export type ConnectionLostListener = (error: BusError) => void;

/**
 * Publish/subscribe operations a shade controller needs.
 */
export type MessageBus = Readonly<{
  subscribe: (
    topic: string,
    handler: MessageHandler,
  ) => Promise<Result<void, BusError>>;
  publish: (topic: string, payload: string) => Promise<Result<void, BusError>>;
  onConnectionLost: (listener: ConnectionLostListener) => void;
  isConnected: () => boolean;
  disconnect: () => Promise<void>;
}>;

/**
 * MQTT connection settings.
 */
export type MqttConnectionConfig = Readonly<{
  brokerUrl: string;
  clientId: string | undefined;
  connectTimeoutMs?: number;
}>;
