/**
 * MQTT Module - Public API
 *
 * Exports the MessageBus seam, the MQTT-backed implementation and the
 * topic router it dispatches through.
 */

// Types
export type {
  ConnectionLostListener,
  MessageBus,
  MessageHandler,
  MqttConnectionConfig,
} from "./schema.js";
export type { BusError } from "./errors.js";
export type { TopicRouter } from "./router.js";

// Error utilities
export {
  connectionFailed,
  connectionLost,
  formatBusError,
  publishFailed,
  subscribeFailed,
} from "./errors.js";

// Service functions
export { connectMqttBus } from "./service.js";
export { createTopicRouter } from "./router.js";
