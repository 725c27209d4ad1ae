/**
 * MQTT Module - Error Types
 *
 * Typed error unions for bus operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur on the message bus.
 */
export type BusError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONNECTION_LOST";
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly topic: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a CONNECTION_FAILED error.
 */
export function connectionFailed(message: string, cause?: Error): BusError {
  if (cause) {
    return { type: "CONNECTION_FAILED", message, cause };
  }
  return { type: "CONNECTION_FAILED", message };
}

/**
 * Create a CONNECTION_LOST error.
 */
export function connectionLost(message: string): BusError {
  return { type: "CONNECTION_LOST", message };
}

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(
  topic: string,
  message: string,
  cause?: Error,
): BusError {
  if (cause) {
    return { type: "PUBLISH_FAILED", topic, message, cause };
  }
  return { type: "PUBLISH_FAILED", topic, message };
}

/**
 * Create a SUBSCRIBE_FAILED error.
 */
export function subscribeFailed(
  topic: string,
  message: string,
  cause?: Error,
): BusError {
  if (cause) {
    return { type: "SUBSCRIBE_FAILED", topic, message, cause };
  }
  return { type: "SUBSCRIBE_FAILED", topic, message };
}

/**
 * Format a BusError for logging.
 */
export function formatBusError(error: BusError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Connection failed: ${error.message}`;
    case "CONNECTION_LOST":
      return `Connection lost: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish to ${error.topic} failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `Subscribe to ${error.topic} failed: ${error.message}`;
  }
}
