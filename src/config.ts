/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Shade controller configuration covering:
 * - Status API server settings
 * - MQTT broker and topic bases
 * - Position estimation timing
 * - Relay feedback timeout
 * - Location of the cover -> relay mapping file
 */
import { z } from "zod";

import { computeIncrement } from "./position/index.js";

/**
 * Topic segments must stay parseable by the topic router.
 */
const topicSegment = z
  .string()
  .regex(/^\w+$/, "must contain only letters, digits and underscores");

export const ConfigSchema = z
  .object({
    // ==========================================================================
    // Server Configuration
    // ==========================================================================
    PORT: z.coerce.number().int().positive().default(8085).describe("Status API port"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Runtime environment"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info")
      .describe("Pino log level"),

    // ==========================================================================
    // MQTT Configuration
    // ==========================================================================
    MQTT_BROKER_URL: z
      .string()
      .min(1, "MQTT_BROKER_URL is required")
      .describe("MQTT broker connection URL"),
    MQTT_CLIENT_ID: z
      .string()
      .optional()
      .transform((val) => (val && val.trim() !== "" ? val : undefined))
      .describe("MQTT client identifier (generated when absent)"),
    MQTT_BASE_TOPIC_COVER: topicSegment
      .default("homeassistant")
      .describe("Base topic for cover command/state/position"),
    MQTT_BASE_TOPIC_RELAY: topicSegment
      .default("shady")
      .describe("Base topic for relay set/state"),

    // ==========================================================================
    // Position Estimation
    // ==========================================================================
    TICK_INTERVAL_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(500)
      .describe("Estimator tick period in milliseconds"),
    MAX_TRAVEL_TIME_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(30000)
      .describe("Time for a full open/close travel in milliseconds"),
    MAX_POSITION: z.coerce
      .number()
      .int()
      .positive()
      .default(100)
      .describe("Position scale: 0 is closed, MAX_POSITION is open"),

    // ==========================================================================
    // Relay Feedback
    // ==========================================================================
    FEEDBACK_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(10000)
      .describe("Max wait for relay feedback (0 waits forever)"),

    // ==========================================================================
    // Cover Mapping
    // ==========================================================================
    SHADES_CONFIG_PATH: z
      .string()
      .min(1)
      .default("./shades.json")
      .describe("JSON file mapping shade names to open/close relays"),
  })
  .superRefine((env, ctx) => {
    // A zero increment would never reach a boundary, leaving a relay energised
    const increment = computeIncrement({
      maxPosition: env.MAX_POSITION,
      tickIntervalMs: env.TICK_INTERVAL_MS,
      maxTravelTimeMs: env.MAX_TRAVEL_TIME_MS,
    });
    if (increment < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TICK_INTERVAL_MS"],
        message: `MAX_POSITION * TICK_INTERVAL_MS / MAX_TRAVEL_TIME_MS rounds to ${increment}; the position estimate would never move`,
      });
    }
  });

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT connection settings for the bus layer.
 */
export function getMqttConfig(): Readonly<{
  brokerUrl: string;
  clientId: string | undefined;
}> {
  return {
    brokerUrl: config.MQTT_BROKER_URL,
    clientId: config.MQTT_CLIENT_ID,
  };
}

/**
 * Settings shared by every shade controller.
 * A feedback timeout of 0 means "wait forever" and maps to null.
 */
export function getShadeDefaults(): Readonly<{
  coverBaseTopic: string;
  relayBaseTopic: string;
  tickIntervalMs: number;
  maxTravelTimeMs: number;
  maxPosition: number;
  feedbackTimeoutMs: number | null;
}> {
  return {
    coverBaseTopic: config.MQTT_BASE_TOPIC_COVER,
    relayBaseTopic: config.MQTT_BASE_TOPIC_RELAY,
    tickIntervalMs: config.TICK_INTERVAL_MS,
    maxTravelTimeMs: config.MAX_TRAVEL_TIME_MS,
    maxPosition: config.MAX_POSITION,
    feedbackTimeoutMs:
      config.FEEDBACK_TIMEOUT_MS === 0 ? null : config.FEEDBACK_TIMEOUT_MS,
  };
}
