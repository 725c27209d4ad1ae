/**
 * Topics Module - Schemas and Types
 *
 * Topic layout: {base}/{entity}/{name}/{action}
 * Entity and action enumerations are the source of truth for both
 * building and parsing topics.
 */
import { z } from "zod";

// =============================================================================
// Entities
// =============================================================================

export const EntitySchema = z.enum(["cover", "relay", "input"]);

export type Entity = z.infer<typeof EntitySchema>;

// =============================================================================
// Actions
// =============================================================================

/**
 * Logical action names used in code.
 */
export const ActionSchema = z.enum(["command", "state", "position"]);

export type Action = z.infer<typeof ActionSchema>;

/**
 * Wire segment for each logical action.
 * Commands travel on ".../set".
 */
export const ACTION_SEGMENTS = {
  command: "set",
  state: "state",
  position: "position",
} as const satisfies Record<Action, string>;

export type ActionSegment = (typeof ACTION_SEGMENTS)[Action];

// =============================================================================
// Parsed Topic
// =============================================================================

/**
 * A topic split into its components.
 */
export type ParsedTopic = Readonly<{
  base: string;
  entity: Entity;
  name: string;
  action: Action;
}>;

/**
 * Every topic a single shade reads or writes.
 */
export type ShadeTopics = Readonly<{
  coverCommand: string;
  coverState: string;
  coverPosition: string;
  openRelayCommand: string;
  openRelayState: string;
  closeRelayCommand: string;
  closeRelayState: string;
}>;
