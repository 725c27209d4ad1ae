/**
 * Topics Module - Pure Transformations
 *
 * Building and parsing bus topics. No side effects.
 */
import type { Action, Entity, ParsedTopic, ShadeTopics } from "./schema.js";
import { ACTION_SEGMENTS } from "./schema.js";

const TOPIC_PATTERN =
  /^(?<base>\w+)\/(?<entity>cover|relay|input)\/(?<name>\w+)\/(?<action>set|state|position)$/;

const SEGMENT_ACTIONS: Record<string, Action> = {
  set: "command",
  state: "state",
  position: "position",
};

// =============================================================================
// Building
// =============================================================================

/**
 * Build a topic string.
 *
 * @example
 * topicFor("homeassistant", "cover", "kitchen", "command")
 * // => "homeassistant/cover/kitchen/set"
 */
export function topicFor(
  base: string,
  entity: Entity,
  name: string,
  action: Action,
): string {
  return `${base}/${entity}/${name}/${ACTION_SEGMENTS[action]}`;
}

/**
 * Precompute all topics used by one shade.
 */
export function shadeTopics(params: {
  coverBaseTopic: string;
  relayBaseTopic: string;
  name: string;
  openRelay: string;
  closeRelay: string;
}): ShadeTopics {
  const { coverBaseTopic, relayBaseTopic, name, openRelay, closeRelay } =
    params;

  return {
    coverCommand: topicFor(coverBaseTopic, "cover", name, "command"),
    coverState: topicFor(coverBaseTopic, "cover", name, "state"),
    coverPosition: topicFor(coverBaseTopic, "cover", name, "position"),
    openRelayCommand: topicFor(relayBaseTopic, "relay", openRelay, "command"),
    openRelayState: topicFor(relayBaseTopic, "relay", openRelay, "state"),
    closeRelayCommand: topicFor(relayBaseTopic, "relay", closeRelay, "command"),
    closeRelayState: topicFor(relayBaseTopic, "relay", closeRelay, "state"),
  };
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Split a topic into its components.
 *
 * @returns The parsed topic, or null for anything that does not follow
 *   the {base}/{entity}/{name}/{action} layout
 */
export function parseTopic(topic: string): ParsedTopic | null {
  const match = TOPIC_PATTERN.exec(topic);
  const groups = match?.groups;
  if (!groups) return null;

  const { base, entity, name, action } = groups;
  if (!base || !name || !action) return null;

  const logicalAction = SEGMENT_ACTIONS[action];
  if (!logicalAction) return null;

  switch (entity) {
    case "cover":
    case "relay":
    case "input":
      return { base, entity, name, action: logicalAction };
    default:
      return null;
  }
}
