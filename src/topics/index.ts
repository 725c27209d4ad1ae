/**
 * Topics Module - Public API
 */

// Types
export type {
  Action,
  ActionSegment,
  Entity,
  ParsedTopic,
  ShadeTopics,
} from "./schema.js";

// Pure transformations
export {
  parseTopic,
  shadeTopics,
  topicFor,
} from "./transform.js";
