/**
 * Cover Config Module - Public API
 */

// Types
export type { CoverConfig, ShadeMapping, ShadeRelays } from "./schema.js";
export type { CoverConfigError } from "./errors.js";

// Error utilities
export { formatCoverConfigError } from "./errors.js";

// Pure functions
export { toShadeMappings, validateCoverConfig } from "./transform.js";

// Service functions
export { readCoverConfigFile } from "./service.js";
