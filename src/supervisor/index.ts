/**
 * Supervisor Module - Public API
 */

// Types
export type { ConnectBus, ShadeDefaults, SupervisorOptions } from "./schema.js";
export type { SupervisorError } from "./errors.js";

// Error utilities
export { formatSupervisorError } from "./errors.js";

// Service functions
export {
  dispatchShadeCommand,
  getShadeSnapshot,
  getShadeSnapshots,
  isBusConnected,
  startSupervisor,
  stopSupervisor,
  waitForShutdown,
} from "./service.js";
