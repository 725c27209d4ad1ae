/**
 * Supervisor Module - Types
 */
import type { Result } from "neverthrow";

import type { BusError, MessageBus } from "../mqtt/index.js";
import type { ShadeSettings } from "../shade/index.js";

/**
 * Settings shared by every shade; the cover config supplies the rest.
 */
export type ShadeDefaults = Omit<
  ShadeSettings,
  "name" | "openRelay" | "closeRelay"
>;

/**
 * Opens the message bus. Called only once the cover config is valid.
 */
export type ConnectBus = () => Promise<Result<MessageBus, BusError>>;

export type SupervisorOptions = Readonly<{
  /** Parsed but unvalidated cover mapping */
  rawCoverConfig: unknown;
  defaults: ShadeDefaults;
  connectBus: ConnectBus;
}>;
