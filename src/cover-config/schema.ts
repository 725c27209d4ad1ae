/**
 * Cover Config Module - Schemas and Types
 *
 * The cover mapping file assigns each shade an open and a close relay:
 *
 *   { "kitchen": { "open": "relay_1", "close": "relay_2" } }
 *
 * Names and relay ids become topic segments, so both must match \w+.
 */
import { z } from "zod";

const IDENTIFIER = /^\w+$/;

const RelayIdSchema = z
  .string()
  .regex(IDENTIFIER, "relay id must contain only letters, digits and underscores");

const ShadeNameSchema = z
  .string()
  .regex(IDENTIFIER, "shade name must contain only letters, digits and underscores");

/**
 * Relays of one shade. Unknown keys are rejected.
 */
export const ShadeRelaysSchema = z
  .object({
    open: RelayIdSchema.describe("Relay that drives the shade open"),
    close: RelayIdSchema.describe("Relay that drives the shade closed"),
  })
  .strict();

export type ShadeRelays = z.infer<typeof ShadeRelaysSchema>;

/**
 * Whole mapping, with the cross-shade rules:
 * - at least one shade
 * - open and close differ within a shade
 * - no relay is shared between shades
 */
export const CoverConfigSchema = z
  .record(ShadeNameSchema, ShadeRelaysSchema)
  .superRefine((shades, ctx) => {
    const entries = Object.entries(shades);

    if (entries.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "at least one shade must be configured",
      });
    }

    const owners = new Map<string, string>();
    for (const [name, relays] of entries) {
      if (relays.open === relays.close) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `open and close relay are both "${relays.open}"`,
        });
      }

      for (const role of ["open", "close"] as const) {
        if (role === "close" && relays.open === relays.close) continue;

        const relayId = relays[role];
        const owner = owners.get(relayId);
        if (owner === undefined) {
          owners.set(relayId, `${name}.${role}`);
          continue;
        }
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name, role],
          message: `relay "${relayId}" is already assigned to ${owner}`,
        });
      }
    }
  });

export type CoverConfig = z.infer<typeof CoverConfigSchema>;

/**
 * One validated shade, flattened for the supervisor.
 */
export type ShadeMapping = Readonly<{
  name: string;
  openRelay: string;
  closeRelay: string;
}>;
