/**
 * Cover Config Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodIssue } from "zod";

import type { CoverConfigError } from "./errors.js";
import { invalidConfig } from "./errors.js";
import type { CoverConfig, ShadeMapping } from "./schema.js";
import { CoverConfigSchema } from "./schema.js";

/**
 * Validate a parsed cover mapping. All issues are collected, not just the
 * first one.
 */
export function validateCoverConfig(
  raw: unknown,
): Result<CoverConfig, CoverConfigError> {
  const parsed = CoverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return err(invalidConfig(parsed.error.issues.map(formatIssue)));
  }
  return ok(parsed.data);
}

export function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Flatten the mapping in file order.
 */
export function toShadeMappings(config: CoverConfig): ShadeMapping[] {
  return Object.entries(config).map(([name, relays]) => ({
    name,
    openRelay: relays.open,
    closeRelay: relays.close,
  }));
}
