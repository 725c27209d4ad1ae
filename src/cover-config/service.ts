/**
 * Cover Config Module - Service Layer
 *
 * Reads the cover mapping file. Validation happens separately, in
 * validateCoverConfig, so the supervisor can reject a bad mapping before
 * it touches the bus.
 */
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { CoverConfigError } from "./errors.js";
import { fileUnreadable, invalidJson } from "./errors.js";

const log = createLogger("config");

/**
 * Read and JSON-parse the cover mapping file.
 *
 * @param path - File path, relative to the working directory
 * @returns Parsed but unvalidated JSON
 */
export async function readCoverConfigFile(
  path: string,
): Promise<Result<unknown, CoverConfigError>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ path, error: message }, "Cannot read cover config");
    return err(fileUnreadable(path, message));
  }

  try {
    const raw: unknown = JSON.parse(text);
    log.debug({ path }, "Cover config loaded");
    return ok(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ path, error: message }, "Cover config is not valid JSON");
    return err(invalidJson(path, message));
  }
}
