/**
 * Cover Config Module - Error Types
 */

export type CoverConfigError =
  | {
      readonly type: "FILE_UNREADABLE";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_JSON";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_CONFIG";
      /** Every problem found, as "path: message" */
      readonly issues: readonly string[];
    };

export function fileUnreadable(path: string, message: string): CoverConfigError {
  return { type: "FILE_UNREADABLE", path, message };
}

export function invalidJson(path: string, message: string): CoverConfigError {
  return { type: "INVALID_JSON", path, message };
}

export function invalidConfig(issues: readonly string[]): CoverConfigError {
  return { type: "INVALID_CONFIG", issues };
}

/**
 * Format a CoverConfigError for logging.
 */
export function formatCoverConfigError(error: CoverConfigError): string {
  switch (error.type) {
    case "FILE_UNREADABLE":
      return `Cannot read cover config ${error.path}: ${error.message}`;
    case "INVALID_JSON":
      return `Cover config ${error.path} is not valid JSON: ${error.message}`;
    case "INVALID_CONFIG":
      return `Invalid cover config: ${error.issues.join("; ")}`;
  }
}
