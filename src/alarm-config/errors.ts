/**
 * Alarm Config Module - Error Types
 *
 * FILE_UNREADABLE, INVALID_JSON and a failing top-level shape abort
 * startup. Every other error disables the affected alarm only.
 */

export type ConfigError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly message: string;
      readonly issues: ReadonlyArray<string>;
    }
  | {
      readonly type: "INVALID_BAND_RANGE";
      readonly index: number;
      readonly gt: number;
      readonly lt: number;
    }
  | { readonly type: "NO_BANDS" }
  | { readonly type: "DUPLICATE_RECIPIENT"; readonly targets: ReadonlyArray<string> }
  | { readonly type: "INVALID_TIME_ZONE"; readonly target: string; readonly timeZone: string }
  | { readonly type: "DUPLICATE_ALARM"; readonly name: string }
  | { readonly type: "FILE_UNREADABLE"; readonly path: string; readonly message: string }
  | { readonly type: "INVALID_JSON"; readonly path: string; readonly message: string };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function validationFailed(
  message: string,
  issues: ReadonlyArray<string>,
): ConfigError {
  return { type: "VALIDATION_FAILED", message, issues };
}

export function invalidBandRange(
  index: number,
  gt: number,
  lt: number,
): ConfigError {
  return { type: "INVALID_BAND_RANGE", index, gt, lt };
}

export function noBands(): ConfigError {
  return { type: "NO_BANDS" };
}

export function duplicateRecipient(targets: ReadonlyArray<string>): ConfigError {
  return { type: "DUPLICATE_RECIPIENT", targets };
}

export function invalidTimeZone(target: string, timeZone: string): ConfigError {
  return { type: "INVALID_TIME_ZONE", target, timeZone };
}

export function duplicateAlarm(name: string): ConfigError {
  return { type: "DUPLICATE_ALARM", name };
}

export function fileUnreadable(path: string, message: string): ConfigError {
  return { type: "FILE_UNREADABLE", path, message };
}

export function invalidJson(path: string, message: string): ConfigError {
  return { type: "INVALID_JSON", path, message };
}

/**
 * Format a ConfigError for logging.
 */
export function formatConfigError(error: ConfigError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `${error.message}: ${error.issues.join("; ")}`;
    case "INVALID_BAND_RANGE":
      return `Invalid limit range at index ${error.index}: gt=${error.gt}, lt=${error.lt}`;
    case "NO_BANDS":
      return "No limits configured";
    case "DUPLICATE_RECIPIENT":
      return `Duplicate recipient: ${error.targets.join(", ")}`;
    case "INVALID_TIME_ZONE":
      return `Invalid time zone for ${error.target}: ${error.timeZone}`;
    case "DUPLICATE_ALARM":
      return `Duplicate alarm name: ${error.name}`;
    case "FILE_UNREADABLE":
      return `Cannot read ${error.path}: ${error.message}`;
    case "INVALID_JSON":
      return `Invalid JSON in ${error.path}: ${error.message}`;
  }
}
