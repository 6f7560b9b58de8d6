/**
 * Alarm Config Module - Service Layer
 *
 * Reads the alarm definition file once at startup.
 */
import { readFileSync } from "node:fs";
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type ConfigError,
  fileUnreadable,
  formatConfigError,
  invalidJson,
} from "./errors.js";
import type { LoadedAlarms } from "./schema.js";
import { parseAlarmFile } from "./transform.js";

const log = createLogger("alarm-config");

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * Load and validate alarm definitions.
 *
 * @returns Valid alarms plus the rejected ones, or an error when the file
 *          itself cannot be used
 */
export function loadAlarmConfigs(path: string): Result<LoadedAlarms, ConfigError> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    return err(fileUnreadable(path, errorMessage(error)));
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(invalidJson(path, errorMessage(error)));
  }

  const result = parseAlarmFile(data);

  if (result.isOk()) {
    const { alarms, rejected } = result.value;

    for (const { name, error } of rejected) {
      log.error(
        { alarm: name, error: formatConfigError(error) },
        "Alarm disabled: invalid configuration",
      );
    }

    log.info(
      {
        path,
        enabled: alarms.map((a) => a.name),
        disabled: rejected.length,
      },
      `Loaded ${alarms.length} alarm(s)`,
    );
  }

  return result;
}
