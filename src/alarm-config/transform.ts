/**
 * Alarm Config Module - Pure Transformations
 *
 * Turns parsed JSON into validated alarm configurations.
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodError } from "zod";

import type { AlarmConfig } from "../alarm/index.js";
import { type BandError, limitToBand, validateBands } from "../bands/index.js";
import { isValidTimeZone } from "../local-time/index.js";
import {
  findDuplicateTargets,
  normalizeRecipient,
} from "../recipients/index.js";
import {
  type ConfigError,
  duplicateAlarm,
  duplicateRecipient,
  invalidBandRange,
  invalidTimeZone,
  noBands,
  validationFailed,
} from "./errors.js";
import {
  AlarmEntrySchema,
  AlarmFileSchema,
  type LoadedAlarms,
  type RejectedAlarm,
} from "./schema.js";

/**
 * Flatten zod issues into "path: message" strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}

function fromBandError(error: BandError): ConfigError {
  switch (error.type) {
    case "INVALID_RANGE":
      return invalidBandRange(error.index, error.gt, error.lt);
    case "NO_BANDS":
      return noBands();
  }
}

/**
 * Validate one alarm entry.
 */
export function parseAlarmEntry(entry: unknown): Result<AlarmConfig, ConfigError> {
  const parsed = AlarmEntrySchema.safeParse(entry);
  if (!parsed.success) {
    return err(
      validationFailed("Invalid alarm definition", formatZodIssues(parsed.error)),
    );
  }

  const { kind, deviceId, name, limits } = parsed.data;

  const bands = validateBands(limits.map(limitToBand));
  if (bands.isErr()) {
    return err(fromBandError(bands.error));
  }

  const recipients = parsed.data.recipients.map(normalizeRecipient);

  const duplicates = findDuplicateTargets(recipients);
  if (duplicates.length > 0) {
    return err(duplicateRecipient(duplicates));
  }

  for (const recipient of recipients) {
    if (recipient.timeZone !== null && !isValidTimeZone(recipient.timeZone)) {
      return err(invalidTimeZone(recipient.target, recipient.timeZone));
    }
  }

  return ok({ kind, deviceId, name, bands: bands.value, recipients });
}

/**
 * Name used to report a rejected entry.
 */
function entryLabel(entry: unknown, index: number): string {
  if (typeof entry === "object" && entry !== null && "name" in entry) {
    const { name } = entry;
    if (typeof name === "string" && name !== "") {
      return name;
    }
  }
  return `alarms[${index}]`;
}

/**
 * Validate the whole definition file.
 *
 * Fails only when the top-level shape is wrong. Invalid entries, and any
 * entry reusing an earlier alarm's name, are returned as rejected.
 */
export function parseAlarmFile(data: unknown): Result<LoadedAlarms, ConfigError> {
  const file = AlarmFileSchema.safeParse(data);
  if (!file.success) {
    return err(
      validationFailed("Invalid alarm file", formatZodIssues(file.error)),
    );
  }

  const alarms: AlarmConfig[] = [];
  const rejected: RejectedAlarm[] = [];
  const names = new Set<string>();

  for (const [index, entry] of file.data.alarms.entries()) {
    const result = parseAlarmEntry(entry);

    if (result.isErr()) {
      rejected.push({ name: entryLabel(entry, index), error: result.error });
      continue;
    }

    const alarm = result.value;
    if (names.has(alarm.name)) {
      rejected.push({ name: alarm.name, error: duplicateAlarm(alarm.name) });
      continue;
    }

    names.add(alarm.name);
    alarms.push(alarm);
  }

  return ok({ alarms, rejected });
}
