/**
 * Alarm Module - Schemas and Types
 *
 * Types for one alarm: its validated configuration, the events produced
 * by an evaluation cycle, and the engine that owns per-alarm state.
 */
import type { Result } from "neverthrow";

import type { BandSet } from "../bands/index.js";
import type { CooldownEntry } from "../cooldown/index.js";
import type {
  ForecastError,
  ForecastSample,
  ForecastSource,
} from "../forecast/index.js";
import type { MetricKind, ValueExtractor } from "../metrics/index.js";
import type { NotificationGateway } from "../notifications/index.js";
import type { Recipient } from "../recipients/index.js";
import type { StatusPingSnapshot } from "../status-ping/index.js";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Validated, immutable alarm configuration.
 */
export type AlarmConfig = Readonly<{
  kind: MetricKind;
  /** Home Assistant device id of the weather integration */
  deviceId: string;
  name: string;
  bands: BandSet;
  recipients: ReadonlyArray<Recipient>;
}>;

// =============================================================================
// Evaluation
// =============================================================================

/**
 * First sample in a forecast window that matched a tier.
 */
export type TierOccurrence = Readonly<{
  bandIndex: number;
  timestamp: number;
  value: number;
}>;

/**
 * Result of scanning a forecast window.
 */
export type WindowScan = Readonly<{
  /** One entry per matched tier, in order of first occurrence */
  occurrences: ReadonlyArray<TierOccurrence>;
  scanned: number;
  /** Samples without a value */
  skipped: number;
}>;

/**
 * A notification decided on during one cycle.
 */
export type AlarmEvent = Readonly<{
  recipient: string;
  bandIndex: number;
  message: string;
  sampleTimestamp: number;
  value: number;
}>;

/**
 * Outcome of one evaluation cycle.
 */
export type CycleReport = Readonly<{
  alarm: string;
  evaluatedAt: number;
  samplesScanned: number;
  samplesSkipped: number;
  tiersMatched: ReadonlyArray<number>;
  sent: number;
  /** Skipped because the (recipient, tier) pair was in cooldown */
  suppressed: number;
  failed: number;
  statusSent: number;
}>;

// =============================================================================
// Engine
// =============================================================================

/**
 * Collaborators injected into an engine.
 */
export type AlarmEngineDeps = Readonly<{
  config: AlarmConfig;
  extractor: ValueExtractor;
  forecastSource: ForecastSource;
  gateway: NotificationGateway;
  /** Zone for recipients without their own, and for message timestamps */
  defaultTimeZone: string;
}>;

/**
 * Read-only view of an engine's state.
 */
export type AlarmSnapshot = Readonly<{
  name: string;
  kind: MetricKind;
  deviceId: string;
  recipients: ReadonlyArray<string>;
  bands: BandSet;
  lastCycle: CycleReport | null;
  lastError: string | null;
  cooldowns: ReadonlyArray<CooldownEntry>;
  statusPings: ReadonlyArray<StatusPingSnapshot>;
}>;

/**
 * One alarm: bands, cooldowns and status pings for one weather parameter.
 * Operations on the same engine never interleave.
 */
export interface AlarmEngine {
  readonly config: AlarmConfig;
  /** Evaluate a forecast window and dispatch notifications */
  runCycle(
    samples: ReadonlyArray<ForecastSample>,
    now: number,
  ): Promise<CycleReport>;
  /** Fetch the forecast, then run a cycle. A failed fetch aborts the cycle. */
  checkForecast(now: number): Promise<Result<CycleReport, ForecastError>>;
  /** Send due startup/daily status pings; resolves to the number sent */
  runStatusPings(now: number): Promise<number>;
  getSnapshot(): AlarmSnapshot;
}
