import type { CheckKind, CheckStatus, ModeName, ModeStatus } from './checks';

/**
 * Base interface for all precheck events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the mode run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a mode run starts.
 */
export interface ModeStarted extends BaseEvent {
  type: 'ModeStarted';
  payload: {
    mode: ModeName;
    checkCount: number;
    /** Wall-clock budget for the whole batch, 0 when unbounded */
    maxDurationMs: number;
  };
}

/** Emitted when a single check is dispatched to a worker */
export interface CheckStarted extends BaseEvent {
  type: 'CheckStarted';
  payload: {
    name: string;
    kind: CheckKind;
  };
}

/** Emitted when a single check settles, whatever the outcome */
export interface CheckFinished extends BaseEvent {
  type: 'CheckFinished';
  payload: {
    name: string;
    kind: CheckKind;
    status: CheckStatus;
    durationMs: number;
  };
}

/** Emitted when a missing prerequisite was fetched and then probed successfully */
export interface PrerequisiteInstalled extends BaseEvent {
  type: 'PrerequisiteInstalled';
  payload: {
    helpCommand: string[];
    url: string;
  };
}

/**
 * Emitted when a mode run completes.
 */
export interface ModeFinished extends BaseEvent {
  type: 'ModeFinished';
  payload: {
    mode: ModeName;
    status: ModeStatus;
    durationMs: number;
    failedChecks: string[];
  };
}

export type PrecheckEvent =
  | ModeStarted
  | CheckStarted
  | CheckFinished
  | PrerequisiteInstalled
  | ModeFinished;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event without the metadata the emitter stamps on it */
export type PrecheckEventBody = DistributiveOmit<
  PrecheckEvent,
  'schemaVersion' | 'timestamp' | 'runId'
>;
