/**
 * @module contracts
 *
 * Central type definitions shared by discovery, the runner, the report
 * renderer and the CLI.
 *
 * @see {@link OrderedFile} - A discovered, prefix-ordered pipeline step
 * @see {@link RunRecord} - Per-step timing and outcome
 * @see {@link RunReport} - Ordered projection of every step
 * @see {@link ProcessLauncher} - Process collaborator used by the runner
 */

import type { InvocationFailure } from '../../errors.js';

/** Recursive JSON-compatible value type used for log fields. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Extension (leading dot included) to the command tokens that execute it. */
export type ExtensionMap = Record<string, readonly string[]>;

/** A directory entry whose name starts with `<integer>-`. */
export interface OrderedFile {
  /** Parsed integer prefix, unique across one discovery. */
  readonly order: bigint;
  /** The full filename, prefix included. */
  readonly name: string;
}

/** A step that has started but whose invocation has not returned yet. */
export interface InProgressRecord {
  state: 'in-progress';
  startTime: Date;
}

/** A step whose invocation returned or failed. */
export interface FinalizedRecord {
  state: 'finalized';
  startTime: Date;
  endTime: Date;
  elapsedMinutes: number;
  ranSuccessfully: boolean;
  /** Error message when the step failed. */
  error?: string;
}

/**
 * Bookkeeping for one execution attempt. A step that was never attempted
 * has no record at all.
 */
export type RunRecord = InProgressRecord | FinalizedRecord;

export type StepStatus = 'not-attempted' | 'running' | 'success' | 'failure';

/** One row of a {@link RunReport}. */
export interface ReportEntry {
  order: bigint;
  name: string;
  status: StepStatus;
  startTime?: Date;
  endTime?: Date;
  elapsedMinutes?: number;
}

export interface RunReport {
  /** Normalized directory the steps were discovered in. */
  directory: string;
  /** When the runner was created. */
  initializedAt: Date;
  entries: ReportEntry[];
}

/** Filesystem collaborator: immediate entries of a directory, by name. */
export interface DirectoryReader {
  list: (directory: string) => Promise<string[]>;
}

/** Result of spawning one command and waiting for it to exit. */
export type LaunchOutcome =
  | { ok: true; exitCode: number }
  | { ok: false; error: InvocationFailure };

/** Process collaborator: spawns a command and resolves once it exits. */
export interface ProcessLauncher {
  launch: (tokens: readonly string[]) => Promise<LaunchOutcome>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogger {
  debug: (message: string, fields?: Record<string, JsonValue>) => void;
  info: (message: string, fields?: Record<string, JsonValue>) => void;
  warn: (message: string, fields?: Record<string, JsonValue>) => void;
  error: (message: string, fields?: Record<string, JsonValue>) => void;
}

/** Resolved runtime configuration (see runtime-config). */
export interface RuntimeConfig {
  extensions: Record<string, string[]>;
  logging: {
    level: LogLevel;
  };
  process: {
    failOnNonZeroExit: boolean;
  };
}

/** Command line overrides applied on top of the config files. */
export interface RuntimeFlags {
  configPath?: string;
  extensions?: Record<string, string[]>;
  logLevel?: LogLevel;
  failOnNonZeroExit?: boolean;
}
