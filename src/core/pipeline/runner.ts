/**
 * @module pipeline/runner
 *
 * Executes the steps of a directory one at a time in prefix order, keeping a
 * {@link RunRecord} per attempted step and stopping at the first failure.
 *
 * Key exports:
 * - {@link PrefixRunner} - The runner itself
 * - {@link ensureTrailingSeparator} - Directory normalization
 */

import { sep } from 'node:path';
import { RunInProgressError, type InvocationFailure } from '../../errors.js';
import type {
  DirectoryReader,
  ExtensionMap,
  FinalizedRecord,
  OrderedFile,
  ProcessLauncher,
  ReportEntry,
  RunRecord,
  RunReport,
  StructuredLogger,
} from '../kernel/contracts.js';
import { noopLogger } from '../kernel/logger.js';
import { renderReport } from '../report/format.js';
import { createDirectoryReader } from './directory-reader.js';
import { discover } from './discovery.js';
import { defaultExtensions, mergeExtensions, resolveCommand } from './extensions.js';
import { NodeProcessLauncher } from './process-launcher.js';

export interface PrefixRunnerOptions {
  /** Directory holding the steps. Resolved by the caller; never defaulted here. */
  directory: string;
  /** Per-extension overrides of the default command table. */
  extensions?: ExtensionMap;
}

export interface PrefixRunnerDeps {
  reader?: DirectoryReader;
  launcher?: ProcessLauncher;
  logger?: StructuredLogger;
  now?: () => Date;
}

const MS_PER_MINUTE = 60_000;

/** Appends a single path separator to `directory` unless it already ends in one. */
export function ensureTrailingSeparator(directory: string): string {
  if (directory.endsWith('/') || directory.endsWith(sep)) {
    return directory;
  }
  return `${directory}${sep}`;
}

function cloneRecord(record: RunRecord): RunRecord {
  if (record.state === 'in-progress') {
    return { state: 'in-progress', startTime: new Date(record.startTime) };
  }
  return {
    ...record,
    startTime: new Date(record.startTime),
    endTime: new Date(record.endTime),
  };
}

export class PrefixRunner {
  readonly directory: string;
  readonly files: readonly OrderedFile[];
  readonly initializedAt: Date;

  private readonly extensionMap: Record<string, string[]>;
  private readonly launcher: ProcessLauncher;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly records = new Map<string, RunRecord>();
  private running = false;

  private constructor(
    directory: string,
    files: readonly OrderedFile[],
    extensionMap: Record<string, string[]>,
    deps: Required<Omit<PrefixRunnerDeps, 'reader'>>,
  ) {
    this.directory = directory;
    this.files = Object.freeze([...files]);
    this.extensionMap = extensionMap;
    this.launcher = deps.launcher;
    this.logger = deps.logger;
    this.now = deps.now;
    this.initializedAt = deps.now();
  }

  /**
   * Normalizes the directory, merges the extension table and discovers the
   * steps. The step order is fixed from here on.
   *
   * @throws ValidationError when two steps share a prefix.
   */
  static async create(options: PrefixRunnerOptions, deps: PrefixRunnerDeps = {}): Promise<PrefixRunner> {
    const directory = ensureTrailingSeparator(options.directory);
    const logger = deps.logger ?? noopLogger();
    const files = await discover(directory, deps.reader ?? createDirectoryReader());

    if (files.length === 0) {
      logger.warn('No prefixed files found', { directory });
    } else {
      logger.debug('Discovered steps', { directory, steps: files.map((file) => file.name) });
    }

    return new PrefixRunner(directory, files, mergeExtensions(options.extensions), {
      launcher: deps.launcher ?? new NodeProcessLauncher(),
      logger,
      now: deps.now ?? (() => new Date()),
    });
  }

  /** The built-in extension table. */
  static defaultExtensions(): Record<string, string[]> {
    return defaultExtensions();
  }

  /** Defaults plus any overrides given at creation. */
  get extensions(): Record<string, string[]> {
    return mergeExtensions({}, this.extensionMap);
  }

  /** Command tokens that {@link run} spawns for `file`. */
  invocationFor(file: OrderedFile): string[] {
    return [...resolveCommand(file.name, this.extensionMap), `${this.directory}${file.name}`];
  }

  recordFor(fileName: string): RunRecord | undefined {
    const record = this.records.get(fileName);
    return record ? cloneRecord(record) : undefined;
  }

  /**
   * Runs every step from the first, replacing the records of any earlier run.
   * Resolves with the report once all steps succeed.
   *
   * @throws UnknownExtensionError before spawning a step with an unmapped extension.
   * @throws InvocationFailure after recording the failed step.
   * In both cases {@link report} still reflects everything attempted.
   */
  async run(): Promise<RunReport> {
    if (this.running) {
      throw new RunInProgressError();
    }
    this.running = true;
    this.records.clear();
    try {
      for (const file of this.files) {
        await this.runStep(file);
      }
    } finally {
      this.running = false;
    }
    this.logger.info('Pipeline finished', { directory: this.directory, steps: this.files.length });
    return this.report();
  }

  private async runStep(file: OrderedFile): Promise<void> {
    const tokens = this.invocationFor(file);
    const startTime = this.now();
    this.records.set(file.name, { state: 'in-progress', startTime });
    this.logger.info('Step started', { order: file.order.toString(), file: file.name, command: tokens });

    let failure: InvocationFailure | undefined;
    try {
      const outcome = await this.launcher.launch(tokens);
      if (!outcome.ok) {
        failure = outcome.error;
      }
    } catch (error) {
      // Unexpected launcher errors still close the record before propagating.
      this.finalize(file, startTime, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }

    const record = this.finalize(file, startTime, failure);
    if (failure) {
      throw failure;
    }
    this.logger.info('Step finished', { order: file.order.toString(), file: file.name, elapsedMinutes: record.elapsedMinutes });
  }

  private finalize(file: OrderedFile, startTime: Date, failure?: Error): FinalizedRecord {
    const endTime = this.now();
    const record: FinalizedRecord = {
      state: 'finalized',
      startTime,
      endTime,
      elapsedMinutes: (endTime.getTime() - startTime.getTime()) / MS_PER_MINUTE,
      ranSuccessfully: failure === undefined,
      ...(failure ? { error: failure.message } : {}),
    };
    this.records.set(file.name, record);
    if (failure) {
      this.logger.error('Step failed', { order: file.order.toString(), file: file.name, error: failure.message });
    }
    return record;
  }

  /** Ordered projection of the records; steps never attempted come out as `not-attempted`. */
  report(): RunReport {
    const entries = this.files.map((file): ReportEntry => {
      const record = this.records.get(file.name);
      if (!record) {
        return { order: file.order, name: file.name, status: 'not-attempted' };
      }
      if (record.state === 'in-progress') {
        return { order: file.order, name: file.name, status: 'running', startTime: new Date(record.startTime) };
      }
      return {
        order: file.order,
        name: file.name,
        status: record.ranSuccessfully ? 'success' : 'failure',
        startTime: new Date(record.startTime),
        endTime: new Date(record.endTime),
        elapsedMinutes: record.elapsedMinutes,
      };
    });
    return { directory: this.directory, initializedAt: new Date(this.initializedAt), entries };
  }

  toString(): string {
    return renderReport(this.report());
  }
}
