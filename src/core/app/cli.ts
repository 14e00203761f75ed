/**
 * CLI Entry Point - Command line argument handling and the run/report cycle
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, PrefixRunError } from '../../errors.js';
import { loadRuntimeConfig, parseExtensionFlag } from '../config/runtime-config.js';
import type { DirectoryReader, LogLevel, ProcessLauncher, RuntimeFlags } from '../kernel/contracts.js';
import { createLogger, type RunLogger } from '../kernel/logger.js';
import { PrefixRunner } from '../pipeline/runner.js';
import { NodeProcessLauncher } from '../pipeline/process-launcher.js';
import { createPalette, errorBlock, successBlock, type Palette } from '../ui/colors.js';

export const EXIT_OK = 0;
export const EXIT_PIPELINE_FAILED = 1;
export const EXIT_USAGE = 2;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface CliArgs {
  directory?: string;
  flags: RuntimeFlags;
  list: boolean;
  help: boolean;
  version: boolean;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  io?: CliIO;
  color?: boolean;
  cwd?: string;
  reader?: DirectoryReader;
  /** Replaces the launcher built from the resolved config. */
  launcher?: ProcessLauncher;
  logger?: RunLogger;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function takeValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigError(`${flag} expects a value`);
  }
  return value;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws ConfigError on unknown options, missing values, or a second directory.
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { flags: {}, list: false, help: false, version: false };
  const extensions: Record<string, string[]> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      case '-v':
      case '--version':
        parsed.version = true;
        break;
      case '-l':
      case '--list':
        parsed.list = true;
        break;
      case '--allow-nonzero-exit':
        parsed.flags.failOnNonZeroExit = false;
        break;
      case '-e':
      case '--ext': {
        const [extension, tokens] = parseExtensionFlag(takeValue(args, i, arg));
        extensions[extension] = tokens;
        i++;
        break;
      }
      case '-c':
      case '--config':
        parsed.flags.configPath = takeValue(args, i, arg);
        i++;
        break;
      case '--log-level': {
        const level = takeValue(args, i, arg);
        if (!isLogLevel(level)) {
          throw new ConfigError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`);
        }
        parsed.flags.logLevel = level;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--ext=')) {
          const [extension, tokens] = parseExtensionFlag(arg.slice('--ext='.length));
          extensions[extension] = tokens;
        } else if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        } else if (parsed.directory === undefined) {
          parsed.directory = arg;
        } else {
          throw new ConfigError(`Only one directory may be given (got "${parsed.directory}" and "${arg}")`);
        }
    }
  }

  if (Object.keys(extensions).length > 0) {
    parsed.flags.extensions = extensions;
  }
  return parsed;
}

export function usage(c: Palette): string {
  return `
${c.violet('prefixrun')} - Run the <integer>-prefixed files of a directory in order

${c.bold('Usage:')}
  prefixrun [directory] [options]

${c.bold('Options:')}
  -e, --ext EXT=COMMAND   Run files ending in EXT with COMMAND (e.g. --ext .sh=zsh)
  -c, --config PATH       User config file (default ~/.prefixrun/config.json)
  -l, --list              Show the run order and commands without running anything
  --allow-nonzero-exit    Count a step that exits non-zero as a success
  --log-level LEVEL       debug, info, warn or error
  -h, --help              Show this help
  -v, --version           Show version
`;
}

export function readVersion(): string {
  const raw = readFileSync(new URL('../../../package.json', import.meta.url), 'utf8');
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function listSteps(runner: PrefixRunner, io: CliIO, c: Palette): void {
  if (runner.files.length === 0) {
    io.stdout(c.muted(`No prefixed files in ${runner.directory}`));
    return;
  }
  for (const file of runner.files) {
    let command: string;
    try {
      command = runner.invocationFor(file).join(' ');
    } catch (error) {
      if (!(error instanceof PrefixRunError)) {
        throw error;
      }
      command = c.warning(error.message);
    }
    io.stdout(`${String(file.order).padStart(4)}  ${file.name}  ${c.muted('→')} ${command}`);
  }
}

/**
 * Runs the CLI and resolves with the process exit status. The report is
 * printed whether or not the pipeline fails.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIO;
  const c = createPalette(options.color ?? false);

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(errorBlock(c, error.message));
      io.stderr(c.muted('Run prefixrun --help for usage.'));
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    io.stdout(usage(c));
    return EXIT_OK;
  }
  if (args.version) {
    io.stdout(`prefixrun ${readVersion()}`);
    return EXIT_OK;
  }

  const directory = resolve(options.cwd ?? process.cwd(), args.directory ?? '.');

  let runner: PrefixRunner;
  try {
    const config = await loadRuntimeConfig(directory, args.flags);
    const logger = options.logger ?? createLogger(config.logging.level);
    logger.setLevel(config.logging.level);
    runner = await PrefixRunner.create(
      { directory, extensions: config.extensions },
      {
        reader: options.reader,
        launcher: options.launcher ?? new NodeProcessLauncher({ failOnNonZeroExit: config.process.failOnNonZeroExit }),
        logger,
      },
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(errorBlock(c, error.message));
      return EXIT_USAGE;
    }
    if (error instanceof PrefixRunError) {
      io.stderr(errorBlock(c, error.message));
      return EXIT_PIPELINE_FAILED;
    }
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      io.stderr(errorBlock(c, `Not a directory: ${directory}`));
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.list) {
    listSteps(runner, io, c);
    return EXIT_OK;
  }

  let failure: PrefixRunError | undefined;
  try {
    await runner.run();
  } catch (error) {
    if (!(error instanceof PrefixRunError)) {
      throw error;
    }
    failure = error;
  } finally {
    io.stdout(runner.toString());
  }

  if (failure) {
    io.stderr(errorBlock(c, failure.message));
    return EXIT_PIPELINE_FAILED;
  }
  io.stdout(successBlock(c, `${runner.files.length} step(s) completed`));
  return EXIT_OK;
}
