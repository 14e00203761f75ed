/**
 * prefixrun Error Classes
 */

export class PrefixRunError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'PrefixRunError';
  }
}

/** Two or more eligible files share an integer prefix. */
export class ValidationError extends PrefixRunError {
  constructor(
    message: string,
    public duplicates: Record<string, string[]>,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

function describeExtension(extension: string): string {
  return extension === '' ? 'files without an extension' : `extension "${extension}"`;
}

export class UnknownExtensionError extends PrefixRunError {
  constructor(
    public fileName: string,
    public extension: string,
  ) {
    super(`No command is configured for ${describeExtension(extension)} (file ${fileName})`, 'UNKNOWN_EXTENSION');
    this.name = 'UnknownExtensionError';
  }
}

export type InvocationFailureCode = 'COMMAND_NOT_FOUND' | 'SPAWN_ERROR' | 'COMMAND_FAILED';

export interface InvocationFailureDetails {
  command: readonly string[];
  exitCode?: number;
  signal?: string;
}

/** The process collaborator could not run a step, or the step exited unsuccessfully. */
export class InvocationFailure extends PrefixRunError {
  public command: readonly string[];
  public exitCode?: number;
  public signal?: string;

  constructor(message: string, code: InvocationFailureCode, details: InvocationFailureDetails) {
    super(message, code);
    this.name = 'InvocationFailure';
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
  }
}

export class ConfigError extends PrefixRunError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class RunInProgressError extends PrefixRunError {
  constructor() {
    super('A run is already in progress on this runner', 'RUN_IN_PROGRESS');
    this.name = 'RunInProgressError';
  }
}
