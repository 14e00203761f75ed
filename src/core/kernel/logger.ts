import type { JsonValue, LogLevel, StructuredLogger } from './contracts.js';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  fields?: Record<string, JsonValue>;
}

export interface RunLogger extends StructuredLogger {
  subscribe: (listener: (entry: LogEntry) => void) => () => void;
  setTerminalOutputEnabled: (enabled: boolean) => void;
  setLevel: (level: LogLevel) => void;
}

function shouldLog(current: LogLevel, incoming: LogLevel): boolean {
  return LEVELS.indexOf(incoming) >= LEVELS.indexOf(current);
}

export function createLogger(initialLevel: LogLevel = 'info'): RunLogger {
  const listeners = new Set<(entry: LogEntry) => void>();
  let level = initialLevel;
  let terminalOutputEnabled = true;

  const write = (incoming: LogLevel, message: string, fields?: Record<string, JsonValue>): void => {
    if (!shouldLog(level, incoming)) {
      return;
    }

    const payload: LogEntry = {
      ts: new Date().toISOString(),
      level: incoming,
      message,
      ...(fields ? { fields } : {})
    };

    for (const listener of listeners) {
      try {
        listener(payload);
      } catch {
        // A failing listener must not interrupt a step or skip its record.
      }
    }

    if (!terminalOutputEnabled) {
      return;
    }

    // stdout belongs to the steps and the report.
    process.stderr.write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    setTerminalOutputEnabled: (enabled) => {
      terminalOutputEnabled = enabled;
    },
    setLevel: (next) => {
      level = next;
    }
  };
}

export function noopLogger(): StructuredLogger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}
