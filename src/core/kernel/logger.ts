import type { JsonValue, LogLevel, StructuredLogger } from './contracts.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  fields?: Record<string, JsonValue>;
}

export interface KernelLogger extends StructuredLogger {
  subscribe: (listener: (entry: LogEntry) => void) => () => void;
  setTerminalOutputEnabled: (enabled: boolean) => void;
  setLevel: (level: LogLevel) => void;
  /** Logger that stamps every entry with `fields.source`. */
  child: (source: string) => StructuredLogger;
}

type Sink = (level: LogLevel, message: string, fields?: Record<string, JsonValue>) => void;

function methods(sink: Sink, stamp?: Record<string, JsonValue>): StructuredLogger {
  const emit = (level: LogLevel) => (message: string, fields?: Record<string, JsonValue>) =>
    sink(level, message, stamp ? { ...stamp, ...fields } : fields);
  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
}

/**
 * JSON-lines logger on stderr. Subscribers see every entry at or above the
 * threshold, whether or not terminal output is on.
 */
export function createLogger(initialLevel: LogLevel = 'info'): KernelLogger {
  const listeners = new Set<(entry: LogEntry) => void>();
  let threshold = RANK[initialLevel];
  let terminalOutputEnabled = true;

  const sink: Sink = (level, message, fields) => {
    if (RANK[level] < threshold) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...(fields ? { fields } : {})
    };

    for (const listener of listeners) {
      try {
        listener(entry);
      } catch (error) {
        // Reported straight to stderr; routing it through the listeners could loop.
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`${JSON.stringify({ ts: entry.ts, level: 'warn', message: 'Log listener failed', fields: { reason } })}\n`);
      }
    }

    if (terminalOutputEnabled) {
      process.stderr.write(`${JSON.stringify(entry)}\n`);
    }
  };

  return {
    ...methods(sink),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    setTerminalOutputEnabled: (enabled) => {
      terminalOutputEnabled = enabled;
    },
    setLevel: (level) => {
      threshold = RANK[level];
    },
    child: (source) => methods(sink, { source })
  };
}
