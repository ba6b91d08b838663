import { appendFileSync, writeFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Minimum level a sink records; "silent" records nothing. */
export type LogThreshold = LogLevel | "silent";

export type LogContext = Readonly<Record<string, unknown>>;

export interface DiagnosticsSink {
  log(level: LogLevel, message: string, context?: LogContext): void;
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: LogContext;
}

export interface MemorySink extends DiagnosticsSink {
  readonly entries: readonly LogEntry[];
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: LogLevel, threshold: LogThreshold): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function formatEntry(level: LogLevel, message: string, context?: LogContext): string {
  const suffix =
    context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `${level.toUpperCase()} ${message}${suffix}`;
}

export const silentSink: DiagnosticsSink = {
  log(): void {},
};

export function createFileSink(
  logPath: string,
  threshold: LogThreshold = "debug",
): DiagnosticsSink {
  // Initialize the log file (truncate if exists)
  writeFileSync(logPath, "");

  return {
    log(level, message, context): void {
      if (!enabled(level, threshold)) return;
      const timestamp = new Date().toISOString();
      appendFileSync(logPath, `[${timestamp}] ${formatEntry(level, message, context)}\n`);
    },
  };
}

export function createConsoleSink(threshold: LogThreshold = "warn"): DiagnosticsSink {
  return {
    log(level, message, context): void {
      if (enabled(level, threshold)) {
        console.error(formatEntry(level, message, context));
      }
    },
  };
}

export function createMemorySink(): MemorySink {
  const entries: LogEntry[] = [];
  return {
    entries,
    log(level, message, context): void {
      entries.push(context === undefined ? { level, message } : { level, message, context });
    },
  };
}

export function combineSinks(...sinks: DiagnosticsSink[]): DiagnosticsSink {
  return {
    log(level, message, context): void {
      for (const sink of sinks) {
        sink.log(level, message, context);
      }
    },
  };
}
