export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Structured logger used by the extraction engine. Events are namespaced
 * `schemaloop:<event>`; `meta` carries the run id and attempt details.
 */
export interface ExtractionLogger {
  debug: (event: string, meta?: Record<string, unknown>) => void;
  info: (event: string, meta?: Record<string, unknown>) => void;
  warn: (event: string, meta?: Record<string, unknown>) => void;
  error: (event: string, meta?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function format(level: Exclude<LogLevel, "silent">, event: string, meta?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${event}${metaStr}`;
}

/**
 * Console-backed logger that drops entries below `level`.
 */
export function createConsoleLogger(level: LogLevel = "warn"): ExtractionLogger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug: (event, meta) => {
      if (enabled("debug")) console.debug(format("debug", event, meta));
    },
    info: (event, meta) => {
      if (enabled("info")) console.info(format("info", event, meta));
    },
    warn: (event, meta) => {
      if (enabled("warn")) console.warn(format("warn", event, meta));
    },
    error: (event, meta) => {
      if (enabled("error")) console.error(format("error", event, meta));
    },
  };
}

export const silentLogger: ExtractionLogger = createConsoleLogger("silent");
