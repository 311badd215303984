import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  nodeEnv?: string;
}

// ─── Logger ───────────────────────────────────────────────
// Raw JSON in production for log aggregators, pino-pretty everywhere else
// except under test where the worker transport would outlive the run.
export function createLogger(options: LoggerOptions = {}): Logger {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? "development";
  const pretty = nodeEnv !== "production" && nodeEnv !== "test";

  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    transport: pretty ? { target: "pino-pretty" } : undefined,
  });
}

// For reporting startup failures: LOG_LEVEL may itself be the bad setting,
// so the level is fixed rather than read from the environment.
export function createBootLogger(nodeEnv: string | undefined = process.env.NODE_ENV): Logger {
  return createLogger({ level: "info", nodeEnv });
}
