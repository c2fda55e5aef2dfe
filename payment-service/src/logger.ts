import { config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  traceId?: string;
  paymentId?: number;
  [key: string]: unknown;
}

const LEVEL_WEIGHT: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function threshold(): number {
  const weight = LEVEL_WEIGHT[config.LOG_LEVEL];
  // debug lines never reach production output
  if (config.NODE_ENV === "production") return Math.max(weight, LEVEL_WEIGHT.info);
  return weight;
}

export function formatLog(level: LogLevel, msg: string, context?: LogContext): string {
  const log = {
    timestamp: new Date().toISOString(),
    level,
    service: config.SERVICE_NAME,
    msg,
    ...(context || {}),
  };
  return JSON.stringify(log);
}

function pushToLoki(line: string, level: LogLevel, context?: LogContext): void {
  if (!config.LOKI_URL) return;
  const stream: Record<string, string> = { service: config.SERVICE_NAME, level };
  if (context?.traceId) stream.traceId = String(context.traceId);
  const body = {
    streams: [
      {
        stream,
        values: [[String(Date.now() * 1_000_000), line]],
      },
    ],
  };
  fetch(`${config.LOKI_URL.replace(/\/$/, "")}/loki/api/v1/push`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }).catch((err: unknown) => {
    process.stderr.write(formatLog("warn", "Loki push failed", { error: String(err) }) + "\n");
  });
}

function write(level: LogLevel, msg: string, context?: LogContext): void {
  if (LEVEL_WEIGHT[level] < threshold()) return;
  const line = formatLog(level, msg, context);
  if (level === "error") process.stderr.write(line + "\n");
  else process.stdout.write(line + "\n");
  pushToLoki(line, level, context);
}

export const logger = {
  info(msg: string, context?: LogContext): void {
    write("info", msg, context);
  },
  error(msg: string, context?: LogContext): void {
    write("error", msg, context);
  },
  warn(msg: string, context?: LogContext): void {
    write("warn", msg, context);
  },
  debug(msg: string, context?: LogContext): void {
    write("debug", msg, context);
  },
};
