export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];
export type LogLevelSetting = LogLevel | "silent";

export const logLevelOrder: Record<LogLevelSetting, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export type LogContext = {
  /** 事件名稱，會取代 level 顯示於路徑後方 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
  cause?: SerializedError | string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

/**
 * 兩種呼叫方式：
 * - logger.info(context, "訊息")
 * - logger.info(context)`訊息 ${value}`，插值會上色並以 __0, __1 記入 context
 */
export interface Logger {
  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;

  /** 建立子命名空間，path 以 ":" 串接 */
  extend(name: string, context?: LogContext): Logger;
  /** 合併 context 但不改變 path */
  append(context: LogContext): Logger;
}

export function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) {
    const cause =
      error.cause instanceof Error
        ? serializeError(error.cause)
        : error.cause !== undefined
          ? String(error.cause)
          : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(cause ? { cause } : {}),
    };
  }
  if (typeof error === "object" && "message" in error) {
    const type = "type" in error ? String(error.type) : "Error";
    return { name: type, message: String(error.message) };
  }
  return { name: "Error", message: String(error) };
}
