import kleur from "kleur";

import { dispose } from "~shared/utils/Disposeable";

import {
  type LogContext,
  type LogLevel,
  type LogLevelSetting,
  type LogRecord,
  type LogTransport,
  type Logger,
  type TemplateLog,
  logLevelOrder,
  serializeError,
} from "./Logger";

export type EmojiMap = Partial<Record<string, string>>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

type LoggerConsoleOptions = {
  /** 與子 logger 共用同一個陣列，attachTransport 會影響整棵 logger 樹 */
  transports?: LogTransport[];
  /** false 時只寫入 transport，不輸出到 console */
  console?: boolean;
};

export class LoggerConsole implements Logger {
  private readonly transports: LogTransport[];
  private readonly consoleEnabled: boolean;

  constructor(
    readonly level: LogLevelSetting = "info",
    readonly path: readonly string[] = [],
    readonly context: LogContext = {},
    readonly emojiMap: EmojiMap = defaultEmojiMap,
    options: LoggerConsoleOptions = {}
  ) {
    this.transports = options.transports ?? [];
    this.consoleEnabled = options.console ?? true;
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 釋放所有 transport；子 logger 共用同一組，只需由根 logger 呼叫 */
  async [Symbol.asyncDispose]() {
    await dispose(...this.transports.splice(0));
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      { transports: this.transports, console: this.consoleEnabled }
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      { transports: this.transports, console: this.consoleEnabled }
    );
  }

  isEnabled(level: LogLevel) {
    return logLevelOrder[level] >= logLevelOrder[this.level];
  }

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("trace", contextOrMessage, message);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("debug", contextOrMessage, message);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  info(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("info", contextOrMessage, message);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("warn", contextOrMessage, message);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;
  error(contextOrMessage?: LogContext | string, message?: string) {
    return this.dispatch("error", contextOrMessage, message);
  }

  private dispatch(
    level: LogLevel,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): TemplateLog | undefined {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage);
      return undefined;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message);
      return undefined;
    }
    return (strings, ...values) => {
      let plain = strings[0] ?? "";
      let colored = plain;
      const templateValues: Record<string, unknown> = {};
      values.forEach((value, i) => {
        const text = formatValue(value);
        const tail = strings[i + 1] ?? "";
        plain += text + tail;
        colored += kleur.green(text) + tail;
        templateValues[`__${i}`] = value;
      });
      this.write(level, { ...context, ...templateValues }, plain, colored);
    };
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    plainMessage: string,
    consoleMessage: string
  ) {
    if (!this.isEnabled(level)) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...callContext };
    const eventName =
      typeof callContext.event === "string" ? callContext.event : undefined;
    const label = [...this.path, eventName ?? level].join(":");
    const time = new Date();

    if (this.consoleEnabled) {
      const icon = this.pickEmoji(level, callContext, emoji);
      const extra =
        Object.keys(rest).length > 0 ? ` ${kleur.dim(safeStringify(rest))}` : "";
      const line = `${kleur.gray(time.toISOString())} ${icon} ${label}: ${consoleMessage}${extra}`;
      if (level === "error") {
        const stack = error instanceof Error ? `\n${error.stack}` : "";
        console.error(line + stack);
      } else if (level === "warn") {
        console.warn(line);
      } else if (level === "info") {
        console.info(line);
      } else {
        console.debug(line);
      }
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: time.toISOString(),
      level,
      path: this.path.join(":"),
      event: typeof event === "string" ? event : undefined,
      msg: plainMessage,
      context: rest,
      err: serializeError(error),
    };
    for (const transport of this.transports) {
      try {
        transport.write(record);
      } catch (transportError) {
        console.error("log transport write failed", transportError);
      }
    }
  }

  /**
   * 呼叫時指定的 emoji 優先，其次為事件對應的 emoji；
   * warn/error 一律使用層級 emoji，info 以下才沿用 extend 時帶入的 emoji。
   */
  private pickEmoji(
    level: LogLevel,
    callContext: LogContext,
    inherited: unknown
  ) {
    if (typeof callContext.emoji === "string") return callContext.emoji;
    const byEvent =
      typeof callContext.event === "string"
        ? this.emojiMap[callContext.event]
        : undefined;
    if (byEvent) return byEvent;
    if (level !== "warn" && level !== "error" && typeof inherited === "string")
      return inherited;
    return this.emojiMap[level] ?? "";
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return safeStringify(value);
  return String(value);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return String(value);
  }
}
