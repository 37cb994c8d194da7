import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";
import {
  type LogLevel,
  type LogLevelSetting,
  type LogRecord,
  type LogTransport,
  LoggerConsole,
  defaultEmojiMap,
} from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    /** 設為 true 或 1 時把測試中的 log 也印到 console */
    TEST_LOGGER_OUTPUT: t.Optional(envBoolean()),
  })
);

export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  async [Symbol.asyncDispose]() {
    this.records.length = 0;
  }
}

/** 記錄所有輸出的 logger，預設不印到 console（TEST_LOGGER_OUTPUT 為 true 時印出） */
export class TestLogger extends LoggerConsole {
  private readonly memory: MemoryTransport;

  constructor(level: LogLevelSetting = "trace") {
    const memory = new MemoryTransport();
    super(level, [], {}, defaultEmojiMap, {
      transports: [memory],
      console: getTestLoggerConfig().TEST_LOGGER_OUTPUT ?? false,
    });
    this.memory = memory;
  }

  get records(): readonly LogRecord[] {
    return this.memory.records;
  }

  recordsAt(level: LogLevel) {
    return this.memory.records.filter((r) => r.level === level);
  }
}

export function buildTestLogger(level?: LogLevelSetting) {
  return new TestLogger(level);
}
