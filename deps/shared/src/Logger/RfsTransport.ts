import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON Lines 寫入輪替檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private streamError: Error | undefined;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
    this.stream.on("error", (error: Error) => {
      this.streamError = error;
    });
  }

  write(record: LogRecord) {
    if (this.streamError) throw this.streamError;
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
    if (this.streamError) throw this.streamError;
  }
}
