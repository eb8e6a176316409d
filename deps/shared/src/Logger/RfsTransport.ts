import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 rotating-file-stream 寫出 JSON Lines 日誌 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      maxFiles: 14,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve) => this.stream.end(resolve));
  }
}
