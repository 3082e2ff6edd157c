import { mkdirSync } from "node:fs";
import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON lines 寫入輪替的 log 檔 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    if (options.rfs?.path) mkdirSync(options.rfs.path, { recursive: true });
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    const { context, ...rest } = record;
    this.stream.write(JSON.stringify({ ...context, ...rest }) + "\n");
  }

  dispose(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
