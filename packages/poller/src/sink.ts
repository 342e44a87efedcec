import { appendFile } from "node:fs/promises";
import { SinkError } from "./errors";

export interface RawSink {
  append(chunk: string): Promise<void>;
}

/** Appends to `path`, creating it on first write. No rotation. */
export class FileSink implements RawSink {
  constructor(private readonly path: string) {}

  async append(chunk: string): Promise<void> {
    const line = chunk.endsWith("\n") ? chunk : `${chunk}\n`;
    try {
      await appendFile(this.path, line, "utf8");
    } catch (err) {
      throw new SinkError(`Cannot append to ${this.path}`, { cause: err });
    }
  }
}
