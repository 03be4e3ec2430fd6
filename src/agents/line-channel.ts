import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { RequestCancelledError } from "./errors.js";

interface PendingRead {
  resolve(line: string | null): void;
}

/**
 * Pull-based line reader over a readable stream. Lines that arrive with no
 * reader waiting are buffered; a read abandoned through its AbortSignal does
 * not consume a line.
 */
export class LineChannel {
  private readonly reader: Interface;
  private readonly buffered: string[] = [];
  private readonly pending: PendingRead[] = [];
  private closed = false;

  constructor(input: Readable) {
    this.reader = createInterface({ input, crlfDelay: Infinity });
    this.reader.on("line", (line) => this.push(line));
    this.reader.on("close", () => this.finish());
  }

  get isClosed(): boolean {
    return this.closed && this.buffered.length === 0;
  }

  /** Resolves with the next line, or null once the stream has ended. */
  next(signal?: AbortSignal): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    if (signal?.aborted) return Promise.reject(new RequestCancelledError());

    return new Promise<string | null>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.pending.indexOf(read);
        if (index !== -1) this.pending.splice(index, 1);
        reject(new RequestCancelledError());
      };
      const read: PendingRead = {
        resolve: (value) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(value);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending.push(read);
    });
  }

  close(): void {
    this.reader.close();
  }

  private push(line: string): void {
    const read = this.pending.shift();
    if (read) {
      read.resolve(line);
    } else {
      this.buffered.push(line);
    }
  }

  private finish(): void {
    this.closed = true;
    for (const read of this.pending.splice(0)) {
      read.resolve(null);
    }
  }
}
