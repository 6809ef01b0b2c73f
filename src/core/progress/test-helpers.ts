import { Writable } from "node:stream";

/**
 * In-memory output stream that records every write.
 *
 * Writes land synchronously, so a test can inspect `writes` right after the
 * bar method returns.
 */
export class MemoryStream extends Writable {
  readonly writes: string[] = [];
  isTTY: boolean;
  columns: number | undefined;
  rows: number | undefined;

  constructor(options: { isTTY?: boolean; columns?: number; rows?: number } = {}) {
    super({ decodeStrings: false });
    this.isTTY = options.isTTY ?? false;
    this.columns = options.columns;
    this.rows = options.rows;
  }

  override _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.writes.push(Buffer.isBuffer(chunk) ? chunk.toString("utf8") : String(chunk));
    callback();
  }

  get text(): string {
    return this.writes.join("");
  }

  get last(): string {
    return this.writes[this.writes.length - 1] ?? "";
  }
}
