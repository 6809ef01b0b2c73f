/**
 * Append-only progress channels shared by parallel workers.
 *
 * A channel counts appends per worker rank; the sum over all ranks is the
 * shared progress count. Appends from different ranks never touch the same
 * storage, so workers need no locks:
 * - FileMarkerChannel: one marker file per rank, one byte per append
 *   (separate processes on one filesystem)
 * - SharedCounterChannel: one Int32 slot per rank in a SharedArrayBuffer
 *   (worker_threads)
 *
 * @module progress/channel
 */

import { appendFileSync, mkdtempSync, readdirSync, rmSync, statSync } from "node:fs";
import { availableParallelism, tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { createLogger } from "../logging/logger.js";
import { InvalidRankError } from "./errors.js";

const logger = createLogger("progress-channel");

/**
 * Structured-clone safe description of a channel, used to reopen it in a worker.
 */
export type ChannelDescriptor = { type: "file"; prefix: string } | { type: "shared"; buffer: SharedArrayBuffer };

/**
 * Append-only progress channel.
 */
export interface ProgressChannel {
  /** Record one unit of progress for a rank */
  append(rank: number): void;

  /** Sum of appends across all ranks */
  total(): number;

  /** Drop every recorded append (best-effort) */
  clear(): void;

  /** Release the channel's storage (best-effort) */
  dispose(): void;

  describe(): ChannelDescriptor;
}

function assertRank(rank: number): void {
  if (!Number.isInteger(rank) || rank < 1) {
    throw new InvalidRankError(rank, "ranks are positive integers starting at 1");
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Marker files named `<prefix>_<rank>`; each append adds one byte.
 */
export class FileMarkerChannel implements ProgressChannel {
  readonly prefix: string;
  private ownsDirectory: boolean;

  constructor(prefix: string, ownsDirectory = false) {
    this.prefix = prefix;
    this.ownsDirectory = ownsDirectory;
  }

  /**
   * Allocate a fresh per-run prefix under `tempDir`.
   */
  static create(tempDir: string = tmpdir()): FileMarkerChannel {
    const directory = mkdtempSync(join(tempDir, "progress-"));
    const channel = new FileMarkerChannel(join(directory, "marker"), true);
    channel.clear();
    return channel;
  }

  markerPath(rank: number): string {
    return `${this.prefix}_${rank}`;
  }

  append(rank: number): void {
    assertRank(rank);
    const path = this.markerPath(rank);
    try {
      appendFileSync(path, ".");
    } catch (error) {
      // A late append after disposal is dropped; it can only undercount
      logger.debug({ event: "marker_append_failed", path, error: errorMessage(error) });
    }
  }

  total(): number {
    let sum = 0;
    for (const path of this.markers()) {
      sum += statSync(path, { throwIfNoEntry: false })?.size ?? 0;
    }
    return sum;
  }

  clear(): void {
    for (const path of this.markers()) {
      try {
        rmSync(path, { force: true });
      } catch (error) {
        logger.debug({ event: "marker_cleanup_failed", path, error: errorMessage(error) });
      }
    }
  }

  dispose(): void {
    this.clear();
    if (!this.ownsDirectory) return;

    const directory = dirname(this.prefix);
    try {
      rmSync(directory, { recursive: true, force: true });
    } catch (error) {
      logger.debug({ event: "marker_directory_cleanup_failed", directory, error: errorMessage(error) });
    }
  }

  describe(): ChannelDescriptor {
    return { type: "file", prefix: this.prefix };
  }

  private markers(): string[] {
    const directory = dirname(this.prefix);
    const stem = `${basename(this.prefix)}_`;

    let names: string[];
    try {
      names = readdirSync(directory);
    } catch (error) {
      logger.debug({ event: "marker_listing_failed", directory, error: errorMessage(error) });
      return [];
    }

    return names.filter((name) => name.startsWith(stem)).map((name) => join(directory, name));
  }
}

/**
 * One Int32 counter per rank in shared memory.
 */
export class SharedCounterChannel implements ProgressChannel {
  private buffer: SharedArrayBuffer;
  private slots: Int32Array;

  constructor(buffer: SharedArrayBuffer) {
    this.buffer = buffer;
    this.slots = new Int32Array(buffer);
  }

  static create(capacity: number = availableParallelism()): SharedCounterChannel {
    return new SharedCounterChannel(new SharedArrayBuffer(Math.max(1, capacity) * Int32Array.BYTES_PER_ELEMENT));
  }

  get capacity(): number {
    return this.slots.length;
  }

  append(rank: number): void {
    assertRank(rank);
    if (rank > this.capacity) {
      throw new InvalidRankError(rank, `channel has ${this.capacity} slot(s)`);
    }
    Atomics.add(this.slots, rank - 1, 1);
  }

  total(): number {
    let sum = 0;
    for (let i = 0; i < this.slots.length; i++) {
      sum += Atomics.load(this.slots, i);
    }
    return sum;
  }

  clear(): void {
    for (let i = 0; i < this.slots.length; i++) {
      Atomics.store(this.slots, i, 0);
    }
  }

  dispose(): void {
    this.clear();
  }

  describe(): ChannelDescriptor {
    return { type: "shared", buffer: this.buffer };
  }
}

/**
 * Reopen a channel from its descriptor (inside a worker).
 */
export function openChannel(descriptor: ChannelDescriptor): ProgressChannel {
  switch (descriptor.type) {
    case "file":
      return new FileMarkerChannel(descriptor.prefix);
    case "shared":
      return new SharedCounterChannel(descriptor.buffer);
  }
}
