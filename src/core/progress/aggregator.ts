/**
 * Parallel progress aggregation.
 *
 * Every worker appends one unit per update to its own slot of a shared
 * channel. Rank 1 is the reporter: it ignores the value its caller passed and
 * renders the channel's sum instead. Other ranks append and render nothing.
 * A process with no rank (the one that created the bar) is not a worker and
 * passes its value through.
 *
 * @module progress/aggregator
 */

import type { ProgressChannel } from "./channel.js";
import { InvalidRankError } from "./errors.js";

export const REPORTER_RANK = 1;

export class ParallelAggregator {
  readonly channel: ProgressChannel;
  readonly rank: number | undefined;

  constructor(channel: ProgressChannel, rank?: number) {
    if (rank !== undefined && (!Number.isInteger(rank) || rank < 1)) {
      throw new InvalidRankError(rank, "ranks are positive integers starting at 1");
    }
    this.channel = channel;
    this.rank = rank;
  }

  get isReporter(): boolean {
    return this.rank === REPORTER_RANK;
  }

  /** Workers other than the reporter never write to the terminal */
  get isSilent(): boolean {
    return this.rank !== undefined && !this.isReporter;
  }

  /**
   * Resolve the count to render for a caller-supplied value.
   *
   * @returns The count to render, or `undefined` when this worker must not render
   */
  resolve(n: number): number | undefined {
    if (this.rank === undefined) {
      return n;
    }

    this.channel.append(this.rank);

    return this.isReporter ? this.channel.total() : undefined;
  }

  /**
   * Remove the channel's storage (best-effort).
   */
  dispose(): void {
    this.channel.dispose();
  }
}
