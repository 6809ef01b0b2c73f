import { describe, expect, test } from "vitest";
import { ParallelAggregator, REPORTER_RANK } from "./aggregator.js";
import { SharedCounterChannel } from "./channel.js";
import { InvalidRankError } from "./errors.js";

describe("ParallelAggregator", () => {
  test("passes values through without a rank", () => {
    const channel = SharedCounterChannel.create(2);
    const aggregator = new ParallelAggregator(channel);

    expect(aggregator.resolve(7)).toBe(7);
    expect(channel.total()).toBe(0);
    expect(aggregator.isReporter).toBe(false);
    expect(aggregator.isSilent).toBe(false);
  });

  test("only non-reporting ranks are silent", () => {
    const channel = SharedCounterChannel.create(2);

    expect(new ParallelAggregator(channel, 2).isSilent).toBe(true);
    expect(new ParallelAggregator(channel, REPORTER_RANK).isSilent).toBe(false);
  });

  test("non-reporting ranks append and render nothing", () => {
    const channel = SharedCounterChannel.create(2);
    const aggregator = new ParallelAggregator(channel, 2);

    expect(aggregator.resolve(7)).toBeUndefined();
    expect(aggregator.resolve(8)).toBeUndefined();
    expect(channel.total()).toBe(2);
  });

  test("the reporter renders the channel total instead of its own value", () => {
    const channel = SharedCounterChannel.create(3);
    const reporter = new ParallelAggregator(channel, REPORTER_RANK);
    const second = new ParallelAggregator(channel, 2);
    const third = new ParallelAggregator(channel, 3);

    second.resolve(1);
    third.resolve(1);
    third.resolve(2);

    expect(reporter.isReporter).toBe(true);
    expect(reporter.resolve(100)).toBe(4);
  });

  test("rejects ranks below 1", () => {
    const channel = SharedCounterChannel.create(1);
    expect(() => new ParallelAggregator(channel, 0)).toThrow(InvalidRankError);
    expect(() => new ParallelAggregator(channel, -2)).toThrow("Invalid worker rank -2");
  });

  test("dispose releases the channel", () => {
    const channel = SharedCounterChannel.create(2);
    const aggregator = new ParallelAggregator(channel, 2);
    aggregator.resolve(1);
    aggregator.dispose();

    expect(channel.total()).toBe(0);
  });
});
