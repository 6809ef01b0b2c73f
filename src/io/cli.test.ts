import { afterEach, describe, expect, test, vi } from "vitest";
import { itemsForRank, parseCLIArgs, runCLI } from "./cli.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCLIArgs", () => {
  test("applies defaults", () => {
    expect(parseCLIArgs([])).toEqual({
      mode: "sequential",
      count: 300,
      workers: 4,
      delay: 10,
      verbose: false,
      help: false,
    });
  });

  test("parses short and long flags", () => {
    const options = parseCLIArgs(["-m", "parallel", "-n", "50", "--workers", "3", "-d", "0", "-v"]);

    expect(options.mode).toBe("parallel");
    expect(options.count).toBe(50);
    expect(options.workers).toBe(3);
    expect(options.delay).toBe(0);
    expect(options.verbose).toBe(true);
  });

  test("keeps the config path", () => {
    expect(parseCLIArgs(["--config", "demo.json"]).config).toBe("demo.json");
  });

  test("rejects unknown modes", () => {
    expect(() => parseCLIArgs(["--mode", "fast"])).toThrow();
  });

  test("rejects non-positive counts", () => {
    expect(() => parseCLIArgs(["--count", "0"])).toThrow();
  });

  test("rejects unknown flags", () => {
    expect(() => parseCLIArgs(["--bogus"])).toThrow();
  });
});

describe("itemsForRank", () => {
  test("deals items round-robin by rank", () => {
    expect(itemsForRank(10, 4, 1)).toEqual([1, 5, 9]);
    expect(itemsForRank(10, 4, 4)).toEqual([4, 8]);
  });

  test("covers every item exactly once", () => {
    const items = [1, 2, 3].flatMap((rank) => itemsForRank(20, 3, rank)).sort((a, b) => a - b);
    expect(items).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
  });

  test("ranks beyond the item count get nothing", () => {
    expect(itemsForRank(2, 4, 3)).toEqual([]);
  });
});

describe("runCLI", () => {
  test("prints help", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(await runCLI(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
  });

  test("fails on invalid arguments", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});

    expect(await runCLI(["--mode", "fast"])).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
