import { fork } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { loadConfig, parallelOptionsFromConfig, progressOptionsFromConfig } from "../config/schema.js";
import { configureLogging, createLogger } from "../core/logging/logger.js";
import { formatDuration } from "../core/progress/formatting.js";
import { ProgressBar } from "../core/progress/progress-bar.js";
import type { ProgressBarOptions, WorkerHandle } from "../core/progress/types.js";

const logger = createLogger("cli");

export const WORKER_RANK_ENV = "PROGRESS_WORKER_RANK";
export const WORKER_HANDLE_ENV = "PROGRESS_WORKER_HANDLE";
export const WORKER_PLAN_ENV = "PROGRESS_WORKER_PLAN";

export const cliOptionsSchema = z.object({
  mode: z.enum(["sequential", "nested", "parallel"]).default("sequential"),
  count: z.coerce.number().int().positive().default(300),
  workers: z.coerce.number().int().positive().default(4),
  delay: z.coerce.number().int().nonnegative().default(10),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CLIOptions = z.infer<typeof cliOptionsSchema>;

const workerHandleSchema = z.object({
  total: z.number(),
  message: z.string(),
  profile: z.object({ columns: z.number().int().positive(), isInteractive: z.boolean() }),
  trueColor: z.union([
    z.literal(false),
    z.object({ hue: z.number().optional(), saturation: z.number().optional() }),
  ]),
  redraw: z.object({ lastFilledUnits: z.number(), lastPaddingUnits: z.number() }),
  channel: z.object({ type: z.literal("file"), prefix: z.string() }),
});

const workerPlanSchema = z.object({
  count: z.number().int().positive(),
  workers: z.number().int().positive(),
  delay: z.number().nonnegative(),
});

type WorkerPlan = z.infer<typeof workerPlanSchema>;

/**
 * Parse command line arguments into validated options.
 */
export function parseCLIArgs(args: string[]): CLIOptions {
  const { values } = parseArgs({
    args,
    options: {
      mode: { type: "string", short: "m" },
      count: { type: "string", short: "n" },
      workers: { type: "string", short: "w" },
      delay: { type: "string", short: "d" },
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  });

  return cliOptionsSchema.parse(values);
}

/**
 * Items a worker handles: those with (i - 1) mod workers == rank - 1.
 */
export function itemsForRank(count: number, workers: number, rank: number): number[] {
  const items: number[] = [];
  for (let i = rank; i <= count; i += workers) {
    items.push(i);
  }
  return items;
}

export async function runCLI(args: string[] = process.argv.slice(2)): Promise<number> {
  const rank = process.env[WORKER_RANK_ENV];
  if (rank !== undefined) {
    return runWorker(Number.parseInt(rank, 10));
  }

  let options: CLIOptions;
  try {
    options = parseCLIArgs(args);
  } catch (error) {
    console.error(`Invalid arguments: ${error instanceof Error ? error.message : String(error)}`);
    printHelp();
    return 1;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  const config = await loadConfig(options.config);
  configureLogging({
    level: options.verbose ? "debug" : config.logging.level,
    format: config.logging.format,
  });
  const barOptions = progressOptionsFromConfig(config);

  logger.debug({ event: "demo_start", mode: options.mode, count: options.count, renderer: config.progress.renderer });

  switch (options.mode) {
    case "sequential":
      await runSequential(options, barOptions);
      return 0;
    case "nested":
      await runNested(options, barOptions);
      return 0;
    case "parallel":
      return runParallel(options, barOptions, parallelOptionsFromConfig(config).tempDir);
  }
}

async function runSequential(options: CLIOptions, barOptions: ProgressBarOptions): Promise<void> {
  const bar = new ProgressBar(options.count, "Running demo with %d items", [options.count], barOptions);
  for (let i = 1; i <= options.count; i++) {
    bar.update(i);
    await sleep(options.delay);
  }
  bar.finish("Processed %d items in %s", [options.count, formatDuration(bar.elapsedMs)]);
}

async function runNested(options: CLIOptions, barOptions: ProgressBarOptions): Promise<void> {
  const outerCount = 20;
  const innerCount = 100;
  const innerDelay = Math.max(1, Math.round(options.delay / 10));

  const outer = new ProgressBar(outerCount, "Outer loop", [], barOptions);
  for (let i = 1; i <= outerCount; i++) {
    outer.update(i);
    const inner = new ProgressBar(innerCount, "Inner loop %d", [i], barOptions);
    for (let j = 1; j <= innerCount; j++) {
      inner.update(j);
      await sleep(innerDelay);
    }
    inner.finish();
  }
  outer.finish();
}

async function runParallel(options: CLIOptions, barOptions: ProgressBarOptions, tempDir?: string): Promise<number> {
  const bar = new ProgressBar(options.count, "Running parallel demo with %d items", [options.count], barOptions);
  const handle = bar.enableParallel(tempDir === undefined ? { channel: "file" } : { channel: "file", tempDir });
  const plan: WorkerPlan = { count: options.count, workers: options.workers, delay: options.delay };

  const entry = process.argv[1];
  if (entry === undefined) {
    bar.finish("Cannot locate the entry script to fork workers");
    return 1;
  }

  const children = Array.from({ length: options.workers }, (_, index) =>
    fork(entry, [], {
      execArgv: process.execArgv,
      stdio: "inherit",
      env: {
        ...process.env,
        [WORKER_RANK_ENV]: String(index + 1),
        [WORKER_HANDLE_ENV]: JSON.stringify(handle),
        [WORKER_PLAN_ENV]: JSON.stringify(plan),
      },
    }),
  );

  const exitCodes = await Promise.all(
    children.map((child) => new Promise<number | null>((resolve) => child.on("exit", (code) => resolve(code)))),
  );
  const failed = exitCodes.filter((code) => code !== 0).length;

  if (failed > 0) {
    logger.error({ event: "workers_failed", failed, workers: options.workers });
    bar.finish("%d of %d workers failed", [failed, options.workers]);
    return 1;
  }

  bar.finish("Processed %d items on %d workers in %s", [options.count, options.workers, formatDuration(bar.elapsedMs)]);
  return 0;
}

async function runWorker(rank: number): Promise<number> {
  let handle: WorkerHandle;
  let plan: WorkerPlan;
  try {
    handle = workerHandleSchema.parse(JSON.parse(process.env[WORKER_HANDLE_ENV] ?? "null"));
    plan = workerPlanSchema.parse(JSON.parse(process.env[WORKER_PLAN_ENV] ?? "null"));
  } catch (error) {
    logger.error({ event: "worker_setup_failed", rank, error: error instanceof Error ? error.message : String(error) });
    return 1;
  }

  const bar = ProgressBar.attach(handle, rank, { output: process.stderr });
  for (const item of itemsForRank(plan.count, plan.workers, rank)) {
    await sleep(Math.round(plan.delay * 30 * Math.random()));
    bar.update(item);
  }

  logger.debug({ event: "worker_done", rank });
  return 0;
}

function printHelp() {
  console.log(`
Usage: progress-demo [options]

Options:
  -m, --mode <mode>      sequential | nested | parallel (default: sequential)
  -n, --count <n>        Number of items (default: 300)
  -w, --workers <k>      Worker processes for parallel mode (default: 4)
  -d, --delay <ms>       Delay per item in milliseconds (default: 10)
  -c, --config <path>    Config file (default: $CONFIG_FILE or ./config.json)
  -v, --verbose          Enable debug logging
  -h, --help             Show this help message

Environment:
  PROGRESS_RENDERER      auto | ansi | block
  PROGRESS_TRUE_COLOR    true to draw the filled bar as a 24-bit gradient
  PROGRESS_COLUMNS       Override the detected terminal width
  LOG_LEVEL, LOG_FORMAT  Logging threshold and format

Examples:
  progress-demo -n 500
  progress-demo --mode nested
  PROGRESS_RENDERER=block progress-demo --mode parallel -w 8
  `);
}
