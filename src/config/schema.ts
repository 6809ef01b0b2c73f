import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ParallelOptions, ProgressBarOptions } from "../core/progress/types.js";

export const configSchema = z.object({
  progress: z
    .object({
      renderer: z.enum(["auto", "ansi", "block"]).default("auto"),
      trueColor: z.boolean().default(false),
      hue: z.number().min(0).max(1).default(0.5),
      saturation: z.number().min(0).max(1).default(0.6),
      columns: z.number().int().positive().optional(),
      stream: z.enum(["stdout", "stderr"]).default("stderr"),
    })
    .default({
      renderer: "auto",
      trueColor: false,
      hue: 0.5,
      saturation: 0.6,
      stream: "stderr",
    }),

  parallel: z
    .object({
      channel: z.enum(["file", "shared"]).default("file"),
      tempDir: z.string().optional(),
    })
    .default({ channel: "file" }),

  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      format: z.enum(["compact", "hybrid", "minimal", "pretty"]).default("compact"),
    })
    .default({ level: "info", format: "compact" }),
});

export type Config = z.infer<typeof configSchema>;

function section(fileConfig: unknown, key: string): Record<string, unknown> {
  if (typeof fileConfig === "object" && fileConfig !== null && key in fileConfig) {
    const value: unknown = Reflect.get(fileConfig, key);
    if (typeof value === "object" && value !== null) {
      return { ...value };
    }
  }
  return {};
}

/**
 * Load configuration from file and environment variables.
 *
 * Priority (higher overrides lower):
 * 1. Environment variables (highest priority - always override)
 * 2. Config file specified by path parameter
 * 3. Config file at CONFIG_FILE env var
 * 4. ./config.json
 * 5. Schema defaults (lowest priority)
 */
export async function loadConfig(path?: string): Promise<Config> {
  const configPath = path || process.env.CONFIG_FILE || "./config.json";

  let fileConfig: unknown = {};
  try {
    fileConfig = JSON.parse(await readFile(configPath, "utf8"));
  } catch (_error) {
    // File doesn't exist or is invalid, use empty object
    fileConfig = {};
  }

  const envConfig: Record<string, unknown> = {};

  // Progress overrides
  if (
    process.env.PROGRESS_RENDERER ||
    process.env.PROGRESS_TRUE_COLOR ||
    process.env.PROGRESS_COLUMNS ||
    process.env.PROGRESS_STREAM
  ) {
    envConfig.progress = {
      ...section(fileConfig, "progress"),
      ...(process.env.PROGRESS_RENDERER ? { renderer: process.env.PROGRESS_RENDERER } : {}),
      ...(process.env.PROGRESS_TRUE_COLOR ? { trueColor: process.env.PROGRESS_TRUE_COLOR === "true" } : {}),
      ...(process.env.PROGRESS_COLUMNS ? { columns: Number.parseInt(process.env.PROGRESS_COLUMNS, 10) } : {}),
      ...(process.env.PROGRESS_STREAM ? { stream: process.env.PROGRESS_STREAM } : {}),
    };
  }

  // Parallel overrides
  if (process.env.PROGRESS_CHANNEL || process.env.PROGRESS_TEMP_DIR) {
    envConfig.parallel = {
      ...section(fileConfig, "parallel"),
      ...(process.env.PROGRESS_CHANNEL ? { channel: process.env.PROGRESS_CHANNEL } : {}),
      ...(process.env.PROGRESS_TEMP_DIR ? { tempDir: process.env.PROGRESS_TEMP_DIR } : {}),
    };
  }

  // Logging overrides
  if (process.env.LOG_LEVEL || process.env.LOG_FORMAT) {
    envConfig.logging = {
      ...section(fileConfig, "logging"),
      ...(process.env.LOG_LEVEL ? { level: process.env.LOG_LEVEL } : {}),
      ...(process.env.LOG_FORMAT ? { format: process.env.LOG_FORMAT } : {}),
    };
  }

  const mergedConfig = {
    ...(typeof fileConfig === "object" && fileConfig !== null ? fileConfig : {}),
    ...envConfig,
  };

  try {
    return configSchema.parse(mergedConfig);
  } catch (error) {
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Map the progress section onto bar options.
 */
export function progressOptionsFromConfig(config: Config): ProgressBarOptions {
  const { progress } = config;
  const options: ProgressBarOptions = {
    output: progress.stream === "stdout" ? process.stdout : process.stderr,
    renderer: progress.renderer,
    trueColor: progress.trueColor ? { hue: progress.hue, saturation: progress.saturation } : false,
  };

  if (progress.columns !== undefined) {
    options.columns = progress.columns;
  }

  return options;
}

/**
 * Map the parallel section onto enableParallel() options.
 */
export function parallelOptionsFromConfig(config: Config): ParallelOptions {
  const options: ParallelOptions = { channel: config.parallel.channel };

  if (config.parallel.tempDir !== undefined) {
    options.tempDir = config.parallel.tempDir;
  }

  return options;
}
