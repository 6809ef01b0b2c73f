import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig, parallelOptionsFromConfig, progressOptionsFromConfig } from "./schema.js";

let tempDir: string;
let configPath: string;

// Store original env vars to restore after tests
const originalEnv: Record<string, string | undefined> = {};

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "config-test-"));
  configPath = join(tempDir, "test-config.json");

  // Save and clear env vars that might interfere with tests
  const envVarsToSave = [
    "CONFIG_FILE",
    "PROGRESS_RENDERER",
    "PROGRESS_TRUE_COLOR",
    "PROGRESS_COLUMNS",
    "PROGRESS_STREAM",
    "PROGRESS_CHANNEL",
    "PROGRESS_TEMP_DIR",
    "LOG_LEVEL",
    "LOG_FORMAT",
  ];

  for (const key of envVarsToSave) {
    originalEnv[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });

  // Restore original env vars
  for (const [key, value] of Object.entries(originalEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

test("uses defaults when the file is missing", async () => {
  const config = await loadConfig(join(tempDir, "missing.json"));

  expect(config.progress).toEqual({
    renderer: "auto",
    trueColor: false,
    hue: 0.5,
    saturation: 0.6,
    stream: "stderr",
  });
  expect(config.parallel).toEqual({ channel: "file" });
  expect(config.logging).toEqual({ level: "info", format: "compact" });
});

test("loads config from file", async () => {
  await writeFile(
    configPath,
    JSON.stringify({
      progress: { renderer: "block", columns: 100 },
      parallel: { channel: "shared" },
    }),
  );
  const config = await loadConfig(configPath);

  expect(config.progress.renderer).toBe("block");
  expect(config.progress.columns).toBe(100);
  expect(config.progress.stream).toBe("stderr");
  expect(config.parallel.channel).toBe("shared");
});

test("reads the file named by CONFIG_FILE", async () => {
  await writeFile(configPath, JSON.stringify({ logging: { level: "debug" } }));
  process.env.CONFIG_FILE = configPath;

  const config = await loadConfig();
  expect(config.logging.level).toBe("debug");
});

test("environment variables override config file", async () => {
  await writeFile(
    configPath,
    JSON.stringify({
      progress: { renderer: "block", columns: 100 },
      logging: { level: "warn", format: "hybrid" },
    }),
  );

  process.env.PROGRESS_RENDERER = "ansi";
  process.env.PROGRESS_TRUE_COLOR = "true";
  process.env.LOG_LEVEL = "error";

  const config = await loadConfig(configPath);

  expect(config.progress.renderer).toBe("ansi");
  expect(config.progress.trueColor).toBe(true);
  // Other file values in an overridden section are kept
  expect(config.progress.columns).toBe(100);
  expect(config.logging).toEqual({ level: "error", format: "hybrid" });
});

test("parses numeric and path overrides", async () => {
  process.env.PROGRESS_COLUMNS = "132";
  process.env.PROGRESS_CHANNEL = "shared";
  process.env.PROGRESS_TEMP_DIR = tempDir;

  const config = await loadConfig(configPath);

  expect(config.progress.columns).toBe(132);
  expect(config.parallel).toEqual({ channel: "shared", tempDir });
});

test("ignores a file that is not valid JSON", async () => {
  await writeFile(configPath, "{ not json");
  const config = await loadConfig(configPath);

  expect(config.progress.renderer).toBe("auto");
});

test("rejects invalid values", async () => {
  await writeFile(configPath, JSON.stringify({ progress: { renderer: "fancy" } }));

  await expect(loadConfig(configPath)).rejects.toThrow("Failed to load configuration");
});

test("rejects an invalid environment override", async () => {
  process.env.PROGRESS_STREAM = "stdin";

  await expect(loadConfig(configPath)).rejects.toThrow("Failed to load configuration");
});

describe("option mapping", () => {
  test("maps the progress section onto bar options", async () => {
    await writeFile(
      configPath,
      JSON.stringify({ progress: { renderer: "ansi", trueColor: true, hue: 0.3, columns: 90, stream: "stdout" } }),
    );
    const options = progressOptionsFromConfig(await loadConfig(configPath));

    expect(options.output).toBe(process.stdout);
    expect(options.renderer).toBe("ansi");
    expect(options.columns).toBe(90);
    expect(options.trueColor).toEqual({ hue: 0.3, saturation: 0.6 });
  });

  test("leaves true color off and columns unset by default", async () => {
    const options = progressOptionsFromConfig(await loadConfig(configPath));

    expect(options.output).toBe(process.stderr);
    expect(options.trueColor).toBe(false);
    expect(options).not.toHaveProperty("columns");
  });

  test("maps the parallel section onto enableParallel options", async () => {
    await writeFile(configPath, JSON.stringify({ parallel: { channel: "file", tempDir: "/var/tmp" } }));

    expect(parallelOptionsFromConfig(await loadConfig(configPath))).toEqual({ channel: "file", tempDir: "/var/tmp" });
  });
});
