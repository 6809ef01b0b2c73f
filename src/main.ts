#!/usr/bin/env node
import { createLogger } from "./core/logging/logger.js";
import { runCLI } from "./io/cli.js";

const logger = createLogger("main");

async function main() {
  try {
    process.exitCode = await runCLI(process.argv.slice(2));
  } catch (error) {
    logger.fatal({
      event: "startup_error",
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  }
}

await main();
