import { afterEach, describe, expect, test } from "vitest";
import { configureLogging, createLogger, logger } from "./logger.js";

afterEach(() => {
  configureLogging({ level: "silent" });
});

describe("configureLogging", () => {
  test("applies the level to loggers created earlier", () => {
    const child = createLogger("logger-test");
    configureLogging({ level: "warn" });

    expect(child.level).toBe("warn");
    expect(logger.level).toBe("warn");
    expect(process.env.LOG_LEVEL).toBe("warn");
  });

  test("new loggers start at the configured level", () => {
    configureLogging({ level: "error" });
    expect(createLogger("logger-test", { rank: 2 }).level).toBe("error");
  });
});
