import { describe, it, expect } from "vitest";
import winston from "winston";
import {
  createContextLogger,
  createLogger,
  logger,
} from "../../../src/utils/logger.js";
import { getDefaultDiagnosticLogger } from "../../../src/latch/diagnostics.js";

describe("logger", () => {
  it("should create a logger with the given level", () => {
    const created = createLogger({ level: "debug", silent: true });

    expect(created.level).toBe("debug");
    expect(created.silent).toBe(true);
  });

  it("should default to info", () => {
    expect(createLogger({}).level).toBe("info");
  });

  it("should attach the context as default meta", () => {
    const created = createLogger({ context: "Simulator", silent: true });
    expect(created.defaultMeta).toEqual({ context: "Simulator" });
  });

  it("should log to the console transport", () => {
    const created = createLogger({ silent: true });
    expect(created.transports).toHaveLength(1);
    expect(created.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it("should derive context loggers from the default logger", () => {
    const child = createContextLogger("RefreshLatch");
    expect(child.level).toBe(logger.level);
  });

  it("should reuse one default diagnostic logger", () => {
    expect(getDefaultDiagnosticLogger()).toBe(getDefaultDiagnosticLogger());
  });

  it("should log latch diagnostics at debug level by default", () => {
    const diagnostics = getDefaultDiagnosticLogger();
    expect(diagnostics.level).toBe("debug");
    expect(diagnostics.defaultMeta).toEqual({ context: "RefreshLatch" });
  });
});
