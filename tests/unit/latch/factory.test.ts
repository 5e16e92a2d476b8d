import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createRefreshLatch,
  newRefreshLatch,
  newRefreshLatchWithDelay,
  newRefreshLatchWithMinShowTime,
  DEFAULT_DELAY_TIME,
  DEFAULT_MIN_SHOW_TIME,
} from "../../../src/latch/factory.js";
import { InvalidConfigurationError } from "../../../src/errors.js";
import { VirtualScheduler } from "../../../src/scheduler/virtual-scheduler.js";
import type { DiagnosticMeta } from "../../../src/latch/diagnostics.js";

describe("Refresh latch factory", () => {
  const sink = (): void => {};

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should apply the default timings", () => {
    const latch = newRefreshLatch(sink);

    expect(DEFAULT_DELAY_TIME).toBe(300);
    expect(DEFAULT_MIN_SHOW_TIME).toBe(700);
    expect(latch.delayTime).toBe(300);
    expect(latch.minShowTime).toBe(700);
  });

  it("should override only the delay", () => {
    const latch = newRefreshLatchWithDelay("150ms", sink);

    expect(latch.delayTime).toBe(150);
    expect(latch.minShowTime).toBe(700);
  });

  it("should override only the minimum show time", () => {
    const latch = newRefreshLatchWithMinShowTime("1.5s", sink);

    expect(latch.delayTime).toBe(300);
    expect(latch.minShowTime).toBe(1500);
  });

  it("should use the given scheduler", () => {
    const scheduler = new VirtualScheduler();
    const shown = vi.fn();
    const latch = createRefreshLatch({ delayTime: 100 }, shown, { scheduler });

    latch.setBusy(true);
    scheduler.advanceBy(100);

    expect(shown).toHaveBeenCalledWith(true);
  });

  it("should reject negative durations", () => {
    expect(() => createRefreshLatch({ delayTime: -1 }, sink)).toThrow(
      InvalidConfigurationError,
    );
  });

  it("should list each invalid option", () => {
    try {
      createRefreshLatch({ delayTime: "soon", minShowTime: -10 }, sink);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.issues).toEqual([
          {
            path: "delayTime",
            message:
              'Invalid duration "soon" - use milliseconds or a value like "300ms", "1.5s", "2m"',
          },
          { path: "minShowTime", message: "Duration must be non-negative" },
        ]);
      }
    }
  });

  it("should enable debugging from the options", () => {
    const debug = vi.fn<(message: string, meta: DiagnosticMeta) => void>();
    createRefreshLatch({ debug: true, label: "list" }, sink, {
      logger: { debug },
      scheduler: new VirtualScheduler(),
    });

    expect(debug).toHaveBeenCalledWith("Enabling debugging", {
      transition: "debugging-enabled",
      label: "list",
    });
  });

  it("should enable debugging from REFRESH_LATCH_DEBUG", () => {
    vi.stubEnv("REFRESH_LATCH_DEBUG", "true");
    const debug = vi.fn<(message: string, meta: DiagnosticMeta) => void>();

    newRefreshLatch(sink, { logger: { debug } });

    expect(debug).toHaveBeenCalledOnce();
  });

  it("should let an explicit debug flag win over the environment", () => {
    vi.stubEnv("REFRESH_LATCH_DEBUG", "true");
    const debug = vi.fn<(message: string, meta: DiagnosticMeta) => void>();

    createRefreshLatch({ debug: false }, sink, { logger: { debug } });

    expect(debug).not.toHaveBeenCalled();
  });
});
