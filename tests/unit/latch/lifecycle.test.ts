import { EventEmitter } from "events";
import { describe, it, expect, vi } from "vitest";
import { bindToLifecycle } from "../../../src/latch/lifecycle.js";
import { RefreshLatch } from "../../../src/latch/refresh-latch.js";
import { VirtualScheduler } from "../../../src/scheduler/virtual-scheduler.js";

describe("bindToLifecycle", () => {
  const createLatch = (scheduler = new VirtualScheduler(), sink = vi.fn()) =>
    new RefreshLatch({ delayTime: 300, minShowTime: 700, sink }, { scheduler });

  it("should dispose the latch on destroy", () => {
    const owner = new EventEmitter();
    const scheduler = new VirtualScheduler();
    const sink = vi.fn();
    const latch = createLatch(scheduler, sink);
    const binding = bindToLifecycle(owner, latch);

    latch.setBusy(true);
    owner.emit("destroy");
    scheduler.runAll();

    expect(latch.disposed).toBe(true);
    expect(binding.active).toBe(false);
    expect(sink).not.toHaveBeenCalled();
    expect(owner.listenerCount("destroy")).toBe(0);
  });

  it("should dispose only once", () => {
    const owner = new EventEmitter();
    const latch = createLatch();
    const dispose = vi.spyOn(latch, "dispose");
    bindToLifecycle(owner, latch);

    owner.emit("destroy");
    owner.emit("destroy");

    expect(dispose).toHaveBeenCalledOnce();
  });

  it("should bind several latches to one owner", () => {
    const owner = new EventEmitter();
    const first = createLatch();
    const second = createLatch();
    bindToLifecycle(owner, first);
    bindToLifecycle(owner, second);

    owner.emit("destroy");

    expect(first.disposed).toBe(true);
    expect(second.disposed).toBe(true);
  });

  it("should stop watching after unbind", () => {
    const owner = new EventEmitter();
    const latch = createLatch();
    const binding = bindToLifecycle(owner, latch);

    binding.unbind();
    owner.emit("destroy");

    expect(binding.active).toBe(false);
    expect(latch.disposed).toBe(false);
    expect(owner.listenerCount("destroy")).toBe(0);
  });

  it("should leave an already disposed latch alone", () => {
    const owner = new EventEmitter();
    const latch = createLatch();
    bindToLifecycle(owner, latch);

    latch.dispose();

    expect(() => owner.emit("destroy")).not.toThrow();
  });

  it("should listen for a custom event", () => {
    const owner = new EventEmitter();
    const latch = createLatch();
    bindToLifecycle(owner, latch, { event: "unmount" });

    owner.emit("destroy");
    expect(latch.disposed).toBe(false);

    owner.emit("unmount");
    expect(latch.disposed).toBe(true);
  });
});
