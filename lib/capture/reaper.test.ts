import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryChartHost } from "@/lib/charts/memory-host";
import { Reaper } from "./reaper";

describe("Reaper", () => {
  let host: MemoryChartHost;
  let delays: number[];
  let reaper: Reaper;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    host = new MemoryChartHost();
    delays = [];
    reaper = new Reaper(host, 1000, async (ms) => {
      delays.push(ms);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("closes only the surfaces it was given, after the grace delay", async () => {
    const existing = host.addSurface("XAUUSDp", "D1");
    const created = new Set([host.addSurface("XAUUSDp", "H4"), host.addSurface("XAUUSDp", "M5")]);

    const closed = await reaper.cleanup(created);

    expect(closed).toBe(2);
    expect(delays).toEqual([1000]);
    expect(host.openHandles()).toEqual([existing]);
    expect(created.size).toBe(0);
  });

  it("does nothing for an empty set", async () => {
    expect(await reaper.cleanup(new Set())).toBe(0);
    expect(delays).toEqual([]);
  });

  it("keeps closing after a failure", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const alive = host.addSurface("XAUUSDp", "H4");

    const closed = await reaper.cleanup(new Set([99, alive]));

    expect(closed).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(host.openHandles()).toEqual([]);
  });
});
