import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryChartHost } from "@/lib/charts/memory-host";
import { SurfaceUnavailableError } from "./errors";
import { SurfaceResolver } from "./surface-resolver";

describe("SurfaceResolver", () => {
  let host: MemoryChartHost;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    host = new MemoryChartHost();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns an open surface without taking ownership", async () => {
    host.addSurface("XAUUSDp", "D1");
    const h4 = host.addSurface("XAUUSDp", "H4");
    const owned = new Set<number>();

    const resolved = await new SurfaceResolver(host).resolve("XAUUSDp", "H4", owned);

    expect(resolved).toEqual({ handle: h4, symbol: "XAUUSDp", timeframe: "H4", createdNow: false });
    expect(owned.size).toBe(0);
  });

  it("picks the lowest handle when several surfaces match", async () => {
    host.addSurface("EURUSD", "H4");
    const first = host.addSurface("XAUUSDp", "H4");
    host.addSurface("XAUUSDp", "H4");

    const resolved = await new SurfaceResolver(host).resolve("XAUUSDp", "H4", new Set());

    expect(resolved.handle).toBe(first);
  });

  it("opens a surface and records it as owned", async () => {
    const owned = new Set<number>();

    const resolved = await new SurfaceResolver(host).resolve("XAUUSDp", "M5", owned);

    expect(resolved).toEqual({ handle: 1, symbol: "XAUUSDp", timeframe: "M5", createdNow: true });
    expect([...owned]).toEqual([1]);
    expect(host.openHandles()).toEqual([1]);
  });

  it("reports the host code when a surface cannot be opened", async () => {
    host.refuseOpen("XAUUSDp", "M5");
    const owned = new Set<number>();

    const attempt = new SurfaceResolver(host).resolve("XAUUSDp", "M5", owned);

    await expect(attempt).rejects.toBeInstanceOf(SurfaceUnavailableError);
    await expect(attempt).rejects.toMatchObject({ symbol: "XAUUSDp", timeframe: "M5", code: 4102 });
    expect(owned.size).toBe(0);
  });
});
