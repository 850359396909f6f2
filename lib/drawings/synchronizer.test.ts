import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryChartHost } from "@/lib/charts/memory-host";
import type { Surface } from "@/lib/charts/types";

class ClosingTabHost extends MemoryChartHost {
  // Reports a surface that is gone by the time its lines are read
  async listSurfaces(): Promise<Surface[]> {
    return [{ handle: 0, symbol: "XAUUSDp", timeframe: "M5" }, ...(await super.listSurfaces())];
  }
}
import { LineSynchronizer } from "./synchronizer";

function surface(host: MemoryChartHost, handle: number): Surface {
  const found = host.store.getState().surfaces[handle];
  return { handle, symbol: found.symbol, timeframe: found.timeframe };
}

describe("LineSynchronizer", () => {
  let host: MemoryChartHost;
  let sync: LineSynchronizer;
  let d1: number;
  let h4: number;
  let eurusd: number;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});

    host = new MemoryChartHost();
    sync = new LineSynchronizer(host);
    d1 = host.addSurface("XAUUSDp", "D1");
    h4 = host.addSurface("XAUUSDp", "H4");
    eurusd = host.addSurface("EURUSD", "H4");

    host.drawLine(d1, {
      name: "Support",
      price: 2650.5,
      color: "#26A69A",
      lineWidth: 2,
      lineStyle: "dashed",
      labelText: "weekly",
    });
    host.drawLine(eurusd, { name: "Other", price: 1.085 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("copies user lines from other surfaces of the same symbol", async () => {
    const copied = await sync.sync(surface(host, h4));

    expect(copied).toBe(1);
    expect(host.linesOn(h4)).toEqual([
      {
        name: "Support_copied_1",
        price: 2650.5,
        color: "#26A69A",
        lineWidth: 2,
        lineStyle: "dashed",
        labelText: "weekly",
        background: true,
        selectable: false,
      },
    ]);
  });

  it("never modifies the source or the destination's own lines", async () => {
    host.drawLine(h4, { name: "Mine", price: 2700 });
    const before = host.linesOn(d1);

    await sync.sync(surface(host, h4));

    expect(host.linesOn(d1)).toEqual(before);
    expect(host.linesOn(h4).map((l) => l.name)).toEqual(["Mine", "Support_copied_1"]);
  });

  it("is idempotent", async () => {
    await sync.sync(surface(host, h4));
    const first = host.linesOn(h4);

    const copied = await sync.sync(surface(host, h4));

    expect(copied).toBe(1);
    expect(host.linesOn(h4)).toEqual(first);
  });

  it("does not mirror mirrors, however many cycles run", async () => {
    host.drawLine(h4, { name: "Resist", price: 2700 });

    for (let i = 0; i < 5; i++) {
      await sync.sync(surface(host, h4));
      await sync.sync(surface(host, d1));
    }

    expect(host.linesOn(d1).map((l) => l.name).sort()).toEqual(["Resist_copied_2", "Support"]);
    expect(host.linesOn(h4).map((l) => l.name).sort()).toEqual(["Resist", "Support_copied_1"]);
  });

  it("removes a mirror once its source line is deleted", async () => {
    await sync.sync(surface(host, h4));
    host.eraseLine(d1, "Support");

    const copied = await sync.sync(surface(host, h4));

    expect(copied).toBe(0);
    expect(host.linesOn(h4)).toEqual([]);
  });

  it("refreshes a mirror left by a previous cycle", async () => {
    const dest = host.addSurface("XAUUSDp", "M15");
    host.store.setState({ nextHandle: 42 });
    const source = host.addSurface("XAUUSDp", "M5");
    host.drawLine(source, { name: "X", price: 2000 });

    await sync.sync(surface(host, dest));
    host.moveLine(source, "X", 2010.25);
    await sync.sync(surface(host, dest));

    const mirrors = host.linesOn(dest).filter((l) => l.name === "X_copied_42");
    expect(mirrors).toHaveLength(1);
    expect(mirrors[0].price).toBe(2010.25);
  });

  it("ignores surfaces of other symbols", async () => {
    await sync.sync(surface(host, h4));

    expect(host.linesOn(h4).some((l) => l.name.startsWith("Other"))).toBe(false);
    expect(host.linesOn(eurusd).map((l) => l.name)).toEqual(["Other"]);
  });

  it("keeps mirroring from the other sources when one has closed", async () => {
    const closing = new ClosingTabHost();
    const source = closing.addSurface("XAUUSDp", "D1");
    const dest = closing.addSurface("XAUUSDp", "H4");
    closing.drawLine(source, { name: "Support", price: 2650.5 });

    const copied = await new LineSynchronizer(closing).sync(surface(closing, dest));

    expect(copied).toBe(1);
    expect(closing.linesOn(dest).map((l) => l.name)).toEqual(["Support_copied_1"]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
