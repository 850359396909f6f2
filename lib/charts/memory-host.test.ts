import { describe, expect, it, vi } from "vitest";
import { MemoryChartHost } from "./memory-host";
import { HOST_ERRORS, hostErrorCode } from "./types";
import type { LineChangeEvent } from "./types";

const LINE = {
  name: "Support",
  price: 2650.5,
  color: "#26A69A",
  lineWidth: 1,
  lineStyle: "solid" as const,
  labelText: "",
  background: false,
  selectable: true,
};

describe("MemoryChartHost", () => {
  it("refuses a second line with the same name", async () => {
    const host = new MemoryChartHost();
    const handle = host.addSurface("XAUUSDp", "H4");

    await host.createLine(handle, LINE);
    const err = await host.createLine(handle, { ...LINE, price: 2700 }).catch((e: unknown) => e);

    expect(hostErrorCode(err)).toBe(HOST_ERRORS.LINE_EXISTS);
    expect(host.linesOn(handle)).toEqual([LINE]);
  });

  it("reports whether a delete removed anything", async () => {
    const host = new MemoryChartHost();
    const handle = host.addSurface("XAUUSDp", "H4");
    await host.createLine(handle, LINE);

    expect(await host.deleteLine(handle, "Support")).toBe(true);
    expect(await host.deleteLine(handle, "Support")).toBe(false);
  });

  it("rejects unknown surfaces", async () => {
    const host = new MemoryChartHost();

    const err = await host.listLines(7).catch((e: unknown) => e);

    expect(hostErrorCode(err)).toBe(HOST_ERRORS.UNKNOWN_SURFACE);
  });

  it("notifies listeners of line changes until unsubscribed", () => {
    const host = new MemoryChartHost();
    const handle = host.addSurface("XAUUSDp", "H4");
    const events: LineChangeEvent[] = [];
    const listener = vi.fn((event: LineChangeEvent) => events.push(event));

    const unsubscribe = host.onLinesChanged(listener);
    host.drawLine(handle, { name: "Support", price: 2650.5 });
    host.drawLine(handle, { name: "Support", price: 2650.5, color: "#EF5350" });
    host.moveLine(handle, "Support", 2660);
    host.eraseLine(handle, "Support");
    unsubscribe();
    host.drawLine(handle, { name: "Late", price: 2700 });

    expect(events).toEqual([
      { kind: "create", handle, name: "Support" },
      { kind: "modify", handle, name: "Support" },
      { kind: "move", handle, name: "Support" },
      { kind: "delete", handle, name: "Support" },
    ]);
  });
});
