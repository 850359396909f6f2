import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BrowserChartHost } from "./browser-host";
import type { ChartBridge } from "./browser-host";
import { HOST_ERRORS, hostErrorCode } from "./types";

// Page functions run in this process against a stubbed window
const page = vi.hoisted(() => ({
  evaluate: async (fn: (...args: unknown[]) => unknown, ...args: unknown[]) => fn(...args),
  isClosed: () => false,
  exposeFunction: async () => {},
  close: async () => {},
}));

vi.mock("puppeteer-core", () => ({
  default: {
    connect: async () => ({ pages: async () => [page], disconnect: async () => {} }),
  },
}));

describe("BrowserChartHost", () => {
  let bridge: ChartBridge;
  let chartWindow: { chartBridge?: ChartBridge };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    bridge = {
      describe: () => ({ symbol: "XAUUSDp", timeframe: "H4" }),
      listLines: () => [],
      createLine: () => true,
      deleteLine: () => true,
      redraw: vi.fn(),
      scrollToRealTime: vi.fn(),
      onLinesChanged: vi.fn(),
    };
    chartWindow = { chartBridge: bridge };
    vi.stubGlobal("window", chartWindow);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  async function connect(): Promise<{ host: BrowserChartHost; handle: number }> {
    const host = await BrowserChartHost.connect({
      browserURL: "http://127.0.0.1:9222",
      chartAppUrl: "http://127.0.0.1:3000/chart",
    });
    const [surface] = await host.listSurfaces();
    return { host, handle: surface.handle };
  }

  it("lists chart pages as surfaces", async () => {
    const host = await BrowserChartHost.connect({
      browserURL: "http://127.0.0.1:9222",
      chartAppUrl: "http://127.0.0.1:3000/chart",
    });

    expect(await host.listSurfaces()).toEqual([{ handle: 1, symbol: "XAUUSDp", timeframe: "H4" }]);
  });

  it("redraws through the page bridge", async () => {
    const { host, handle } = await connect();

    await host.redraw(handle);

    expect(bridge.redraw).toHaveBeenCalledTimes(1);
  });

  it("fails a redraw when the page has lost its bridge", async () => {
    const { host, handle } = await connect();
    chartWindow.chartBridge = undefined;

    const err = await host.redraw(handle).catch((e: unknown) => e);

    expect(hostErrorCode(err)).toBe(HOST_ERRORS.BRIDGE_MISSING);
  });
});
