/**
 * Browser Chart Host
 *
 * ChartHost over a running Chromium (DevTools endpoint) using puppeteer-core.
 * Every page of the chart web app is a surface. The app exposes
 * `window.chartBridge` on each chart page; pages without it are ignored.
 *
 * Handles are assigned the first time a page is seen and stay fixed for the
 * page's lifetime.
 */

import puppeteer from "puppeteer-core";
import type { Browser, Page } from "puppeteer-core";
import { HostError, HOST_ERRORS, errorMessage } from "./types";
import type {
  ChartHost,
  HorizontalLine,
  LineChangeKind,
  LineChangeListener,
  ScreenshotOptions,
  Surface,
} from "./types";

/**
 * What a chart page must expose
 */
export interface ChartBridge {
  describe(): { symbol: string; timeframe: string };
  listLines(): HorizontalLine[];
  /** false when a line with that name already exists */
  createLine(line: HorizontalLine): boolean;
  deleteLine(name: string): boolean;
  redraw(): void;
  /** Pin the latest bar to the right edge */
  scrollToRealTime(): void;
  onLinesChanged(listener: (kind: LineChangeKind, name: string) => void): void;
}

declare global {
  interface Window {
    chartBridge?: ChartBridge;
    __chartLinesChanged?: (kind: LineChangeKind, name: string) => void;
  }
}

export interface BrowserChartHostOptions {
  browserURL: string;      // e.g. http://127.0.0.1:9222
  chartAppUrl: string;     // Page opened for a new surface (?symbol=&timeframe=)
  loadTimeoutMs?: number;
}

export class BrowserChartHost implements ChartHost {
  private pages = new Map<number, Page>();
  private handles = new WeakMap<Page, number>();
  private watched = new WeakSet<Page>();
  private nextHandle = 1;
  private listeners = new Set<LineChangeListener>();

  private constructor(
    private readonly browser: Browser,
    private readonly options: BrowserChartHostOptions
  ) {}

  static async connect(options: BrowserChartHostOptions): Promise<BrowserChartHost> {
    console.log(`[Host] Connecting to browser at ${options.browserURL}...`);
    const browser = await puppeteer.connect({ browserURL: options.browserURL, defaultViewport: null });
    console.log("[Host] Browser connected");
    return new BrowserChartHost(browser, options);
  }

  async listSurfaces(): Promise<Surface[]> {
    const surfaces: Surface[] = [];

    for (const page of await this.browser.pages()) {
      const info = await this.describe(page);
      if (!info) continue;

      const handle = this.handleFor(page);
      await this.watch(page, handle);
      surfaces.push({ handle, symbol: info.symbol, timeframe: info.timeframe });
    }

    for (const [handle, page] of this.pages) {
      if (page.isClosed()) this.pages.delete(handle);
    }

    return surfaces;
  }

  async openSurface(symbol: string, timeframe: string): Promise<number> {
    const timeout = this.options.loadTimeoutMs ?? 30000;
    const url = new URL(this.options.chartAppUrl);
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("timeframe", timeframe);

    const page = await this.browser.newPage();
    try {
      await page.goto(url.toString(), { waitUntil: "networkidle2", timeout });
      await page.waitForFunction(() => Boolean(window.chartBridge), { timeout });
    } catch (err) {
      await page.close().catch((closeErr: unknown) => {
        console.warn(`[Host] Could not close failed page:`, errorMessage(closeErr));
      });
      throw new HostError(`Opening ${url.toString()} failed: ${errorMessage(err)}`, HOST_ERRORS.SURFACE_OPEN_FAILED);
    }

    const handle = this.handleFor(page);
    await this.watch(page, handle);
    return handle;
  }

  async closeSurface(handle: number): Promise<void> {
    const page = this.requirePage(handle);
    await page.close();
    this.pages.delete(handle);
  }

  async listLines(handle: number): Promise<HorizontalLine[]> {
    const lines = await this.requirePage(handle).evaluate(() => window.chartBridge?.listLines() ?? null);
    if (lines === null) throw this.bridgeMissing(handle);
    return lines;
  }

  async createLine(handle: number, line: HorizontalLine): Promise<void> {
    const created = await this.requirePage(handle).evaluate(
      (l) => window.chartBridge?.createLine(l) ?? null,
      line
    );
    if (created === null) throw this.bridgeMissing(handle);
    if (!created) {
      throw new HostError(`Line ${line.name} already exists on surface ${handle}`, HOST_ERRORS.LINE_EXISTS);
    }
  }

  async deleteLine(handle: number, name: string): Promise<boolean> {
    const deleted = await this.requirePage(handle).evaluate(
      (n) => window.chartBridge?.deleteLine(n) ?? null,
      name
    );
    if (deleted === null) throw this.bridgeMissing(handle);
    return deleted;
  }

  async redraw(handle: number): Promise<void> {
    const redrawn = await this.requirePage(handle).evaluate(() => {
      if (!window.chartBridge) return false;
      window.chartBridge.redraw();
      return true;
    });
    if (!redrawn) throw this.bridgeMissing(handle);
  }

  async screenshot(handle: number, options: ScreenshotOptions): Promise<Uint8Array> {
    const page = this.requirePage(handle);

    try {
      await page.setViewport({ width: options.width, height: options.height });
      // Right-anchored: latest bar at the right edge
      await page.evaluate(() => window.chartBridge?.scrollToRealTime());
      return await page.screenshot({ type: options.format });
    } catch (err) {
      throw new HostError(`Screenshot of surface ${handle} failed: ${errorMessage(err)}`, HOST_ERRORS.CAPTURE_FAILED);
    }
  }

  onLinesChanged(listener: LineChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async disconnect(): Promise<void> {
    this.listeners.clear();
    await this.browser.disconnect();
    console.log("[Host] Browser disconnected");
  }

  private async describe(page: Page): Promise<{ symbol: string; timeframe: string } | null> {
    try {
      return await page.evaluate(() => window.chartBridge?.describe() ?? null);
    } catch {
      // Page navigating or closed mid-enumeration
      return null;
    }
  }

  private handleFor(page: Page): number {
    const existing = this.handles.get(page);
    if (existing !== undefined) return existing;

    const handle = this.nextHandle++;
    this.handles.set(page, handle);
    this.pages.set(handle, page);
    return handle;
  }

  /**
   * Forward the page's line change notifications to our listeners (once per page)
   */
  private async watch(page: Page, handle: number): Promise<void> {
    if (this.watched.has(page)) return;
    this.watched.add(page);

    await page.exposeFunction("__chartLinesChanged", (kind: LineChangeKind, name: string) => {
      for (const listener of this.listeners) listener({ kind, handle, name });
    });
    await page.evaluate(() => {
      window.chartBridge?.onLinesChanged((kind, name) => window.__chartLinesChanged?.(kind, name));
    });
  }

  private requirePage(handle: number): Page {
    const page = this.pages.get(handle);
    if (!page || page.isClosed()) {
      throw new HostError(`Unknown surface ${handle}`, HOST_ERRORS.UNKNOWN_SURFACE);
    }
    return page;
  }

  private bridgeMissing(handle: number): HostError {
    return new HostError(`Surface ${handle} has no chartBridge`, HOST_ERRORS.BRIDGE_MISSING);
  }
}
