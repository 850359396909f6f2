/**
 * Memory Chart Host
 *
 * In-process ChartHost backed by a zustand vanilla store, keyed by surface
 * handle. Used by the tests and by the worker's dry-run mode
 * (CHART_HOST=memory). Supports refusing to open a timeframe and failing a
 * capture so partial-failure cycles can be reproduced.
 */

import { createStore } from "zustand/vanilla";
import { HostError, HOST_ERRORS } from "./types";
import type {
  ChartHost,
  HorizontalLine,
  LineChangeEvent,
  LineChangeListener,
  ScreenshotOptions,
  Surface,
} from "./types";

interface SurfaceState {
  symbol: string;
  timeframe: string;
  lines: HorizontalLine[];
}

export interface CaptureRecord {
  handle: number;
  symbol: string;
  timeframe: string;
  width: number;
  height: number;
  lineNames: string[];
}

interface MemoryHostState {
  surfaces: Record<number, SurfaceState>;
  nextHandle: number;
  redraws: number[];
  captures: CaptureRecord[];
  closed: number[];

  // Fault injection, keyed by "symbol:timeframe"
  unopenable: string[];
  failingCaptures: string[];

  addSurface: (symbol: string, timeframe: string) => number;
  removeSurface: (handle: number) => void;
  putLine: (handle: number, line: HorizontalLine) => void;
  dropLine: (handle: number, name: string) => boolean;
}

const DEFAULT_LINE: Omit<HorizontalLine, "name" | "price"> = {
  color: "#787B86",
  lineWidth: 1,
  lineStyle: "solid",
  labelText: "",
  background: false,
  selectable: true,
};

function key(symbol: string, timeframe: string): string {
  return `${symbol}:${timeframe}`;
}

function createMemoryHostStore() {
  return createStore<MemoryHostState>()((set, get) => ({
    surfaces: {},
    nextHandle: 1,
    redraws: [],
    captures: [],
    closed: [],
    unopenable: [],
    failingCaptures: [],

    addSurface: (symbol, timeframe) => {
      const handle = get().nextHandle;
      set((state) => ({
        nextHandle: handle + 1,
        surfaces: { ...state.surfaces, [handle]: { symbol, timeframe, lines: [] } },
      }));
      return handle;
    },

    removeSurface: (handle) => {
      set((state) => {
        const { [handle]: _removed, ...rest } = state.surfaces;
        return { surfaces: rest, closed: [...state.closed, handle] };
      });
    },

    putLine: (handle, line) => {
      set((state) => {
        const surface = state.surfaces[handle];
        const lines = surface.lines.filter((l) => l.name !== line.name);
        return {
          surfaces: { ...state.surfaces, [handle]: { ...surface, lines: [...lines, line] } },
        };
      });
    },

    dropLine: (handle, name) => {
      const surface = get().surfaces[handle];
      if (!surface.lines.some((l) => l.name === name)) return false;
      set((state) => ({
        surfaces: {
          ...state.surfaces,
          [handle]: { ...surface, lines: surface.lines.filter((l) => l.name !== name) },
        },
      }));
      return true;
    },
  }));
}

export class MemoryChartHost implements ChartHost {
  readonly store = createMemoryHostStore();
  private listeners = new Set<LineChangeListener>();

  // ─── Seeding helpers (synchronous, emit change events like a user would) ───

  addSurface(symbol: string, timeframe: string): number {
    return this.store.getState().addSurface(symbol, timeframe);
  }

  drawLine(handle: number, line: Pick<HorizontalLine, "name" | "price"> & Partial<HorizontalLine>): void {
    this.requireSurface(handle);
    const exists = this.linesOn(handle).some((l) => l.name === line.name);
    this.store.getState().putLine(handle, { ...DEFAULT_LINE, ...line });
    this.emit({ kind: exists ? "modify" : "create", handle, name: line.name });
  }

  moveLine(handle: number, name: string, price: number): void {
    const line = this.linesOn(handle).find((l) => l.name === name);
    if (!line) throw new HostError(`Line ${name} not found on surface ${handle}`, HOST_ERRORS.LINE_NOT_FOUND);
    this.store.getState().putLine(handle, { ...line, price });
    this.emit({ kind: "move", handle, name });
  }

  eraseLine(handle: number, name: string): void {
    this.requireSurface(handle);
    if (this.store.getState().dropLine(handle, name)) {
      this.emit({ kind: "delete", handle, name });
    }
  }

  linesOn(handle: number): HorizontalLine[] {
    return this.requireSurface(handle).lines;
  }

  openHandles(): number[] {
    return Object.keys(this.store.getState().surfaces).map(Number);
  }

  refuseOpen(symbol: string, timeframe: string): void {
    this.store.setState((state) => ({ unopenable: [...state.unopenable, key(symbol, timeframe)] }));
  }

  failCapture(symbol: string, timeframe: string): void {
    this.store.setState((state) => ({ failingCaptures: [...state.failingCaptures, key(symbol, timeframe)] }));
  }

  // ─── ChartHost ───

  async listSurfaces(): Promise<Surface[]> {
    const { surfaces } = this.store.getState();
    return Object.entries(surfaces).map(([handle, s]) => ({
      handle: Number(handle),
      symbol: s.symbol,
      timeframe: s.timeframe,
    }));
  }

  async openSurface(symbol: string, timeframe: string): Promise<number> {
    if (this.store.getState().unopenable.includes(key(symbol, timeframe))) {
      throw new HostError(`Cannot open ${symbol} ${timeframe}`, HOST_ERRORS.SURFACE_OPEN_FAILED);
    }
    return this.addSurface(symbol, timeframe);
  }

  async closeSurface(handle: number): Promise<void> {
    this.requireSurface(handle);
    this.store.getState().removeSurface(handle);
  }

  async listLines(handle: number): Promise<HorizontalLine[]> {
    return this.linesOn(handle).map((l) => ({ ...l }));
  }

  async createLine(handle: number, line: HorizontalLine): Promise<void> {
    if (this.linesOn(handle).some((l) => l.name === line.name)) {
      throw new HostError(`Line ${line.name} already exists on surface ${handle}`, HOST_ERRORS.LINE_EXISTS);
    }
    this.store.getState().putLine(handle, { ...line });
    this.emit({ kind: "create", handle, name: line.name });
  }

  async deleteLine(handle: number, name: string): Promise<boolean> {
    this.requireSurface(handle);
    const removed = this.store.getState().dropLine(handle, name);
    if (removed) this.emit({ kind: "delete", handle, name });
    return removed;
  }

  async redraw(handle: number): Promise<void> {
    this.requireSurface(handle);
    this.store.setState((state) => ({ redraws: [...state.redraws, handle] }));
  }

  async screenshot(handle: number, options: ScreenshotOptions): Promise<Uint8Array> {
    const surface = this.requireSurface(handle);
    if (this.store.getState().failingCaptures.includes(key(surface.symbol, surface.timeframe))) {
      throw new HostError(`Capture failed for surface ${handle}`, HOST_ERRORS.CAPTURE_FAILED);
    }

    const record: CaptureRecord = {
      handle,
      symbol: surface.symbol,
      timeframe: surface.timeframe,
      width: options.width,
      height: options.height,
      lineNames: surface.lines.map((l) => l.name),
    };
    this.store.setState((state) => ({ captures: [...state.captures, record] }));

    // Placeholder artifact: a text description instead of pixels
    return new TextEncoder().encode(JSON.stringify(record));
  }

  onLinesChanged(listener: LineChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async disconnect(): Promise<void> {
    this.listeners.clear();
  }

  private requireSurface(handle: number): SurfaceState {
    const surface = this.store.getState().surfaces[handle];
    if (!surface) {
      throw new HostError(`Unknown surface ${handle}`, HOST_ERRORS.UNKNOWN_SURFACE);
    }
    return surface;
  }

  private emit(event: LineChangeEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
