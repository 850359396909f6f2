/**
 * Chart Host Types
 *
 * The boundary between the capture engine and whatever actually draws charts.
 * A surface is one open chart (symbol + timeframe) addressed by a numeric
 * handle; horizontal lines live on surfaces and are addressed by name.
 */

export type LineStyle = "solid" | "dashed" | "dotted";

/**
 * Horizontal price level as the host stores it
 */
export interface HorizontalLine {
  name: string;           // Unique per surface
  price: number;
  color: string;          // "#RRGGBB", "#RGB", "rgb()" or "rgba()"
  lineWidth: number;
  lineStyle: LineStyle;
  labelText: string;
  background: boolean;    // Drawn behind price bars, does not block clicks
  selectable: boolean;
}

/**
 * An open chart
 */
export interface Surface {
  handle: number;
  symbol: string;
  timeframe: string;
}

export type LineChangeKind = "create" | "delete" | "move" | "modify";

export interface LineChangeEvent {
  kind: LineChangeKind;
  handle: number;
  name: string;
}

export type LineChangeListener = (event: LineChangeEvent) => void;

export interface ScreenshotOptions {
  width: number;
  height: number;
  align: "right";
  format: ImageFormat;
}

export type ImageFormat = "png" | "jpeg" | "webp";

/**
 * Everything the engine needs from a charting environment.
 * Failures are reported by throwing HostError with the host's code.
 */
export interface ChartHost {
  listSurfaces(): Promise<Surface[]>;
  openSurface(symbol: string, timeframe: string): Promise<number>;
  closeSurface(handle: number): Promise<void>;

  listLines(handle: number): Promise<HorizontalLine[]>;
  createLine(handle: number, line: HorizontalLine): Promise<void>;
  deleteLine(handle: number, name: string): Promise<boolean>;

  redraw(handle: number): Promise<void>;
  screenshot(handle: number, options: ScreenshotOptions): Promise<Uint8Array>;

  /** Returns an unsubscribe function */
  onLinesChanged(listener: LineChangeListener): () => void;

  disconnect(): Promise<void>;
}

/**
 * Host error codes
 */
export const HOST_ERRORS = {
  UNKNOWN_SURFACE: 4101,
  SURFACE_OPEN_FAILED: 4102,
  LINE_EXISTS: 4200,
  LINE_NOT_FOUND: 4202,
  CAPTURE_FAILED: 4301,
  BRIDGE_MISSING: 4401,
} as const;

export class HostError extends Error {
  readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.name = "HostError";
    this.code = code;
  }
}

/**
 * Code of a host failure, 0 when the thrown value did not come from a host
 */
export function hostErrorCode(err: unknown): number {
  return err instanceof HostError ? err.code : 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
