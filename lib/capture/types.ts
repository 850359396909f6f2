/**
 * Capture Types
 */

import type { ImageFormat } from "@/lib/charts/types";

export interface CaptureSettings {
  symbol: string;
  timeframes: string[];           // Capture order

  imageWidth: number;
  imageHeight: number;
  imageFormat: ImageFormat;
  outputPrefix: string;           // "chart_" -> chart_XAUUSDp_H4.png

  renderSettleDelayMs: number;    // After redraw, before capture
  mirrorSettleDelayMs: number;    // Extra wait after mirroring lines
  cleanupGraceMs: number;         // Before closing surfaces we opened

  canCreateSurfaces: boolean;

  commonDir: string;              // Marker, descriptor and line export live here
  terminalPath: string;           // Artifacts are written here
  requestMarkerName: string;
  completionFileName: string;
  timeZone: string;
}

export interface CaptureResult {
  timeframe: string;
  success: boolean;
  outputPath: string | null;
  mirroredCount: number;
  error?: string;
}

/**
 * Written once per cycle when at least one capture succeeded
 */
export interface CompletionDescriptor {
  symbol: string;
  count: number;
  timeframes: string[];
  timestamp: string;
  prefix: string;          // "<outputPrefix><symbol>_"
  terminal_path: string;
}

export type CycleStatus = "idle" | "unreadable" | "completed" | "no-captures" | "report-failed";

export interface CycleOutcome {
  status: CycleStatus;
  symbol: string;
  results: CaptureResult[];
  descriptor?: CompletionDescriptor;
}

export type Sleep = (ms: number) => Promise<void>;
