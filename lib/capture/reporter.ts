/**
 * Completion Reporter
 *
 * Writes the cycle's completion descriptor next to the request marker, then
 * removes the marker. The descriptor is the success signal: a marker that
 * cannot be removed is only a warning.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { errorMessage } from "@/lib/charts/types";
import { formatLocalTimestamp } from "@/lib/utils/time";
import { ReportWriteFailedError } from "./errors";
import type { CompletionDescriptor } from "./types";

export interface CompletionReporterOptions {
  commonDir: string;
  completionFileName: string;
  requestMarkerName: string;
  outputPrefix: string;
  terminalPath: string;
  timeZone: string;
  now?: () => Date;
}

export class CompletionReporter {
  private readonly now: () => Date;

  constructor(private readonly options: CompletionReporterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get completionPath(): string {
    return join(this.options.commonDir, this.options.completionFileName);
  }

  get markerPath(): string {
    return join(this.options.commonDir, this.options.requestMarkerName);
  }

  /**
   * @throws ReportWriteFailedError; the marker is left for the caller to consume
   */
  async report(symbol: string, successCount: number, timeframes: string[]): Promise<CompletionDescriptor> {
    const descriptor: CompletionDescriptor = {
      symbol,
      count: successCount,
      timeframes: [...timeframes],
      timestamp: formatLocalTimestamp(this.now(), this.options.timeZone),
      prefix: `${this.options.outputPrefix}${symbol}_`,
      terminal_path: this.options.terminalPath,
    };

    // Single write so a polling reader never sees half a file
    try {
      await fs.writeFile(this.completionPath, JSON.stringify(descriptor, null, 2), "utf-8");
    } catch (err) {
      throw new ReportWriteFailedError(this.completionPath, err);
    }

    console.log(`[Report] ${symbol}: ${successCount}/${timeframes.length} captures -> ${this.completionPath}`);

    await this.consumeMarker();
    return descriptor;
  }

  /**
   * Remove the request marker. Never throws.
   */
  async consumeMarker(): Promise<boolean> {
    try {
      await fs.unlink(this.markerPath);
      return true;
    } catch (err) {
      console.warn(`[Report] Could not remove request marker ${this.markerPath}:`, errorMessage(err));
      return false;
    }
  }
}
