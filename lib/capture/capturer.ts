import { promises as fs } from "fs";
import { dirname } from "path";
import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost, ImageFormat, Surface } from "@/lib/charts/types";
import { CaptureFailedError } from "./errors";
import type { Sleep } from "./types";

export interface CapturerOptions {
  renderSettleDelayMs: number;
  imageFormat: ImageFormat;
  sleep: Sleep;
}

/**
 * Redraw, let rendering settle, then screenshot a surface to a file.
 * Does not retry; that is the orchestrator's call.
 */
export class Capturer {
  constructor(
    private readonly host: ChartHost,
    private readonly options: CapturerOptions
  ) {}

  /**
   * @throws CaptureFailedError with the host's code
   */
  async capture(surface: Surface, width: number, height: number, outputPath: string): Promise<void> {
    try {
      await this.host.redraw(surface.handle);
      await this.options.sleep(this.options.renderSettleDelayMs);

      const image = await this.host.screenshot(surface.handle, {
        width,
        height,
        align: "right",
        format: this.options.imageFormat,
      });

      await fs.mkdir(dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, image);
    } catch (err) {
      throw new CaptureFailedError(surface.symbol, surface.timeframe, hostErrorCode(err), errorMessage(err));
    }

    console.log(`[Capturer] ${surface.symbol} ${surface.timeframe} -> ${outputPath} (${width}x${height})`);
  }
}
