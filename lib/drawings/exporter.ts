/**
 * Horizontal Line Exporter
 *
 * Writes the user-drawn horizontal lines of every open surface of a symbol to
 * a JSON file that outside readers poll. Runs on every line change and on a
 * timer, so it only logs when the exported count changes.
 *
 * Output:
 * { "symbol": "XAUUSDp", "timestamp": "2026-10-19 14:03:27",
 *   "lines": [{ "name": "Support_3", "price": 2650.5, "color": "#26A69A" }] }
 */

import { promises as fs } from "fs";
import { dirname } from "path";
import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost, HorizontalLine } from "@/lib/charts/types";
import { formatLocalTimestamp } from "@/lib/utils/time";
import { toHexTriplet } from "./colors";
import { isMirrorName } from "./mirror";

export interface ExportedLine {
  name: string;   // "<line name>_<surface handle>"
  price: number;
  color: string;  // "#RRGGBB"
}

export interface LineExport {
  symbol: string;
  timestamp: string;
  lines: ExportedLine[];
}

export interface LineExporterOptions {
  symbol: string;
  exportPath: string;
  priceDecimals: number;
  timeZone: string;
  now?: () => Date;
}

export class LineExporter {
  private lastCount: number | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly host: ChartHost,
    private readonly options: LineExporterOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Collect, dedupe and write. Returns what was exported.
   */
  async export(): Promise<LineExport> {
    const { symbol, exportPath } = this.options;
    const lines = await this.collect();

    const payload: LineExport = {
      symbol,
      timestamp: formatLocalTimestamp(this.now(), this.options.timeZone),
      lines,
    };

    try {
      await fs.mkdir(dirname(exportPath), { recursive: true });
      await fs.writeFile(exportPath, JSON.stringify(payload, null, 2), "utf-8");
    } catch (err) {
      console.error(`[Export] Failed to write ${exportPath}:`, errorMessage(err));
      return payload;
    }

    if (lines.length !== this.lastCount) {
      console.log(`[Export] ${symbol}: ${lines.length} horizontal lines -> ${exportPath}`);
      this.lastCount = lines.length;
    }

    return payload;
  }

  private async collect(): Promise<ExportedLine[]> {
    const { symbol, priceDecimals } = this.options;

    const surfaces = (await this.host.listSurfaces())
      .filter((s) => s.symbol === symbol)
      .sort((a, b) => a.handle - b.handle);

    const seenPrices = new Set<number>();
    const exported: ExportedLine[] = [];

    for (const surface of surfaces) {
      let lines: HorizontalLine[];
      try {
        lines = await this.host.listLines(surface.handle);
      } catch (err) {
        // Surface closed while we were enumerating
        console.warn(
          `[Export] Skipping ${symbol} ${surface.timeframe} (code ${hostErrorCode(err)}):`,
          errorMessage(err)
        );
        continue;
      }

      for (const line of lines) {
        if (isMirrorName(line.name)) continue;

        const price = Number(line.price.toFixed(priceDecimals));
        if (seenPrices.has(price)) continue;
        seenPrices.add(price);

        exported.push({
          name: `${line.name}_${surface.handle}`,
          price,
          color: toHexTriplet(line.color),
        });
      }
    }

    return exported;
  }
}
