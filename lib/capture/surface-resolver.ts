/**
 * Surface Resolver
 *
 * Finds the open chart for a symbol/timeframe, or opens one. Surfaces opened
 * here are added to the cycle's ownership set so the Reaper closes them (and
 * only them) when the cycle ends.
 */

import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost, Surface } from "@/lib/charts/types";
import { SurfaceUnavailableError } from "./errors";

export interface ResolvedSurface extends Surface {
  createdNow: boolean;
}

export class SurfaceResolver {
  constructor(private readonly host: ChartHost) {}

  /**
   * @throws SurfaceUnavailableError when no surface exists and one cannot be opened
   */
  async resolve(symbol: string, timeframe: string, owned: Set<number>): Promise<ResolvedSurface> {
    // Lowest handle wins so the same environment always resolves the same surface
    const existing = (await this.host.listSurfaces())
      .filter((s) => s.symbol === symbol && s.timeframe === timeframe)
      .sort((a, b) => a.handle - b.handle)[0];

    if (existing) {
      return { ...existing, createdNow: false };
    }

    let handle: number;
    try {
      handle = await this.host.openSurface(symbol, timeframe);
    } catch (err) {
      throw new SurfaceUnavailableError(symbol, timeframe, hostErrorCode(err), errorMessage(err));
    }

    owned.add(handle);
    console.log(`[Resolver] Opened ${symbol} ${timeframe} as surface ${handle}`);
    return { handle, symbol, timeframe, createdNow: true };
  }
}
