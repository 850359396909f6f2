import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost } from "@/lib/charts/types";
import type { Sleep } from "./types";

/**
 * Closes the surfaces a cycle opened, after a grace delay so an in-flight
 * capture is not cut short. Pre-existing surfaces are never in the set.
 */
export class Reaper {
  constructor(
    private readonly host: ChartHost,
    private readonly graceMs: number,
    private readonly sleep: Sleep
  ) {}

  async cleanup(created: Set<number>): Promise<number> {
    if (created.size === 0) return 0;

    await this.sleep(this.graceMs);

    let closed = 0;
    for (const handle of created) {
      try {
        await this.host.closeSurface(handle);
        closed++;
      } catch (err) {
        console.warn(`[Reaper] Could not close surface ${handle} (code ${hostErrorCode(err)}):`, errorMessage(err));
      }
    }

    console.log(`[Reaper] Closed ${closed}/${created.size} surfaces opened this cycle`);
    created.clear();
    return closed;
  }
}
