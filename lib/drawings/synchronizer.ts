/**
 * Horizontal Line Synchronizer
 *
 * Mirrors every user-drawn horizontal line from the other open surfaces of a
 * symbol onto one destination surface, so a capture of that surface shows all
 * levels regardless of which timeframe they were drawn on.
 *
 * There is no lock over a surface's line namespace. Correctness comes from
 * naming instead:
 * 1. Purge every mirror already on the destination (drops mirrors whose source is gone)
 * 2. For each user line on each other surface, delete any line holding its
 *    mirror name, then create the copy fresh
 *
 * Running sync twice with no line changes yields the same mirror set.
 * User lines are never modified or deleted.
 */

import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost, HorizontalLine, Surface } from "@/lib/charts/types";
import { isMirrorName, mirrorName } from "./mirror";

export class LineSynchronizer {
  constructor(private readonly host: ChartHost) {}

  /**
   * Mirror lines onto `destination`. Returns the number of copies created.
   */
  async sync(destination: Surface): Promise<number> {
    const present = new Set((await this.host.listLines(destination.handle)).map((l) => l.name));

    const purged = await this.purgeMirrors(destination, present);
    if (purged > 0) {
      console.log(`[Sync] ${destination.symbol} ${destination.timeframe}: purged ${purged} previous mirrors`);
    }

    const sources = (await this.host.listSurfaces())
      .filter((s) => s.symbol === destination.symbol && s.handle !== destination.handle)
      .sort((a, b) => a.handle - b.handle);

    let copied = 0;

    for (const source of sources) {
      let lines: HorizontalLine[];
      try {
        lines = await this.host.listLines(source.handle);
      } catch (err) {
        // Source closed since listSurfaces
        console.warn(
          `[Sync] Skipping ${source.symbol} ${source.timeframe} as a source (code ${hostErrorCode(err)}):`,
          errorMessage(err)
        );
        continue;
      }

      for (const line of lines) {
        if (isMirrorName(line.name)) continue;
        if (await this.mirrorLine(destination, source, line, present)) copied++;
      }
    }

    console.log(
      `[Sync] ${destination.symbol} ${destination.timeframe}: mirrored ${copied} lines from ${sources.length} surfaces`
    );
    return copied;
  }

  private async purgeMirrors(destination: Surface, present: Set<string>): Promise<number> {
    let purged = 0;

    for (const name of [...present]) {
      if (!isMirrorName(name)) continue;
      try {
        if (await this.host.deleteLine(destination.handle, name)) purged++;
        present.delete(name);
      } catch (err) {
        console.warn(
          `[Sync] Could not purge ${name} on ${destination.symbol} ${destination.timeframe} (code ${hostErrorCode(err)}):`,
          errorMessage(err)
        );
      }
    }

    return purged;
  }

  private async mirrorLine(
    destination: Surface,
    source: Surface,
    line: HorizontalLine,
    present: Set<string>
  ): Promise<boolean> {
    const name = mirrorName(line.name, source.handle);

    try {
      if (present.has(name)) {
        await this.host.deleteLine(destination.handle, name);
        present.delete(name);
      }

      await this.host.createLine(destination.handle, {
        name,
        price: line.price,
        color: line.color,
        lineWidth: line.lineWidth,
        lineStyle: line.lineStyle,
        labelText: line.labelText,
        background: true,
        selectable: false,
      });
      present.add(name);
      return true;
    } catch (err) {
      console.warn(
        `[Sync] Could not mirror ${line.name} from ${source.timeframe} to ${destination.symbol} ${destination.timeframe} (code ${hostErrorCode(err)}):`,
        errorMessage(err)
      );
      return false;
    }
  }
}
