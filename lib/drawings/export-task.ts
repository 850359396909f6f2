import type { ChartHost } from "@/lib/charts/types";
import { RepeatingTask } from "@/lib/scheduling/repeating-task";
import type { LineExporter } from "./exporter";
import { isMirrorName } from "./mirror";

export interface LineExportTask {
  task: RepeatingTask;
  unsubscribe: () => void;
}

/**
 * Export on a timer and on every user line change. Changes to our own
 * mirrors are ignored; they never appear in the export.
 */
export function createLineExportTask(
  host: ChartHost,
  exporter: Pick<LineExporter, "export">,
  intervalMs: number
): LineExportTask {
  const task = new RepeatingTask("Export", intervalMs, async () => {
    await exporter.export();
  });

  const unsubscribe = host.onLinesChanged((event) => {
    if (isMirrorName(event.name)) return;
    void task.trigger();
  });

  return { task, unsubscribe };
}
