import { RepeatingTask } from "@/lib/scheduling/repeating-task";
import type { CaptureOrchestrator } from "./orchestrator";

/**
 * Polls for the request marker. A poll that lands while a cycle is still
 * running is skipped.
 */
export function createRequestWatcher(orchestrator: CaptureOrchestrator, pollIntervalMs: number): RepeatingTask {
  return new RepeatingTask("Watcher", pollIntervalMs, async () => {
    await orchestrator.runCycle();
  });
}
