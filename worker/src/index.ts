/**
 * Chart Capture Worker
 *
 * Watches the shared folder for a capture request and, for each one, captures
 * every configured timeframe of the symbol with all horizontal lines mirrored
 * onto it, then writes a completion descriptor for the requester.
 *
 * Also:
 * - Exports the user-drawn horizontal lines to a JSON file on every line
 *   change and on each poll tick
 */

import { config } from "dotenv";
import { join, resolve } from "path";
import { BrowserChartHost } from "@/lib/charts/browser-host";
import { MemoryChartHost } from "@/lib/charts/memory-host";
import type { ChartHost } from "@/lib/charts/types";
import { CaptureOrchestrator, createRequestWatcher } from "@/lib/capture";
import { LineExporter, createLineExportTask } from "@/lib/drawings";
import type { RepeatingTask } from "@/lib/scheduling/repeating-task";
import { ConfigError, loadConfig } from "./config";
import type { WorkerConfig } from "./config";

// Load env from parent .env.local
config({ path: resolve(process.cwd(), "../.env.local") });
config({ path: resolve(process.cwd(), ".env.local") });

const tasks: RepeatingTask[] = [];
let host: ChartHost | null = null;
let unsubscribeLines: (() => void) | null = null;

async function createHost(cfg: WorkerConfig): Promise<ChartHost> {
  if (cfg.host === "memory") {
    console.log("[Host] Using in-process memory host (dry run, placeholder artifacts)");
    return new MemoryChartHost();
  }
  return BrowserChartHost.connect({ browserURL: cfg.browserURL, chartAppUrl: cfg.chartAppUrl });
}

/**
 * Poll for capture requests every pollIntervalSeconds
 */
function startRequestWatcher(chartHost: ChartHost, cfg: WorkerConfig): void {
  const orchestrator = new CaptureOrchestrator({ host: chartHost, settings: cfg.capture });
  const watcher = createRequestWatcher(orchestrator, cfg.pollIntervalSeconds * 1000);
  tasks.push(watcher);
  watcher.start();

  console.log(
    `[Watcher] Watching ${orchestrator.markerPath} (every ${cfg.pollIntervalSeconds}s, ` +
      `${cfg.capture.canCreateSurfaces ? "can open charts" : "read-only"})`
  );
}

/**
 * Export horizontal lines on every user line change and every tick
 */
function startLineExporter(chartHost: ChartHost, cfg: WorkerConfig): void {
  const exportPath = join(cfg.capture.commonDir, cfg.exportFileName);
  const exporter = new LineExporter(chartHost, {
    symbol: cfg.capture.symbol,
    exportPath,
    priceDecimals: cfg.priceDecimals,
    timeZone: cfg.capture.timeZone,
  });

  const exportTask = createLineExportTask(chartHost, exporter, cfg.pollIntervalSeconds * 1000);
  tasks.push(exportTask.task);
  unsubscribeLines = exportTask.unsubscribe;
  exportTask.task.start();

  console.log(`[Export] Exporting horizontal lines to ${exportPath} (on change + every ${cfg.pollIntervalSeconds}s)`);
}

async function main(): Promise<void> {
  console.log("================================================");
  console.log("  Chart Capture Worker");
  console.log("================================================\n");

  let cfg: WorkerConfig;
  try {
    cfg = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  console.log(`Symbol: ${cfg.capture.symbol}`);
  console.log(`Timeframes: ${cfg.capture.timeframes.join(", ")}`);
  console.log(`Image: ${cfg.capture.imageWidth}x${cfg.capture.imageHeight} ${cfg.capture.imageFormat}`);
  console.log(`Common folder: ${cfg.capture.commonDir}`);
  console.log(`Terminal path: ${cfg.capture.terminalPath}\n`);

  host = await createHost(cfg);

  startRequestWatcher(host, cfg);
  startLineExporter(host, cfg);

  console.log("\nWorker running. Press Ctrl+C to stop.\n");
}

async function shutdown(): Promise<void> {
  unsubscribeLines?.();
  await Promise.all(tasks.map((task) => task.stop()));
  await host?.disconnect();
  process.exit(0);
}

// Graceful shutdown
process.on("SIGINT", () => {
  console.log("\nShutting down...");
  shutdown().catch((err) => {
    console.error("Shutdown failed:", err);
    process.exit(1);
  });
});

process.on("SIGTERM", () => {
  console.log("\nTerminating...");
  shutdown().catch((err) => {
    console.error("Shutdown failed:", err);
    process.exit(1);
  });
});

main().catch((err) => {
  console.error("Worker failed to start:", err);
  process.exit(1);
});
