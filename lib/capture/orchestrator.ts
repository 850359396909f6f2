/**
 * Capture Orchestrator
 *
 * One cycle per detected request marker:
 *
 *   idle -> request-detected -> (resolving -> syncing -> capturing) x N
 *        -> reporting -> cleanup -> idle
 *
 * Timeframes run strictly one after another in the configured order; mirror
 * sets and surface creation must not race with themselves. A timeframe that
 * cannot be resolved or captured is skipped and the cycle carries on. The
 * descriptor is written (and the marker consumed) only when at least one
 * capture succeeded; otherwise the marker stays for a retry by a worker that
 * can open charts.
 *
 * A read-only worker (canCreateSurfaces=false) never touches the host and
 * always ends with no captures, deferring to a capable worker.
 */

import { promises as fs } from "fs";
import { join } from "path";
import { errorMessage, hostErrorCode } from "@/lib/charts/types";
import type { ChartHost, ImageFormat } from "@/lib/charts/types";
import { LineSynchronizer } from "@/lib/drawings/synchronizer";
import { sleep as realSleep } from "@/lib/utils/time";
import { Capturer } from "./capturer";
import { ReportWriteFailedError, RequestUnreadableError, SurfaceUnavailableError } from "./errors";
import { Reaper } from "./reaper";
import { CompletionReporter } from "./reporter";
import { SurfaceResolver } from "./surface-resolver";
import type { ResolvedSurface } from "./surface-resolver";
import type { CaptureResult, CaptureSettings, CycleOutcome, Sleep } from "./types";

export type CycleState =
  | "idle"
  | "request-detected"
  | "resolving"
  | "syncing"
  | "capturing"
  | "reporting"
  | "cleanup";

/**
 * Per-cycle state. Created when a request is detected, dropped when the cycle ends.
 */
interface CycleContext {
  symbol: string;
  owned: Set<number>;           // Surfaces opened by this cycle
  results: CaptureResult[];
  successCount: number;
}

export interface OrchestratorDeps {
  host: ChartHost;
  settings: CaptureSettings;
  sleep?: Sleep;
  now?: () => Date;
}

const FILE_EXTENSIONS: Record<ImageFormat, string> = {
  png: "png",
  jpeg: "jpg",
  webp: "webp",
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class CaptureOrchestrator {
  private _state: CycleState = "idle";
  private readonly settings: CaptureSettings;
  private readonly sleep: Sleep;

  private readonly resolver: SurfaceResolver;
  private readonly synchronizer: LineSynchronizer;
  private readonly capturer: Capturer;
  private readonly reporter: CompletionReporter;
  private readonly reaper: Reaper;

  constructor(deps: OrchestratorDeps) {
    const { host, settings } = deps;
    this.settings = settings;
    this.sleep = deps.sleep ?? realSleep;

    this.resolver = new SurfaceResolver(host);
    this.synchronizer = new LineSynchronizer(host);
    this.capturer = new Capturer(host, {
      renderSettleDelayMs: settings.renderSettleDelayMs,
      imageFormat: settings.imageFormat,
      sleep: this.sleep,
    });
    this.reporter = new CompletionReporter({
      commonDir: settings.commonDir,
      completionFileName: settings.completionFileName,
      requestMarkerName: settings.requestMarkerName,
      outputPrefix: settings.outputPrefix,
      terminalPath: settings.terminalPath,
      timeZone: settings.timeZone,
      now: deps.now,
    });
    this.reaper = new Reaper(host, settings.cleanupGraceMs, this.sleep);
  }

  get state(): CycleState {
    return this._state;
  }

  get markerPath(): string {
    return this.reporter.markerPath;
  }

  /**
   * Artifact path for a timeframe: <terminalPath>/<prefix><symbol>_<timeframe>.<ext>
   */
  artifactPath(timeframe: string): string {
    const { terminalPath, outputPrefix, symbol, imageFormat } = this.settings;
    return join(terminalPath, `${outputPrefix}${symbol}_${timeframe}.${FILE_EXTENSIONS[imageFormat]}`);
  }

  /**
   * Check for a request and, if there is one, run a full cycle
   */
  async runCycle(): Promise<CycleOutcome> {
    const { symbol, timeframes } = this.settings;

    let request: string;
    try {
      request = await fs.readFile(this.markerPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return { status: "idle", symbol, results: [] };
      console.error(`[Capture] ${new RequestUnreadableError(this.markerPath, err).message}`);
      return { status: "unreadable", symbol, results: [] };
    }

    this._state = "request-detected";
    console.log(`\n[Capture] Request detected for ${symbol} (${timeframes.join(", ")}): "${request.trim()}"`);

    if (!this.settings.canCreateSurfaces) {
      this._state = "idle";
      console.warn(`[Capture] Read-only worker: leaving request for a worker that can open charts`);
      return {
        status: "no-captures",
        symbol,
        results: timeframes.map((timeframe) => ({
          timeframe,
          success: false,
          outputPath: null,
          mirroredCount: 0,
          error: "read-only worker",
        })),
      };
    }

    const ctx: CycleContext = { symbol, owned: new Set(), results: [], successCount: 0 };
    const startTime = Date.now();

    try {
      for (const timeframe of timeframes) {
        const result = await this.captureTimeframe(ctx, timeframe);
        ctx.results.push(result);
        if (result.success) ctx.successCount++;
      }

      return await this.finishCycle(ctx);
    } finally {
      this._state = "cleanup";
      await this.reaper.cleanup(ctx.owned);
      this._state = "idle";
      console.log(`[Capture] Cycle finished in ${Date.now() - startTime}ms`);
    }
  }

  private async captureTimeframe(ctx: CycleContext, timeframe: string): Promise<CaptureResult> {
    const { symbol } = ctx;

    this._state = "resolving";
    let surface: ResolvedSurface;
    try {
      surface = await this.resolver.resolve(symbol, timeframe, ctx.owned);
    } catch (err) {
      const error =
        err instanceof SurfaceUnavailableError
          ? err
          : new SurfaceUnavailableError(symbol, timeframe, hostErrorCode(err), errorMessage(err));
      console.warn(`[Capture] Skipping ${symbol} ${timeframe}: ${error.message}`);
      return { timeframe, success: false, outputPath: null, mirroredCount: 0, error: error.message };
    }

    this._state = "syncing";
    let mirroredCount = 0;
    try {
      mirroredCount = await this.synchronizer.sync(surface);
    } catch (err) {
      console.warn(
        `[Capture] Line sync failed for ${symbol} ${timeframe} (code ${hostErrorCode(err)}), capturing anyway:`,
        errorMessage(err)
      );
    }
    // Mirrored lines only show after a redraw
    await this.sleep(this.settings.mirrorSettleDelayMs);

    this._state = "capturing";
    const outputPath = this.artifactPath(timeframe);
    try {
      await this.capturer.capture(surface, this.settings.imageWidth, this.settings.imageHeight, outputPath);
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[Capture] ${message}`);
      return { timeframe, success: false, outputPath: null, mirroredCount, error: message };
    }

    return { timeframe, success: true, outputPath, mirroredCount };
  }

  private async finishCycle(ctx: CycleContext): Promise<CycleOutcome> {
    const { symbol, results, successCount } = ctx;
    const { timeframes } = this.settings;

    if (successCount === 0) {
      console.error(
        `[Capture] No captures succeeded for ${symbol} (${timeframes.length} timeframes); request left in place`
      );
      return { status: "no-captures", symbol, results };
    }

    this._state = "reporting";
    try {
      const descriptor = await this.reporter.report(symbol, successCount, timeframes);
      return { status: "completed", symbol, results, descriptor };
    } catch (err) {
      if (!(err instanceof ReportWriteFailedError)) throw err;
      console.error(`[Capture] ${err.message}; ${successCount} captures are on disk but unreported`);
      await this.reporter.consumeMarker();
      return { status: "report-failed", symbol, results };
    }
  }
}
