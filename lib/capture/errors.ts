/**
 * Capture cycle failures. None of these escape a cycle; the orchestrator
 * logs them with symbol, timeframe and host code and moves on.
 */

import { errorMessage } from "@/lib/charts/types";

export class SurfaceUnavailableError extends Error {
  constructor(
    readonly symbol: string,
    readonly timeframe: string,
    readonly code: number,
    detail: string
  ) {
    super(`No surface for ${symbol} ${timeframe} (code ${code}): ${detail}`);
    this.name = "SurfaceUnavailableError";
  }
}

export class CaptureFailedError extends Error {
  constructor(
    readonly symbol: string,
    readonly timeframe: string,
    readonly code: number,
    detail: string
  ) {
    super(`Capture failed for ${symbol} ${timeframe} (code ${code}): ${detail}`);
    this.name = "CaptureFailedError";
  }
}

export class RequestUnreadableError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Capture request ${path} could not be read: ${errorMessage(cause)}`);
    this.name = "RequestUnreadableError";
  }
}

export class ReportWriteFailedError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Completion descriptor ${path} could not be written: ${errorMessage(cause)}`);
    this.name = "ReportWriteFailedError";
  }
}
