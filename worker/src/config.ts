/**
 * Worker configuration
 *
 * Read from process.env (populated from .env.local by dotenv in index.ts).
 * Every problem is collected so a bad .env.local is fixed in one go.
 */

import { resolve } from "path";
import type { ImageFormat } from "@/lib/charts/types";
import { DEFAULT_TIMEFRAMES, parseTimeframes } from "@/lib/charts/timeframes";
import type { CaptureSettings } from "@/lib/capture/types";
import { localTimeZone } from "@/lib/utils/time";

export type HostKind = "browser" | "memory";

export interface WorkerConfig {
  capture: CaptureSettings;
  pollIntervalSeconds: number;
  exportFileName: string;
  priceDecimals: number;
  host: HostKind;
  browserURL: string;
  chartAppUrl: string;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

const IMAGE_FORMATS: readonly ImageFormat[] = ["png", "jpeg", "webp"];
const HOST_KINDS: readonly HostKind[] = ["browser", "memory"];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): WorkerConfig {
  const problems: string[] = [];

  const str = (name: string, fallback: string): string => {
    const value = env[name]?.trim();
    return value ? value : fallback;
  };

  const int = (name: string, fallback: number, min: number): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const bool = (name: string, fallback: boolean): boolean => {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (["true", "1", "yes"].includes(raw)) return true;
    if (["false", "0", "no"].includes(raw)) return false;
    problems.push(`${name} must be true/false (got "${raw}")`);
    return fallback;
  };

  const oneOf = <T extends string>(name: string, allowed: readonly T[], fallback: T): T => {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    const match = allowed.find((a) => a === raw);
    if (!match) {
      problems.push(`${name} must be one of ${allowed.join(", ")} (got "${raw}")`);
      return fallback;
    }
    return match;
  };

  const { timeframes, unknown } = parseTimeframes(str("CAPTURE_TIMEFRAMES", DEFAULT_TIMEFRAMES.join(",")));
  if (unknown.length > 0) problems.push(`CAPTURE_TIMEFRAMES has unknown timeframes: ${unknown.join(", ")}`);
  if (timeframes.length === 0 && unknown.length === 0) problems.push("CAPTURE_TIMEFRAMES is empty");

  const timeZone = str("TIMEZONE", localTimeZone());
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch {
    problems.push(`TIMEZONE "${timeZone}" is not a known time zone`);
  }

  const config: WorkerConfig = {
    capture: {
      symbol: str("CHART_SYMBOL", "XAUUSDp"),
      timeframes,
      imageWidth: int("IMAGE_WIDTH", 1920, 1),
      imageHeight: int("IMAGE_HEIGHT", 1080, 1),
      imageFormat: oneOf("IMAGE_FORMAT", IMAGE_FORMATS, "png"),
      outputPrefix: str("OUTPUT_PREFIX", "chart_"),
      renderSettleDelayMs: int("RENDER_SETTLE_DELAY_MS", 500, 0),
      mirrorSettleDelayMs: int("MIRROR_SETTLE_DELAY_MS", 700, 0),
      cleanupGraceMs: int("CLEANUP_GRACE_MS", 1000, 0),
      canCreateSurfaces: bool("CAN_CREATE_SURFACES", true),
      commonDir: resolve(str("COMMON_FILES_DIR", "./data/common")),
      terminalPath: resolve(str("TERMINAL_PATH", "./data/terminal")),
      requestMarkerName: str("REQUEST_MARKER_NAME", "capture_request.txt"),
      completionFileName: str("COMPLETION_FILE_NAME", "capture_complete.json"),
      timeZone,
    },
    pollIntervalSeconds: int("POLL_INTERVAL_SECONDS", 1, 1),
    exportFileName: str("EXPORT_FILE_NAME", "horizontal_lines.json"),
    priceDecimals: int("PRICE_DECIMALS", 2, 0),
    host: oneOf("CHART_HOST", HOST_KINDS, "browser"),
    browserURL: str("CHART_BROWSER_URL", "http://127.0.0.1:9222"),
    chartAppUrl: str("CHART_APP_URL", "http://127.0.0.1:3000/chart"),
  };

  const urls: Array<[string, string]> = [
    ["CHART_BROWSER_URL", config.browserURL],
    ["CHART_APP_URL", config.chartAppUrl],
  ];
  for (const [name, value] of urls) {
    try {
      new URL(value);
    } catch {
      problems.push(`${name} is not a valid URL (got "${value}")`);
    }
  }

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
