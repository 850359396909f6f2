export { CaptureOrchestrator } from "./orchestrator";
export type { CycleState, OrchestratorDeps } from "./orchestrator";
export { createRequestWatcher } from "./request-watcher";
export { SurfaceResolver } from "./surface-resolver";
export type { ResolvedSurface } from "./surface-resolver";
export { Capturer } from "./capturer";
export { CompletionReporter } from "./reporter";
export { Reaper } from "./reaper";
export * from "./errors";
export type * from "./types";
