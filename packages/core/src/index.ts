export { aggregateReport } from "./aggregator";
export type { AggregatorDeps } from "./aggregator";
export { capturePage } from "./capture";
export type { CaptureTarget } from "./capture";
export { ENV_KEYS, generatorConfigFrom, loadConfig, validateConfig } from "./config";
export {
  AuthenticationRequiredError,
  CancelledError,
  CaptureFailedError,
  ConfigMissingError,
  GenerationFailedError,
  NavigationFailedError,
  PersistenceFailedError,
  ReportDescriberError,
  errorKindOf,
  errorMessage,
} from "./errors";
export type { ErrorKind } from "./errors";
export { loadReportRequests, parseReportRequests } from "./input";
export { LoadCompletionDetector } from "./loadDetector";
export type { LoadDetectorOptions, LoadOutcome, LoadTransition, SignalSampler } from "./loadDetector";
export { ReportDescriberOrchestrator } from "./orchestrator";
export type { OrchestratorDeps, RunOptions } from "./orchestrator";
export { ArtifactWriter, FileNameAllocator, sanitizeFilename } from "./output";
export { enumeratePages } from "./pageEnumerator";
export type { PageEnumeration, PageEnumeratorDeps } from "./pageEnumerator";
export { RateLimiter, delay, systemClock, throwIfCancelled } from "./policies";
export type { Clock } from "./policies";
export { PersistentSessionProvider } from "./session";
export type {
  AuthenticatedContext,
  BrowserFactory,
  SessionProvider,
  SessionProviderDeps,
  SessionState,
} from "./session";
export type * from "./types";
