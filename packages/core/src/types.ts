/**
 * Core type definitions for the report describer
 */

import type { ViewportSize } from "@report-describer/mcp";
import type { PageControlSelector } from "@report-describer/extractors";
import type { ErrorKind } from "./errors";

export type ReportRequest = {
  name: string;
  url: string;
  existingDescription: string;
};

export type LoadState = "loading" | "stableCandidate" | "ready" | "timedOut";

export type ScreenshotArtifact = {
  kind: "screenshot";
  data: Uint8Array;
  /** Temporary file the browser wrote; moved into place when the report is persisted */
  stagingPath: string;
};

export type HtmlArtifact = {
  kind: "html";
  content: string;
};

export type CapturedArtifact = ScreenshotArtifact | HtmlArtifact;

export type ReportPage = {
  pageIndex: number;
  pageName: string;
  screenshot: ScreenshotArtifact;
  html: HtmlArtifact;
  loadState: LoadState;
};

export type SkippedPage = {
  pageIndex: number;
  pageName: string;
  kind: ErrorKind;
  message: string;
};

export type ArtifactPaths = {
  pageIndex: number;
  screenshotPath: string;
  htmlPath: string;
};

export type ReportStatus = "succeeded" | "partial" | "failed";

export type ReportResult = {
  name: string;
  fileName: string;
  status: Exclude<ReportStatus, "failed">;
  descriptionText: string;
  descriptionPath: string;
  artifacts: ArtifactPaths[];
  pagesDiscovered: number;
  skippedPages: SkippedPage[];
};

export type ReportFailure = {
  name: string;
  kind: ErrorKind;
  message: string;
  /** Files written before the failure, if any */
  artifacts: ArtifactPaths[];
};

/**
 * Configuration types
 */

export type TargetConfig = {
  baseUrl: string;
  /** Substrings of a URL that mean the application bounced us to its login page */
  loginUrlPatterns: string[];
};

export type ModelConfig = {
  provider: "vertex" | "openai";
  model: string;
  project: string;
  region: string;
  credentialPath?: string;
  apiKey?: string;
  maxOutputTokens: number;
  temperature: number;
  maxHtmlChars: number;
};

export type BrowserConfig = {
  command: string;
  args: string[];
  viewport: ViewportSize;
  navigationTimeoutMs: number;
};

export type SessionConfig = {
  stateFile: string;
  profileDir: string;
};

export type LoadConfig = {
  maxWaitMs: number;
  settleMs: number;
  pollIntervalMs: number;
  indicatorSelectors: string[];
  readySelectors: string[];
};

export type PagesConfig = {
  controls: PageControlSelector[];
};

export type RunConfig = {
  throttleRPS: number;
  reportTimeoutMs: number;
  outDir: string;
};

export type AppConfig = {
  target: TargetConfig;
  model: ModelConfig;
  browser: BrowserConfig;
  session: SessionConfig;
  load: LoadConfig;
  pages: PagesConfig;
  run: RunConfig;
};

/**
 * Runtime state types
 */

export type RunSummary = {
  total: number;
  succeeded: number;
  partial: number;
  failed: number;
};

export type RunResult = {
  results: ReportResult[];
  failures: ReportFailure[];
  startTime: Date;
  endTime: Date;
  summary: RunSummary;
};
