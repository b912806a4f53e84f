/**
 * Core orchestrator for describing a list of reports
 */

import type { BrowserPage } from "@report-describer/mcp";
import {
  DomPageStructureProbe,
  sampleLoadSignals,
  type LoadSignals,
  type PageStructureProbe,
} from "@report-describer/extractors";
import type { DescriptionGenerator } from "@report-describer/describer";
import { aggregateReport } from "./aggregator";
import { capturePage } from "./capture";
import {
  AuthenticationRequiredError,
  CancelledError,
  GenerationFailedError,
  NavigationFailedError,
  errorKindOf,
  errorMessage,
} from "./errors";
import { LoadCompletionDetector, type LoadOutcome } from "./loadDetector";
import { ArtifactWriter, FileNameAllocator } from "./output";
import { enumeratePages } from "./pageEnumerator";
import { RateLimiter, throwIfCancelled, type Clock } from "./policies";
import type { AuthenticatedContext, SessionProvider } from "./session";
import type { AppConfig, ReportFailure, ReportRequest, ReportResult, RunResult } from "./types";

export type OrchestratorDeps = {
  sessionProvider: SessionProvider;
  generator: DescriptionGenerator;
  clock?: Clock;
  createProbe?: (page: BrowserPage) => PageStructureProbe;
  sampleSignals?: (page: BrowserPage, signal?: AbortSignal) => Promise<LoadSignals>;
};

export type RunOptions = {
  forceReauth?: boolean;
  /** Aborting stops the current report and marks the remaining ones cancelled */
  signal?: AbortSignal;
};

/**
 * Main orchestrator class. Reports are processed one at a time over a single
 * shared browsing session.
 */
export class ReportDescriberOrchestrator {
  private config: AppConfig;
  private deps: OrchestratorDeps;
  private rateLimiter: RateLimiter;
  private writer: ArtifactWriter;
  private detector: LoadCompletionDetector;
  private names = new FileNameAllocator();
  private session: AuthenticatedContext | null = null;

  constructor(config: AppConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
    this.rateLimiter = new RateLimiter(config.run.throttleRPS);
    this.writer = new ArtifactWriter(config.run.outDir);
    this.detector = new LoadCompletionDetector({
      maxWaitMs: config.load.maxWaitMs,
      settleMs: config.load.settleMs,
      pollIntervalMs: config.load.pollIntervalMs,
      clock: deps.clock,
    });
  }

  /**
   * Run the complete pipeline over every request, in input order
   */
  async run(requests: ReportRequest[], options: RunOptions = {}): Promise<RunResult> {
    const startTime = new Date();
    const results: ReportResult[] = [];
    const failures: ReportFailure[] = [];

    console.log(`Found ${requests.length} reports to process`);
    await this.writer.prepare();

    // Authentication finishes (including any interactive step) before the first report.
    this.session = await this.deps.sessionProvider.acquireSession(options.forceReauth ?? false);

    try {
      for (let i = 0; i < requests.length; i++) {
        const request = requests[i];

        if (options.signal?.aborted) {
          const failure = toFailure(request, new CancelledError("Cancelled: run interrupted before this report"));
          failures.push(failure);
          console.error(`  ✗ [${request.name}] Not processed (${failure.kind})`);
          continue;
        }

        console.log(`\n[${i + 1}/${requests.length}] Processing: ${request.name}`);
        const fileStem = this.names.allocate(request.name);

        try {
          await this.rateLimiter.wait(options.signal);
          const result = await this.processWithReauth(request, fileStem, options.signal);
          results.push(result);

          const skippedNote =
            result.status === "partial" ? `, ${result.skippedPages.length} of ${result.pagesDiscovered} skipped` : "";
          console.log(`  ✓ [${request.name}] Described ${result.artifacts.length} page(s)${skippedNote}`);
        } catch (error) {
          // A failed re-authentication leaves no usable session: stop the run.
          if (error instanceof AuthenticationRequiredError && this.deps.sessionProvider.state !== "active") {
            throw error;
          }

          const failure = toFailure(request, error);
          failures.push(failure);
          console.error(`  ✗ [${request.name}] Failed (${failure.kind}): ${failure.message}`);
        }
      }
    } finally {
      await this.deps.sessionProvider.close();
      await this.writer.cleanup();
    }

    const summary = {
      total: requests.length,
      succeeded: results.filter((r) => r.status === "succeeded").length,
      partial: results.filter((r) => r.status === "partial").length,
      failed: failures.length,
    };

    console.log(`\n=== Run Complete ===`);
    console.log(
      `Total: ${summary.total} | Succeeded: ${summary.succeeded} | Partial: ${summary.partial} | Failed: ${summary.failed}`
    );
    console.log(`Output saved to ${this.writer.outDir}`);

    return { results, failures, startTime, endTime: new Date(), summary };
  }

  /**
   * Process a report; on a login redirect, sign in again interactively and retry once
   */
  private async processWithReauth(
    request: ReportRequest,
    fileStem: string,
    runSignal?: AbortSignal
  ): Promise<ReportResult> {
    try {
      return await this.processReport(request, fileStem, this.requireSession().page, this.reportSignal(runSignal));
    } catch (error) {
      if (!(error instanceof AuthenticationRequiredError)) {
        throw error;
      }

      console.warn(`  ⚠ [${request.name}] Session is no longer valid (${error.kind}); signing in again`);
      await this.deps.sessionProvider.invalidate();
      this.session = null;
      this.session = await this.deps.sessionProvider.acquireSession(true);

      return await this.processReport(request, fileStem, this.session.page, this.reportSignal(runSignal));
    }
  }

  /**
   * Process a single report: navigate, wait, enumerate and capture pages, describe
   */
  private async processReport(
    request: ReportRequest,
    fileStem: string,
    page: BrowserPage,
    signal: AbortSignal
  ): Promise<ReportResult> {
    if (!request.url) {
      throw new NavigationFailedError("No URL provided");
    }

    console.log(`  Navigating to: ${request.url}`);
    try {
      await page.navigate(request.url, { timeout: this.config.browser.navigationTimeoutMs, signal });
    } catch (error) {
      throwIfCancelled(signal);
      throw new NavigationFailedError(`Navigation to ${request.url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await this.ensureAuthenticated(page, request.url);

    console.log("  Waiting for dashboard to load...");
    const initial = await this.waitForReady(page, request.name, "page 1", signal);

    const enumeration = await enumeratePages(request.name, initial.state, {
      probe: this.createProbe(page),
      waitForReady: (pageName) => this.waitForReady(page, request.name, pageName, signal),
      capture: (pageIndex, pageName, loadState) =>
        capturePage(page, this.writer, { fileStem, pageIndex, pageName, loadState }),
      signal,
    });

    if (enumeration.multiPage) {
      const names = enumeration.entries.map((e) => e.name).join(", ");
      console.log(`  Multi-page report with ${enumeration.entries.length} pages: ${names}`);
    }

    return aggregateReport(request, fileStem, enumeration, {
      generator: this.deps.generator,
      writer: this.writer,
      signal,
    });
  }

  private async ensureAuthenticated(page: BrowserPage, requestedUrl: string): Promise<void> {
    let currentUrl: string;
    try {
      currentUrl = await page.getCurrentURL();
    } catch (error) {
      throw new NavigationFailedError(`Could not read the page URL: ${errorMessage(error)}`, { cause: error });
    }

    const onLoginPage =
      currentUrl !== requestedUrl && this.config.target.loginUrlPatterns.some((p) => currentUrl.includes(p));
    if (onLoginPage) {
      throw new AuthenticationRequiredError(`Redirected to login page ${currentUrl}`);
    }
  }

  private async waitForReady(
    page: BrowserPage,
    reportName: string,
    pageLabel: string,
    signal: AbortSignal
  ): Promise<LoadOutcome> {
    const outcome = await this.detector.waitUntilReady(() => this.sampleSignals(page, signal), signal);

    if (outcome.state === "timedOut") {
      const sampleNote = outcome.lastSampleError ? ` (last sample error: ${outcome.lastSampleError})` : "";
      console.warn(
        `  ⚠ [${reportName}] ${pageLabel} still loading after ${outcome.elapsedMs / 1000}s; capturing anyway${sampleNote}`
      );
    }

    return outcome;
  }

  private sampleSignals(page: BrowserPage, signal: AbortSignal): Promise<LoadSignals> {
    if (this.deps.sampleSignals) {
      return this.deps.sampleSignals(page, signal);
    }
    return sampleLoadSignals(
      page,
      { indicatorSelectors: this.config.load.indicatorSelectors, readySelectors: this.config.load.readySelectors },
      signal
    );
  }

  private createProbe(page: BrowserPage): PageStructureProbe {
    return this.deps.createProbe ? this.deps.createProbe(page) : new DomPageStructureProbe(page, this.config.pages);
  }

  private reportSignal(runSignal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.config.run.reportTimeoutMs);
    return runSignal ? AbortSignal.any([runSignal, timeout]) : timeout;
  }

  private requireSession(): AuthenticatedContext {
    if (!this.session) {
      throw new AuthenticationRequiredError("No active session");
    }
    return this.session;
  }
}

function toFailure(request: ReportRequest, error: unknown): ReportFailure {
  return {
    name: request.name,
    kind: errorKindOf(error, "CaptureFailed"),
    message: errorMessage(error),
    artifacts: error instanceof GenerationFailedError ? error.artifacts : [],
  };
}
