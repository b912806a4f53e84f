/**
 * Page enumeration for single- and multi-page reports
 */

import type { PageEntry, PageStructureProbe } from "@report-describer/extractors";
import {
  AuthenticationRequiredError,
  CancelledError,
  NavigationFailedError,
  errorKindOf,
  errorMessage,
} from "./errors";
import type { LoadOutcome } from "./loadDetector";
import { throwIfCancelled } from "./policies";
import type { LoadState, ReportPage, SkippedPage } from "./types";

export type PageEnumeratorDeps = {
  probe: PageStructureProbe;
  /** Runs load detection again after a page switch */
  waitForReady: (pageName: string) => Promise<LoadOutcome>;
  capture: (pageIndex: number, pageName: string, loadState: LoadState) => Promise<ReportPage>;
  signal?: AbortSignal;
};

export type PageEnumeration = {
  multiPage: boolean;
  /** Every page found in the navigation control, in displayed order */
  entries: PageEntry[];
  /** Captured pages, in displayed order */
  pages: ReportPage[];
  skipped: SkippedPage[];
};

const SINGLE_PAGE: PageEntry = { index: 0, name: "page 1", label: "" };

/**
 * Discover the report's pages and capture each one. The page shown after the
 * initial load is taken to be the first entry. A page that cannot be opened
 * or captured is skipped with a warning; the rest are still captured.
 */
export async function enumeratePages(
  reportName: string,
  initialLoad: LoadState,
  deps: PageEnumeratorDeps
): Promise<PageEnumeration> {
  const entries = await discoverEntries(reportName, deps);
  const multiPage = entries.length > 1;
  const pages: ReportPage[] = [];
  const skipped: SkippedPage[] = [];

  for (const entry of entries) {
    try {
      let loadState = initialLoad;

      if (entry.index > 0) {
        await openPage(deps.probe, entry, deps.signal);
        loadState = (await deps.waitForReady(entry.name)).state;
      }

      pages.push(await deps.capture(entry.index, entry.name, loadState));
    } catch (error) {
      rethrowIfFatal(error, deps.signal);

      const kind = errorKindOf(error, "CaptureFailed");
      const message = errorMessage(error);
      skipped.push({ pageIndex: entry.index, pageName: entry.name, kind, message });
      console.warn(`  ⚠ [${reportName}] Skipped page ${entry.index + 1} "${entry.name}" (${kind}): ${message}`);
    }
  }

  return { multiPage, entries, pages, skipped };
}

async function discoverEntries(reportName: string, deps: PageEnumeratorDeps): Promise<PageEntry[]> {
  try {
    if (!(await deps.probe.hasMultiPageControl())) {
      return [SINGLE_PAGE];
    }

    const entries = await deps.probe.listPageEntries();
    return entries.length > 1 ? entries : [SINGLE_PAGE];
  } catch (error) {
    rethrowIfFatal(error, deps.signal);
    console.warn(
      `  ⚠ [${reportName}] Page navigation probe failed, treating report as single-page: ${errorMessage(error)}`
    );
    return [SINGLE_PAGE];
  }
}

async function openPage(probe: PageStructureProbe, entry: PageEntry, signal?: AbortSignal): Promise<void> {
  try {
    await probe.activatePage(entry);
  } catch (error) {
    rethrowIfFatal(error, signal);
    throw new NavigationFailedError(`Could not switch to page ${entry.index + 1}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function rethrowIfFatal(error: unknown, signal?: AbortSignal): void {
  throwIfCancelled(signal);
  if (error instanceof CancelledError || error instanceof AuthenticationRequiredError) {
    throw error;
  }
}
