/**
 * Aggregation of captured pages into one described report
 */

import {
  buildMultiPagePrompt,
  buildSinglePagePrompt,
  type DescriptionGenerator,
} from "@report-describer/describer";
import {
  CaptureFailedError,
  GenerationFailedError,
  NavigationFailedError,
  errorMessage,
} from "./errors";
import type { ArtifactWriter } from "./output";
import type { PageEnumeration } from "./pageEnumerator";
import { throwIfCancelled } from "./policies";
import type { ArtifactPaths, ReportPage, ReportRequest, ReportResult } from "./types";

export type AggregatorDeps = {
  generator: DescriptionGenerator;
  writer: ArtifactWriter;
  signal?: AbortSignal;
};

/**
 * Persist page artifacts, generate one description over all captured pages
 * and write it last. One captured page uses bare file names and the
 * single-page prompt; several use `_page{N}` suffixes (N is the page's
 * position in the report) and the multi-page prompt.
 */
export async function aggregateReport(
  request: ReportRequest,
  fileStem: string,
  enumeration: PageEnumeration,
  deps: AggregatorDeps
): Promise<ReportResult> {
  const { pages, skipped, entries } = enumeration;

  if (pages.length === 0) {
    const detail = skipped[0] ? ` (first failure: ${skipped[0].message})` : "";
    const message = `None of the ${entries.length} page(s) could be captured${detail}`;
    throw skipped[0]?.kind === "NavigationFailed"
      ? new NavigationFailedError(message)
      : new CaptureFailedError(message);
  }

  const multiPage = pages.length > 1;
  const artifacts = await persistArtifacts(pages, fileStem, multiPage, deps.writer);

  const promptText = multiPage
    ? buildMultiPagePrompt({
        name: request.name,
        totalPages: entries.length,
        pages: pages.map((p) => ({ pageIndex: p.pageIndex, pageName: p.pageName })),
      })
    : buildSinglePagePrompt(request.name, entries.length);

  console.log(`  Generating description from ${pages.length} page(s)...`);
  let descriptionText: string;
  try {
    const response = await deps.generator.generate(
      {
        images: pages.map((p) => p.screenshot.data),
        htmlSnippets: pages.map((p) => p.html.content),
        promptText,
        existingDescription: request.existingDescription,
      },
      deps.signal
    );
    descriptionText = response.descriptionText;
    if (!descriptionText.trim()) {
      throw new Error("Model returned an empty description");
    }
  } catch (error) {
    throwIfCancelled(deps.signal);
    throw new GenerationFailedError(`Description generation failed: ${errorMessage(error)}`, artifacts, {
      cause: error,
    });
  }

  const descriptionPath = await deps.writer.writeText(`${fileStem}.txt`, descriptionText);
  console.log(`  Description saved: ${descriptionPath}`);

  return {
    name: request.name,
    fileName: fileStem,
    status: skipped.length > 0 ? "partial" : "succeeded",
    descriptionText,
    descriptionPath,
    artifacts,
    pagesDiscovered: entries.length,
    skippedPages: skipped,
  };
}

async function persistArtifacts(
  pages: ReportPage[],
  fileStem: string,
  multiPage: boolean,
  writer: ArtifactWriter
): Promise<ArtifactPaths[]> {
  const artifacts: ArtifactPaths[] = [];

  for (const page of pages) {
    const stem = multiPage ? `${fileStem}_page${page.pageIndex + 1}` : fileStem;
    const screenshotPath = await writer.commitFile(page.screenshot.stagingPath, `${stem}.png`);
    const htmlPath = await writer.writeText(`${stem}.html`, page.html.content);
    console.log(`  Screenshot saved: ${screenshotPath}`);
    console.log(`  HTML saved: ${htmlPath}`);
    artifacts.push({ pageIndex: page.pageIndex, screenshotPath, htmlPath });
  }

  return artifacts;
}
