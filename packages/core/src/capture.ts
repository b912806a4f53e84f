/**
 * Artifact capture for a ready page: full-page screenshot plus cleaned body HTML
 */

import * as fs from "fs";
import type { BrowserPage } from "@report-describer/mcp";
import { cleanHtml } from "@report-describer/extractors";
import { CaptureFailedError, errorMessage } from "./errors";
import type { ArtifactWriter } from "./output";
import type { LoadState, ReportPage } from "./types";

export type CaptureTarget = {
  fileStem: string;
  pageIndex: number;
  pageName: string;
  loadState: LoadState;
};

/**
 * Single attempt; failures surface as CaptureFailedError
 */
export async function capturePage(
  page: BrowserPage,
  writer: ArtifactWriter,
  target: CaptureTarget
): Promise<ReportPage> {
  const stagingPath = writer.stagingPath(`${target.fileStem}_${target.pageIndex + 1}.png`);

  try {
    await page.screenshot({ path: stagingPath, fullPage: true, type: "png" });
    const data = await fs.promises.readFile(stagingPath);
    const html = cleanHtml(await page.getHTML());

    return {
      pageIndex: target.pageIndex,
      pageName: target.pageName,
      screenshot: { kind: "screenshot", data, stagingPath },
      html: { kind: "html", content: html },
      loadState: target.loadState,
    };
  } catch (error) {
    await writer.discard(stagingPath);
    throw new CaptureFailedError(
      `Capture of page ${target.pageIndex + 1} (${target.pageName}) failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
