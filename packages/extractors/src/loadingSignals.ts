/**
 * Loading-signal sampler for dynamically rendered dashboards
 */

import { z } from "zod";
import type { BrowserPage } from "@report-describer/mcp";

export type LoadingSignalsConfig = {
  indicatorSelectors: string[];
  /** Elements that must exist before the page counts as rendered. Empty means no requirement. */
  readySelectors: string[];
};

export const LoadSignalsSchema = z.object({
  loadingIndicators: z.number().int().min(0),
  documentLoading: z.boolean(),
  missingReadyElements: z.number().int().min(0),
});

export type LoadSignals = z.infer<typeof LoadSignalsSchema>;

/**
 * Build the in-page function that counts visible spinners and missing structure
 */
export function buildSignalsScript(config: LoadingSignalsConfig): string {
  return `() => {
    const indicatorSelectors = ${JSON.stringify(config.indicatorSelectors)};
    const readySelectors = ${JSON.stringify(config.readySelectors)};
    const isVisible = (el) => {
      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      return rect.width > 0 && rect.height > 0 && style.display !== "none" && style.visibility !== "hidden";
    };
    const seen = new Set();
    for (const selector of indicatorSelectors) {
      for (const el of document.querySelectorAll(selector)) {
        if (isVisible(el)) seen.add(el);
      }
    }
    const missingReadyElements = readySelectors.filter((selector) => !document.querySelector(selector)).length;
    return {
      loadingIndicators: seen.size,
      documentLoading: document.readyState !== "complete",
      missingReadyElements,
    };
  }`;
}

/**
 * Read the current loading signals from the page
 */
export async function sampleLoadSignals(
  page: BrowserPage,
  config: LoadingSignalsConfig,
  signal?: AbortSignal
): Promise<LoadSignals> {
  const raw = await page.evaluate(buildSignalsScript(config), { signal });
  const parsed = LoadSignalsSchema.safeParse(raw);

  if (!parsed.success) {
    throw new Error(`Unexpected loading signal payload: ${parsed.error.message}`);
  }

  return parsed.data;
}

/**
 * Number of signals still indicating activity; zero means quiet
 */
export function activeSignalCount(signals: LoadSignals): number {
  return signals.loadingIndicators + signals.missingReadyElements + (signals.documentLoading ? 1 : 0);
}
