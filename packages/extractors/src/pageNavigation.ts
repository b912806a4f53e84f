/**
 * Page-navigation probe for multi-page reports
 *
 * BI applications expose report pages through a tab strip or a side list.
 * The probe tries each configured control in order and treats the first one
 * with visible entries as authoritative.
 */

import { z } from "zod";
import type { BrowserPage } from "@report-describer/mcp";
import type { PageEntry, PageNavigationConfig, PageStructureProbe } from "./types";

const DetectionSchema = z.object({
  control: z.number().int(),
  labels: z.array(z.string()),
});

const ActivationSchema = z.object({
  clicked: z.boolean(),
  reason: z.string().optional(),
});

type Detection = z.infer<typeof DetectionSchema>;

// Shared by the detection and activation scripts so both see the same entries.
const ENTRY_HELPERS = `
    const isVisible = (el) => {
      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      return rect.width > 0 && rect.height > 0 && style.display !== "none" && style.visibility !== "hidden";
    };
    const labelOf = (el) => (el.innerText || el.getAttribute("aria-label") || el.getAttribute("title") || "").replace(/\\s+/g, " ").trim();
    const entriesOf = (control) => {
      const container = document.querySelector(control.container);
      if (!container) return [];
      return Array.from(container.querySelectorAll(control.entry)).filter(isVisible);
    };`;

export class DomPageStructureProbe implements PageStructureProbe {
  private page: BrowserPage;
  private config: PageNavigationConfig;
  private detected: Detection | null = null;

  constructor(page: BrowserPage, config: PageNavigationConfig) {
    this.page = page;
    this.config = config;
  }

  async hasMultiPageControl(): Promise<boolean> {
    const detection = await this.detect();
    return detection.labels.length > 1;
  }

  async listPageEntries(): Promise<PageEntry[]> {
    const detection = await this.detect();
    return detection.labels.map((label, index) => ({
      index,
      label,
      name: label || `page ${index + 1}`,
    }));
  }

  async activatePage(entry: PageEntry): Promise<void> {
    const detection = this.detected ?? (await this.detect());
    const control = this.config.controls[detection.control];
    if (!control) {
      throw new Error(`No page-navigation control available to open "${entry.name}"`);
    }

    const raw = await this.page.evaluate(`() => {${ENTRY_HELPERS}
    const entries = entriesOf(${JSON.stringify(control)});
    const target = entries[${entry.index}];
    if (!target) return { clicked: false, reason: "entry no longer present" };
    if (labelOf(target) !== ${JSON.stringify(entry.label)}) return { clicked: false, reason: "entry label changed" };
    target.click();
    return { clicked: true };
  }`);

    const result = ActivationSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Unexpected page activation payload for "${entry.name}"`);
    }
    if (!result.data.clicked) {
      throw new Error(`Page "${entry.name}" could not be opened: ${result.data.reason ?? "unknown reason"}`);
    }
  }

  private async detect(): Promise<Detection> {
    const raw = await this.page.evaluate(`() => {${ENTRY_HELPERS}
    const controls = ${JSON.stringify(this.config.controls)};
    for (let i = 0; i < controls.length; i++) {
      const entries = entriesOf(controls[i]);
      if (entries.length > 0) return { control: i, labels: entries.map(labelOf) };
    }
    return { control: -1, labels: [] };
  }`);

    const parsed = DetectionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Unexpected page-navigation payload: ${parsed.error.message}`);
    }

    this.detected = parsed.data;
    return parsed.data;
  }
}
