import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import type { BrowserPage, ScreenshotOptions } from "@report-describer/mcp";
import { capturePage } from "./capture";
import { CaptureFailedError } from "./errors";
import { ArtifactWriter } from "./output";

class StaticPage implements BrowserPage {
  screenshots: ScreenshotOptions[] = [];
  failScreenshot = false;

  constructor(private html: string) {}

  async navigate(): Promise<void> {}

  async evaluate(): Promise<unknown> {
    return null;
  }

  async screenshot(options: ScreenshotOptions): Promise<string> {
    this.screenshots.push(options);
    fs.writeFileSync(options.path, "png-bytes");
    if (this.failScreenshot) {
      throw new Error("Screenshot timed out");
    }
    return options.path;
  }

  async getHTML(): Promise<string> {
    return this.html;
  }

  async getCurrentURL(): Promise<string> {
    return "https://bi.example.com/dashboards/1";
  }
}

describe("capturePage", () => {
  let tempDir: string;
  let writer: ArtifactWriter;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(tmpdir(), "capture-test-"));
    writer = new ArtifactWriter(tempDir);
    await writer.prepare();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should take a full-page PNG and keep only the cleaned body", async () => {
    const page = new StaticPage(
      "<html><head><title>t</title></head><body><h1>Revenue</h1><script>track()</script></body></html>"
    );

    const captured = await capturePage(page, writer, {
      fileStem: "Sales",
      pageIndex: 1,
      pageName: "Detail",
      loadState: "ready",
    });

    expect(page.screenshots).toEqual([{ path: captured.screenshot.stagingPath, fullPage: true, type: "png" }]);
    expect(path.basename(captured.screenshot.stagingPath)).toMatch(/-Sales_2\.png$/);
    expect(Buffer.from(captured.screenshot.data).toString("utf8")).toBe("png-bytes");
    expect(captured.html).toEqual({ kind: "html", content: "<body><h1>Revenue</h1></body>" });
    expect(captured).toMatchObject({ pageIndex: 1, pageName: "Detail", loadState: "ready" });
  });

  it("should discard the staged screenshot and report CaptureFailed on error", async () => {
    const page = new StaticPage("<body></body>");
    page.failScreenshot = true;

    const error = await capturePage(page, writer, {
      fileStem: "Sales",
      pageIndex: 0,
      pageName: "page 1",
      loadState: "timedOut",
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CaptureFailedError);
    expect(error).toMatchObject({ message: "Capture of page 1 (page 1) failed: Screenshot timed out" });
    expect(fs.readdirSync(path.join(tempDir, ".staging"))).toEqual([]);
  });
});
