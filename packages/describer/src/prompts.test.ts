import { describe, it, expect } from "vitest";
import {
  buildMultiPagePrompt,
  buildRequestText,
  buildSinglePagePrompt,
  truncateHtml,
} from "./prompts";

describe("prompts", () => {
  describe("buildSinglePagePrompt", () => {
    it("should name the report and list the description checklist", () => {
      const prompt = buildSinglePagePrompt("Weekly Sales");

      expect(prompt).toContain("**Report Name:** Weekly Sales");
      expect(prompt).toContain("Key metrics, KPIs, or data points displayed");
      expect(prompt).toContain("**Screenshot:** (provided as image)");
      expect(prompt).not.toContain("Total Pages");
      expect(prompt).not.toContain("could be captured");
    });

    it("should call out the missing pages when only one page of several was captured", () => {
      const prompt = buildSinglePagePrompt("Weekly Sales", 3);

      expect(prompt).toContain(
        "**Report Name:** Weekly Sales\n\nOnly 1 of the 3 pages could be captured; mention that the description does not cover the missing pages.\n\n**Page HTML:**"
      );
    });
  });

  describe("buildMultiPagePrompt", () => {
    it("should state the page count and ordered page names", () => {
      const prompt = buildMultiPagePrompt({
        name: "Ops Review",
        totalPages: 3,
        pages: [
          { pageIndex: 0, pageName: "Overview" },
          { pageIndex: 1, pageName: "Detail" },
          { pageIndex: 2, pageName: "Trends" },
        ],
      });

      expect(prompt).toContain("**Total Pages:** 3");
      expect(prompt).toContain("- Page 1: Overview\n- Page 2: Detail\n- Page 3: Trends");
      expect(prompt).toContain("write ONE detailed description");
      expect(prompt).not.toContain("could be captured");
    });

    it("should call out pages that were not captured", () => {
      const prompt = buildMultiPagePrompt({
        name: "Ops Review",
        totalPages: 3,
        pages: [
          { pageIndex: 0, pageName: "Overview" },
          { pageIndex: 2, pageName: "Trends" },
        ],
      });

      expect(prompt).toContain("- Page 1: Overview\n- Page 3: Trends");
      expect(prompt).toContain("Only 2 of the 3 pages could be captured");
    });
  });

  describe("truncateHtml", () => {
    it("should leave short HTML untouched", () => {
      expect(truncateHtml("<body></body>", 50)).toBe("<body></body>");
    });

    it("should cut and mark long HTML", () => {
      expect(truncateHtml("abcdefghij", 4)).toBe("abcd\n... [HTML truncated]");
    });
  });

  describe("buildRequestText", () => {
    it("should append context and a single HTML block", () => {
      const text = buildRequestText("PROMPT", "Short desc", ["<body>a</body>"], 100);

      expect(text).toBe(
        "PROMPT\n\n**Initial Description:** Short desc\n\n---\n\n**HTML Content:**\n```html\n<body>a</body>\n```"
      );
    });

    it("should label page blocks and split the budget between pages", () => {
      const text = buildRequestText("PROMPT", "", ["aaaaaaaaaa", "bbbbbbbbbb"], 10);

      expect(text).toContain("**Initial Description:** (none provided)");
      expect(text).toContain("**HTML Content (page 1):**\n```html\naaaaa\n... [HTML truncated]\n```");
      expect(text).toContain("**HTML Content (page 2):**\n```html\nbbbbb\n... [HTML truncated]\n```");
    });
  });
});
