/**
 * Prompt construction for report descriptions
 */

export type PagePromptEntry = {
  pageIndex: number;
  pageName: string;
};

export type MultiPagePromptInput = {
  name: string;
  pages: PagePromptEntry[];
  totalPages: number;
};

const DESCRIPTION_CHECKLIST = `Please provide a comprehensive description that includes:
1. The purpose and main function of this report
2. Key metrics, KPIs, or data points displayed
3. Any filters, date ranges, or parameters visible
4. The types of visualizations used (charts, tables, etc.)
5. Who would likely use this report and for what decisions
6. Any notable features or sections of the dashboard

Write the description in clear, professional language suitable for documentation.`;

export const HTML_TRUNCATION_MARKER = "\n... [HTML truncated]";

/**
 * Prompt for a report rendered as one page, or for the only captured page of
 * a report that has `totalPages`
 */
export function buildSinglePagePrompt(name: string, totalPages = 1): string {
  const missingNote =
    totalPages > 1
      ? `\nOnly 1 of the ${totalPages} pages could be captured; mention that the description does not cover the missing pages.\n`
      : "";

  return `You are analyzing a Looker dashboard/report. Based on the provided information, write a detailed description of this report.

**Report Name:** ${name}
${missingNote}
**Page HTML:** (provided below)

**Screenshot:** (provided as image)

${DESCRIPTION_CHECKLIST}`;
}

/**
 * Prompt for a report spanning several pages, described as a whole
 */
export function buildMultiPagePrompt(input: MultiPagePromptInput): string {
  const pageLines = input.pages.map((p) => `- Page ${p.pageIndex + 1}: ${p.pageName}`).join("\n");
  const captured = input.pages.length;
  const missingNote =
    captured < input.totalPages
      ? `\nOnly ${captured} of the ${input.totalPages} pages could be captured; mention that the description does not cover the missing pages.\n`
      : "";

  return `You are analyzing a multi-page Looker dashboard/report. Based on the provided information, write ONE detailed description covering the whole report.

**Report Name:** ${input.name}

**Total Pages:** ${input.totalPages}

**Captured Pages (in order):**
${pageLines}
${missingNote}
**Screenshots:** one image per captured page, in the order listed above

**Page HTML:** one block per captured page, in the same order (provided below)

${DESCRIPTION_CHECKLIST}

Describe how the pages relate to each other and what each page contributes.`;
}

/**
 * Truncate HTML to a character budget, marking the cut
 */
export function truncateHtml(html: string, maxChars: number): string {
  if (html.length <= maxChars) {
    return html;
  }
  return html.substring(0, maxChars) + HTML_TRUNCATION_MARKER;
}

/**
 * Assemble the text part of a generation request: prompt, context, then one HTML block per page.
 * The character budget is split evenly between pages.
 */
export function buildRequestText(
  promptText: string,
  existingDescription: string,
  htmlSnippets: string[],
  maxHtmlChars: number
): string {
  const perPage = Math.floor(maxHtmlChars / Math.max(1, htmlSnippets.length));
  const context = existingDescription.trim() || "(none provided)";

  const blocks = htmlSnippets.map((html, i) => {
    const heading = htmlSnippets.length > 1 ? `**HTML Content (page ${i + 1}):**` : "**HTML Content:**";
    return `${heading}\n\`\`\`html\n${truncateHtml(html, perPage)}\n\`\`\``;
  });

  return `${promptText}\n\n**Initial Description:** ${context}\n\n---\n\n${blocks.join("\n\n")}`;
}
