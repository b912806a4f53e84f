/**
 * HTML cleaning for model input
 */

import * as cheerio from "cheerio";

const REMOVED_TAGS = ["script", "style", "noscript"];

/**
 * Reduce a captured document to its body, without scripts, styles, noscript blocks or comments.
 */
export function cleanHtml(html: string): string {
  const $ = cheerio.load(html);

  $(REMOVED_TAGS.join(", ")).remove();

  $("*")
    .contents()
    .each((_, node) => {
      if (node.type === "comment") {
        $(node).remove();
      }
    });

  const $body = $("body").first();
  return $.html($body);
}
