import { describe, it, expect } from "vitest";
import { cleanHtml } from "./htmlCleaner";

describe("cleanHtml", () => {
  it("should drop script, style and noscript content", () => {
    const html =
      "<html><head><title>Sales</title><style>.tile{color:red}</style></head>" +
      "<body><div class=\"tile\">Revenue</div><script>window.secret = 1;</script>" +
      "<noscript>Enable JavaScript</noscript><style>p{margin:0}</style></body></html>";

    const cleaned = cleanHtml(html);

    expect(cleaned).toBe('<body><div class="tile">Revenue</div></body>');
  });

  it("should keep only the body subtree", () => {
    const cleaned = cleanHtml("<html><head><title>Head only</title></head><body><h1>Dashboard</h1></body></html>");

    expect(cleaned).toBe("<body><h1>Dashboard</h1></body>");
  });

  it("should remove comments inside the body", () => {
    const cleaned = cleanHtml("<body><p>Orders<!-- debug --></p></body>");

    expect(cleaned).toBe("<body><p>Orders</p></body>");
  });

  it("should remove nested script elements", () => {
    const cleaned = cleanHtml('<body><section><div><script type="application/json">{"a":1}</script>KPI</div></section></body>');

    expect(cleaned).toBe("<body><section><div>KPI</div></section></body>");
  });
});
