import fs from "node:fs";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { buildChartCollection } from "../src/lib/charts.js";
import { buildReport } from "../src/lib/nessus.js";
import { renderErrorHtml, renderReportHtml } from "../src/lib/render.js";

function sampleReport(name: string) {
  const bytes = fs.readFileSync(path.join(process.cwd(), "test-vectors", "sample.nessus"));
  return buildReport({ name, customer: "Example Corp", scan_date: "2026-10-05" }, bytes);
}

describe("report rendering", () => {
  test("renders metadata, hosts and findings", () => {
    const details = sampleReport("Quarterly internal scan");
    const html = renderReportHtml(details, buildChartCollection(details.aggregates));

    expect(html).toContain("<title>Quarterly internal scan</title>");
    expect(html).toContain("Customer: Example Corp");
    expect(html).toContain("<td>web01.example.test</td>");
    expect(html).toContain(`<td class="sev-critical">Critical</td>`);
    expect(html).toContain("<td>CVE-2026-0001, CVE-2026-0002</td>");
    expect(html).toContain("<strong>6.2</strong>Average CVSS");
    expect(html).toContain("<td>1</td><td>0</td><td>1</td><td>0</td><td>1</td>");
    expect(html).toContain("<td>0</td><td>1</td><td>0</td><td>1</td><td>0</td>");
  });

  test("escapes scanner and user supplied text", () => {
    const details = sampleReport("<script>alert(1)</script>");
    const html = renderReportHtml(details, buildChartCollection(details.aggregates));

    expect(html).toContain("<title>&lt;script&gt;alert(1)&lt;/script&gt;</title>");
  });

  test("error page shows the status and message", () => {
    const html = renderErrorHtml(404, "Report not found");
    expect(html).toContain(`<p class="code">404</p>`);
    expect(html).toContain(`<p class="message">Report not found</p>`);
    expect(renderErrorHtml(500, "")).toContain("An unexpected error occurred.");
  });
});
