import { describe, expect, test } from "vitest";
import type { ChartCollection } from "../src/lib/charts.js";
import { ReportCache } from "../src/lib/reportCache.js";
import type { ReportDetails } from "../src/lib/types.js";

const charts: ChartCollection = { severity: "s", hosts: "h", families: "f", risks: "r" };

function details(name: string): ReportDetails {
  return {
    metadata: { name, customer: "", scan_date: "" },
    findings: [],
    host_summaries: [],
    aggregates: {
      severity_counts: [],
      risk_counts: [],
      top_hosts: [],
      top_families: [],
      total_findings: 0,
      affected_hosts: 0,
      average_cvss: null
    },
    generated_at: "2026-10-05T12:00:00.000Z"
  };
}

describe("report cache", () => {
  test("assigns a 32 character hex id per bundle", () => {
    const cache = new ReportCache(10);
    const a = cache.put({ details: details("a"), charts, html: "<p>a</p>" });
    const b = cache.put({ details: details("b"), charts, html: "<p>b</p>" });

    expect(a.report_id).toMatch(/^[0-9a-f]{32}$/);
    expect(b.report_id).not.toBe(a.report_id);
    expect(cache.get(a.report_id)?.html).toBe("<p>a</p>");
  });

  test("evicts in insertion order once capacity is exceeded", () => {
    const cache = new ReportCache(3);
    const ids = ["a", "b", "c", "d"].map((n) => cache.put({ details: details(n), charts, html: n }).report_id);

    expect(cache.size).toBe(3);
    expect(cache.get(ids[0])).toBeNull();
    expect(cache.ids()).toEqual(ids.slice(1));
  });

  test("reading a bundle does not extend its life", () => {
    const cache = new ReportCache(2);
    const first = cache.put({ details: details("a"), charts, html: "a" });
    const second = cache.put({ details: details("b"), charts, html: "b" });
    expect(cache.get(first.report_id)).not.toBeNull();

    const third = cache.put({ details: details("c"), charts, html: "c" });
    expect(cache.get(first.report_id)).toBeNull();
    expect(cache.ids()).toEqual([second.report_id, third.report_id]);
  });

  test("unknown ids return null", () => {
    expect(new ReportCache(1).get("missing")).toBeNull();
  });

  test("rejects a non-positive capacity", () => {
    expect(() => new ReportCache(0)).toThrow(/positive integer/);
  });
});
