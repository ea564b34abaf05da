import { SEVERITY_ORDER, type AggregatedMetrics, type FindingRecord, type LabelCount } from "./types.js";

const TOP_N = 10;

export function aggregateMetrics(findings: readonly FindingRecord[]): AggregatedMetrics {
  const bySeverity = countBy(findings, (f) => f.severity_label);
  const cvssValues = findings.map((f) => f.cvss_base).filter((v): v is number => v !== null);

  return {
    severity_counts: SEVERITY_ORDER.map((label) => [label, bySeverity.get(label) ?? 0] as const),
    risk_counts: sortedDescending(countBy(findings, (f) => f.risk_factor)),
    top_hosts: sortedDescending(countBy(findings, (f) => f.host)).slice(0, TOP_N),
    top_families: sortedDescending(countBy(findings, (f) => f.plugin_family)).slice(0, TOP_N),
    total_findings: findings.length,
    affected_hosts: new Set(findings.map((f) => f.host)).size,
    average_cvss: cvssValues.length > 0 ? roundTo2(mean(cvssValues)) : null
  };
}

// Map iteration follows insertion order, so equal counts keep first-seen order
// through the stable sort below.
function countBy<T>(items: readonly T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

function sortedDescending(counts: Map<string, number>): LabelCount[] {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Rounds the exact binary value half to even, so 2.675 (stored just below) gives 2.67.
function roundTo2(value: number): number {
  const scaled = value * 100;
  // Only multiples of 1/8 with an odd eighth sit exactly on a .xx5 boundary.
  if (Number.isInteger(value * 8) && !Number.isInteger(value * 4)) {
    const floor = Math.floor(scaled);
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Number(value.toFixed(2));
}
