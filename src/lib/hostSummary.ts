import { SEVERITY_ORDER, type FindingRecord, type HostSeveritySummary, type SeverityTotals } from "./types.js";

export function summarizeHosts(findings: readonly FindingRecord[]): HostSeveritySummary[] {
  const rows = new Map<string, { host: string; ip_address: string | null; severity_totals: SeverityTotals }>();

  for (const f of findings) {
    // A host without an IP is its own group, distinct from any addressed host of the same name.
    const key = JSON.stringify([f.host, f.ip_address]);
    let row = rows.get(key);
    if (!row) {
      row = { host: f.host, ip_address: f.ip_address, severity_totals: emptyTotals() };
      rows.set(key, row);
    }
    row.severity_totals[f.severity_label] += 1;
  }

  return [...rows.values()]
    .map((row) => ({ ...row, total_findings: sumTotals(row.severity_totals) }))
    .sort((a, b) => b.total_findings - a.total_findings);
}

function emptyTotals(): SeverityTotals {
  return { Critical: 0, High: 0, Medium: 0, Low: 0, Info: 0 };
}

function sumTotals(totals: SeverityTotals): number {
  return SEVERITY_ORDER.reduce((sum, label) => sum + totals[label], 0);
}
