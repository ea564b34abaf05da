export type SeverityLabel = "Critical" | "High" | "Medium" | "Low" | "Info";

export const SEVERITY_LABELS: Readonly<Record<number, SeverityLabel>> = {
  0: "Info",
  1: "Low",
  2: "Medium",
  3: "High",
  4: "Critical"
};

export const SEVERITY_ORDER: readonly SeverityLabel[] = ["Critical", "High", "Medium", "Low", "Info"];

export function severityLabel(severity: number): SeverityLabel {
  return SEVERITY_LABELS[severity] ?? "Info";
}

export type LabelCount = readonly [label: string, count: number];

export type SeverityTotals = Record<SeverityLabel, number>;

export interface ReportMetadata {
  name: string;
  customer: string;
  scan_date: string;
}

export interface FindingRecord {
  host: string;
  hostname: string | null;
  ip_address: string | null;
  port: string | null;
  protocol: string | null;
  plugin_id: string;
  plugin_name: string;
  plugin_family: string;
  severity: number;
  severity_label: SeverityLabel;
  risk_factor: string;
  cvss_base: number | null;
  cves: string[];
  description: string;
  solution: string;
  plugin_output: string;
}

export interface HostSeveritySummary {
  host: string;
  ip_address: string | null;
  severity_totals: SeverityTotals;
  total_findings: number;
}

export interface AggregatedMetrics {
  severity_counts: LabelCount[];
  risk_counts: LabelCount[];
  top_hosts: LabelCount[];
  top_families: LabelCount[];
  total_findings: number;
  affected_hosts: number;
  average_cvss: number | null;
}

export interface ReportDetails {
  readonly metadata: Readonly<ReportMetadata>;
  readonly findings: readonly Readonly<FindingRecord>[];
  readonly host_summaries: readonly Readonly<HostSeveritySummary>[];
  readonly aggregates: Readonly<AggregatedMetrics>;
  readonly generated_at: string;
}
