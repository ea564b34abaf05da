import { aggregateMetrics } from "./aggregate.js";
import { ensureSequence } from "./coerce.js";
import { EmptyReportError, InvalidNessusFile } from "./errors.js";
import { extractHostProperties, resolveHostIdentity } from "./hostProperties.js";
import { summarizeHosts } from "./hostSummary.js";
import { normalizeFinding } from "./normalizer.js";
import type { FindingRecord, ReportDetails, ReportMetadata } from "./types.js";
import { decodeXml, isXmlNode, parseXml, type XmlNode } from "./xml.js";

export const DEFAULT_REPORT_NAME = "Nessus Assessment";

export type BuildReportOptions = {
  now?: () => Date;
};

export function normalizeMetadata(input: { name?: string; customer?: string; scan_date?: string }): ReportMetadata {
  return {
    name: input.name?.trim() || DEFAULT_REPORT_NAME,
    customer: input.customer?.trim() ?? "",
    scan_date: input.scan_date?.trim() ?? ""
  };
}

/**
 * Parses a Nessus v2 export and derives everything the report needs.
 *
 * Structural problems (empty upload, malformed XML, missing
 * `NessusClientData_v2/Report`) raise {@link InvalidNessusFile} before any host
 * is read. A well-formed export without report items raises
 * {@link EmptyReportError}. Individual malformed fields never raise; they fall
 * back to their defaults.
 */
export function buildReport(metadata: ReportMetadata, xmlBytes: Uint8Array, options: BuildReportOptions = {}): ReportDetails {
  const decoded = decodeXml(xmlBytes);
  if (!decoded.ok) {
    throw new InvalidNessusFile("Unable to parse Nessus XML.", { cause: new Error(decoded.reason) });
  }
  const text = decoded.text;
  if (text.trim() === "") {
    throw new InvalidNessusFile("The uploaded file is empty.");
  }

  const parsed = parseXml(text);
  if (!parsed.ok) {
    throw new InvalidNessusFile("Unable to parse Nessus XML.", { cause: new Error(parsed.reason) });
  }

  const reports = extractReports(parsed.document);
  const findings = collectFindings(reports);
  findings.sort(compareFindings);

  if (findings.length === 0) {
    throw new EmptyReportError("The Nessus export does not include any findings.");
  }

  const now = options.now ?? (() => new Date());
  return deepFreeze({
    metadata: { ...metadata },
    findings,
    host_summaries: summarizeHosts(findings),
    aggregates: aggregateMetrics(findings),
    generated_at: now().toISOString()
  });
}

function extractReports(document: XmlNode): unknown[] {
  const root = document["NessusClientData_v2"];
  if (!isXmlNode(root) || !("Report" in root)) {
    throw new InvalidNessusFile("The file is not a valid Nessus export.");
  }
  return ensureSequence(root["Report"]);
}

function collectFindings(reports: unknown[]): FindingRecord[] {
  const findings: FindingRecord[] = [];
  for (const report of reports) {
    if (!isXmlNode(report)) continue;
    for (const host of ensureSequence(report["ReportHost"])) {
      if (!isXmlNode(host)) continue;
      const identity = resolveHostIdentity(host, extractHostProperties(host));
      for (const item of ensureSequence(host["ReportItem"])) {
        // A bare <ReportItem/> parses as text; it still counts, with every field defaulted.
        findings.push(normalizeFinding(isXmlNode(item) ? item : {}, identity));
      }
    }
  }
  return findings;
}

// Missing CVSS ranks as 0.0 here only; averaging still skips it.
function compareFindings(a: FindingRecord, b: FindingRecord): number {
  return b.severity - a.severity || (b.cvss_base ?? 0) - (a.cvss_base ?? 0);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
