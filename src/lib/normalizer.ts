import { cleanCveList, normalizeRiskFactor, normalizeText, toFloat, toInt } from "./coerce.js";
import type { HostIdentity } from "./hostProperties.js";
import { severityLabel, type FindingRecord } from "./types.js";
import { attr, type XmlNode } from "./xml.js";

/** Port "0" marks a host-level finding, so it yields no port at all. */
export function composePort(item: XmlNode): string | null {
  const port = attr(item, "port");
  if (!port || port === "0") return null;
  const service = attr(item, "svc_name");
  return service ? `${port}/${service}` : port;
}

export function pickCvss(item: XmlNode): number | null {
  return toFloat(item["cvss3_base_score"]) ?? toFloat(item["cvss_base_score"]);
}

export function normalizeFinding(item: XmlNode, identity: HostIdentity): FindingRecord {
  const severity = toInt(item["@severity"], 0);
  return {
    host: identity.host,
    hostname: identity.hostname,
    ip_address: identity.ip_address,
    port: composePort(item),
    protocol: attr(item, "protocol") ?? null,
    plugin_id: attr(item, "pluginID") || "0",
    plugin_name: attr(item, "pluginName") || "Unnamed Plugin",
    plugin_family: attr(item, "pluginFamily") || "Uncategorized",
    severity,
    severity_label: severityLabel(severity),
    risk_factor: normalizeRiskFactor(item["risk_factor"]),
    cvss_base: pickCvss(item),
    cves: cleanCveList(item["cve"]),
    description: normalizeText(item["description"]),
    solution: normalizeText(item["solution"]),
    plugin_output: normalizeText(item["plugin_output"])
  };
}
