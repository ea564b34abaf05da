import { ensureSequence, stringify } from "./coerce.js";
import { attr, isXmlNode, type XmlNode } from "./xml.js";

export type HostProperties = ReadonlyMap<string, string>;

export type HostIdentity = {
  host: string;
  hostname: string | null;
  ip_address: string | null;
};

/**
 * Flattens `HostProperties/tag` into a name → value table. A tag's value is its
 * inline text, falling back to a `value` attribute; a tag that carries neither
 * is recorded as an empty string so callers can tell it apart from a missing
 * property.
 */
export function extractHostProperties(host: XmlNode): HostProperties {
  const properties = new Map<string, string>();
  const container = host["HostProperties"];
  if (!isXmlNode(container)) return properties;

  for (const tag of ensureSequence(container["tag"])) {
    if (!isXmlNode(tag)) continue;
    const name = attr(tag, "name");
    if (!name) continue;
    const text = tag["#text"];
    const value = text !== undefined && text !== "" ? text : tag["@value"];
    properties.set(name, value === undefined || value === null ? "" : stringify(value));
  }
  return properties;
}

export function resolveHostIdentity(host: XmlNode, properties: HostProperties): HostIdentity {
  const rawName = attr(host, "name");
  return {
    host: properties.get("host-fqdn") || properties.get("host-name") || rawName || "Unknown Host",
    hostname: properties.get("host-name") ?? null,
    ip_address: properties.get("host-ip") ?? null
  };
}
