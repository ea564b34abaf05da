import { XMLParser, XMLValidator } from "fast-xml-parser";

export type XmlNode = Record<string, unknown>;

// Values stay text: numeric coercion happens per field with explicit defaults.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true
});

const DECLARED_ENCODING = /^(?:\u00ef\u00bb\u00bf)?\s*<\?xml[^>]*?\bencoding\s*=\s*["']([A-Za-z][\w.:-]*)["']/;

export type XmlDecodeResult = { ok: true; text: string } | { ok: false; reason: string };

/**
 * Decodes raw upload bytes using the encoding named in the XML declaration,
 * UTF-8 when none is named. Bytes that are invalid in that encoding fail the
 * decode instead of becoming replacement characters.
 */
export function decodeXml(bytes: Uint8Array): XmlDecodeResult {
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  const label = DECLARED_ENCODING.exec(head)?.[1] ?? "utf-8";
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch (error) {
    return { ok: false, reason: `unsupported encoding "${label}": ${String(error)}` };
  }
  try {
    return { ok: true, text: decoder.decode(bytes) };
  } catch (error) {
    return { ok: false, reason: `invalid ${decoder.encoding} byte sequence: ${String(error)}` };
  }
}

export type XmlParseResult = { ok: true; document: XmlNode } | { ok: false; reason: string };

export function parseXml(text: string): XmlParseResult {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return { ok: false, reason: `${validation.err.code} at line ${validation.err.line}: ${validation.err.msg}` };
  }
  const document: unknown = parser.parse(text);
  if (!isXmlNode(document)) {
    return { ok: false, reason: "document has no root element" };
  }
  return { ok: true, document };
}

export function isXmlNode(value: unknown): value is XmlNode {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@${name}`];
  return typeof value === "string" ? value : undefined;
}
