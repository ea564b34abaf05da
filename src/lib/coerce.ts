/**
 * Scalar coercions for Nessus fields. The export is loosely typed: any field
 * can be missing, a bare value, or a list, and numbers arrive as text. None of
 * these helpers throw.
 */

export function ensureSequence<T>(value: T | T[] | null | undefined): T[] {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value;
  return [value];
}

const INTEGER_RE = /^[+-]?\d+$/;

export function toInt(value: unknown, fallback = 0): number {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : fallback;
  }
  if (typeof value !== "string") return fallback;
  const trimmed = value.trim();
  if (!INTEGER_RE.test(trimmed)) return fallback;
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}

// Number("") is 0, so blank text is ruled out before conversion.
export function toFloat(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function cleanCveList(values: unknown): string[] {
  const out: string[] = [];
  for (const value of ensureSequence(values)) {
    if (!value) continue;
    const cve = stringify(value).trim();
    if (cve) out.push(cve);
  }
  return out;
}

export function normalizeRiskFactor(value: unknown): string {
  if (value === null || value === undefined || value === "") return "None";
  if (typeof value !== "string") return stringify(value);
  const spaced = value.replace(/_/g, " ").trim();
  if (spaced === "") return "None";
  return spaced.charAt(0).toUpperCase() + spaced.slice(1).toLowerCase();
}

export function normalizeText(value: unknown): string {
  if (value === null || value === undefined || value === "") return "";
  if (typeof value === "string") return value.trim();
  return stringify(value);
}

export function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    // Elements that carry attributes parse as objects; their text sits under #text.
    return "#text" in value ? String(value["#text"]) : "";
  }
  return String(value);
}
