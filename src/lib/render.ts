import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import type { ChartCollection } from "./charts.js";
import { SEVERITY_ORDER, type ReportDetails } from "./types.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
const TEMPLATE_DIR = path.join(moduleDir, "../../templates");

const hbs = Handlebars.create();

hbs.registerHelper("severityClass", (label: unknown) => `sev-${String(label).toLowerCase()}`);
hbs.registerHelper("join", (values: unknown, separator: unknown) => {
  if (!Array.isArray(values) || values.length === 0) return "None";
  return values.join(typeof separator === "string" ? separator : ", ");
});
hbs.registerHelper("formatCvss", (value: unknown) => (typeof value === "number" ? value.toFixed(1) : "N/A"));
hbs.registerHelper("countFor", (totals: unknown, label: unknown) => {
  if (totals === null || typeof totals !== "object") return 0;
  const value: unknown = Object.getOwnPropertyDescriptor(totals, String(label))?.value;
  return typeof value === "number" ? value : 0;
});

type CompiledTemplate = ReturnType<typeof hbs.compile>;

const templates = new Map<string, CompiledTemplate>();

function template(name: string): CompiledTemplate {
  let compiled = templates.get(name);
  if (!compiled) {
    compiled = hbs.compile(fs.readFileSync(path.join(TEMPLATE_DIR, `${name}.hbs`), "utf8"));
    templates.set(name, compiled);
  }
  return compiled;
}

export function renderReportHtml(details: ReportDetails, charts: ChartCollection): string {
  return template("report")({
    details,
    charts,
    severity_order: SEVERITY_ORDER
  });
}

export function renderErrorHtml(statusCode: number, message: string): string {
  return template("error")({
    status_code: statusCode,
    message: message || "An unexpected error occurred."
  });
}
