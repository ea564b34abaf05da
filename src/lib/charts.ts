import type { AggregatedMetrics, LabelCount } from "./types.js";

export const CHART_COLORS: Readonly<Record<string, string>> = {
  Critical: "#B90E0A",
  High: "#D6453D",
  Medium: "#F0A202",
  Low: "#4DA1A9",
  Info: "#67ACE1",
  Accent: "#263746"
};

const BACKGROUND_COLOR = "#efefef";
const TEXT_COLOR = "#263746";
const RISK_PALETTE = ["#D6453D", "#F0A202", "#4DA1A9", "#67ACE1", "#B0BEC5"];
const FONT = "font-family=\"Helvetica, Arial, sans-serif\"";

export type ChartCollection = {
  severity: string;
  hosts: string;
  families: string;
  risks: string;
};

export function buildChartCollection(aggregates: AggregatedMetrics): ChartCollection {
  return {
    severity: severityBarChart(aggregates.severity_counts),
    hosts: topHostsChart(aggregates.top_hosts),
    families: topFamiliesChart(aggregates.top_families),
    risks: riskFactorChart(aggregates.risk_counts)
  };
}

export function severityBarChart(data: readonly LabelCount[]): string {
  if (!hasValues(data)) return emptyChart("No findings available");

  const width = 600;
  const height = 320;
  const plotTop = 50;
  const plotBottom = height - 40;
  const slot = (width - 80) / data.length;
  const max = maxValue(data);

  const bars = data.map(([label, count], i) => {
    const barHeight = ((plotBottom - plotTop) * count) / max;
    const x = 60 + i * slot + slot * 0.15;
    const y = plotBottom - barHeight;
    const w = slot * 0.7;
    return [
      `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(barHeight)}" fill="${CHART_COLORS[label] ?? CHART_COLORS.Accent}"/>`,
      text(x + w / 2, y - 6, String(count), { anchor: "middle", size: 11 }),
      text(x + w / 2, plotBottom + 18, label, { anchor: "middle", size: 12 })
    ].join("");
  });

  return svgDocument(width, height, [
    title(width, "Findings by Severity"),
    `<line x1="60" y1="${plotBottom}" x2="${width - 20}" y2="${plotBottom}" stroke="${TEXT_COLOR}"/>`,
    ...bars
  ]);
}

export function topHostsChart(data: readonly LabelCount[]): string {
  return horizontalBarChart(data, CHART_COLORS.Accent, "Top Hosts by Findings");
}

export function topFamiliesChart(data: readonly LabelCount[]): string {
  return horizontalBarChart(data, "#67ACE1", "Top Plugin Families");
}

/** Single stacked bar split by share, with a percentage legend underneath. */
export function riskFactorChart(data: readonly LabelCount[]): string {
  if (!hasValues(data)) return emptyChart("No risk factor data");

  const width = 450;
  const barY = 50;
  const barHeight = 36;
  const total = data.reduce((sum, [, count]) => sum + count, 0);
  const height = barY + barHeight + 30 + data.length * 22;

  let offset = 20;
  const segments: string[] = [];
  const legend: string[] = [];
  data.forEach(([label, count], i) => {
    const color = RISK_PALETTE[i % RISK_PALETTE.length];
    const w = ((width - 40) * count) / total;
    segments.push(`<rect x="${fmt(offset)}" y="${barY}" width="${fmt(w)}" height="${barHeight}" fill="${color}" stroke="white"/>`);
    offset += w;

    const ly = barY + barHeight + 24 + i * 22;
    legend.push(`<rect x="20" y="${ly - 11}" width="12" height="12" fill="${color}"/>`);
    legend.push(text(40, ly, `${label}: ${Math.round((count / total) * 100)}%`, { size: 12 }));
  });

  return svgDocument(width, height, [title(width, "Risk Factor Distribution"), ...segments, ...legend]);
}

function horizontalBarChart(data: readonly LabelCount[], color: string, chartTitle: string): string {
  if (!hasValues(data)) return emptyChart("No data available");

  const width = 600;
  const rowHeight = 28;
  const labelWidth = 200;
  const plotTop = 45;
  const height = Math.max(180, plotTop + data.length * rowHeight + 35);
  const max = maxValue(data);
  const plotWidth = width - labelWidth - 60;

  const rows = data.map(([label, count], i) => {
    const y = plotTop + i * rowHeight;
    const w = (plotWidth * count) / max;
    return [
      text(labelWidth - 8, y + rowHeight / 2 + 4, truncate(label, 30), { anchor: "end", size: 11 }),
      `<rect x="${labelWidth}" y="${y + 4}" width="${fmt(w)}" height="${rowHeight - 8}" fill="${color}"/>`,
      text(labelWidth + w + 6, y + rowHeight / 2 + 4, String(count), { size: 11 })
    ].join("");
  });

  const axisY = plotTop + data.length * rowHeight + 4;
  return svgDocument(width, height, [
    title(width, chartTitle),
    ...rows,
    text(labelWidth + plotWidth / 2, axisY + 22, "Findings", { anchor: "middle", size: 12 })
  ]);
}

function emptyChart(message: string): string {
  const width = 450;
  const height = 300;
  return svgDocument(width, height, [text(width / 2, height / 2, message, { anchor: "middle", size: 14 })]);
}

function svgDocument(width: number, height: number, body: string[]): string {
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<rect width="100%" height="100%" fill="${BACKGROUND_COLOR}"/>` +
    body.join("") +
    `</svg>`;
  return `data:image/svg+xml;base64,${Buffer.from(svg, "utf8").toString("base64")}`;
}

function title(width: number, value: string): string {
  return text(width / 2, 28, value, { anchor: "middle", size: 15, bold: true });
}

function text(x: number, y: number, value: string, opts: { anchor?: "start" | "middle" | "end"; size: number; bold?: boolean }): string {
  const weight = opts.bold ? ` font-weight="bold"` : "";
  return `<text x="${fmt(x)}" y="${fmt(y)}" text-anchor="${opts.anchor ?? "start"}" font-size="${opts.size}"${weight} fill="${TEXT_COLOR}" ${FONT}>${escapeXml(value)}</text>`;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function hasValues(data: readonly LabelCount[]): boolean {
  return data.some(([, count]) => count > 0);
}

function maxValue(data: readonly LabelCount[]): number {
  return Math.max(...data.map(([, count]) => count));
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 1)}…` : value;
}

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}
