import type { Router } from "express";
import express from "express";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { buildChartCollection } from "../lib/charts.js";
import { EmptyReportError, InvalidNessusFile } from "../lib/errors.js";
import { createModuleLogger } from "../lib/logger.js";
import { buildReport, normalizeMetadata } from "../lib/nessus.js";
import { renderReportHtml } from "../lib/render.js";
import type { ReportBundle, ReportCache } from "../lib/reportCache.js";
import { sendError } from "./respond.js";

const log = createModuleLogger("reports");

const ReportCreateRequest = z
  .object({
    report_name: z.string(),
    customer: z.string().optional(),
    scan_date: z.string().optional(),
    filename: z.string().min(1),
    nessus_b64: z.string()
  })
  .strict();

export function buildReportsRouter(args: { config: AppConfig; cache: ReportCache }): Router {
  const { config, cache } = args;
  const router = express.Router();

  router.post("/reports", (req, res) => {
    const parsed = ReportCreateRequest.safeParse(req.body);
    if (!parsed.success) {
      return sendError(req, res, 400, "BAD_REQUEST", parsed.error.message);
    }
    if (!parsed.data.filename.toLowerCase().endsWith(".nessus")) {
      return sendError(req, res, 400, "INVALID_FILE", "Please upload a valid .nessus export.");
    }

    const metadata = normalizeMetadata({
      name: parsed.data.report_name,
      customer: parsed.data.customer,
      scan_date: parsed.data.scan_date
    });

    let bundle: ReportBundle;
    try {
      const details = buildReport(metadata, Buffer.from(parsed.data.nessus_b64, "base64"));
      const charts = buildChartCollection(details.aggregates);
      bundle = cache.put({ details, charts, html: renderReportHtml(details, charts) });
    } catch (e) {
      if (e instanceof EmptyReportError) {
        return sendError(req, res, 400, "EMPTY_REPORT", e.message);
      }
      if (e instanceof InvalidNessusFile) {
        log.warn({ err: e, filename: parsed.data.filename, report: metadata.name }, "failed to parse Nessus file");
        return sendError(req, res, 400, "INVALID_NESSUS", e.message);
      }
      throw e;
    }

    const { details } = bundle;
    log.info(
      { report_id: bundle.report_id, findings: details.aggregates.total_findings, hosts: details.aggregates.affected_hosts },
      "report generated"
    );

    return res
      .status(201)
      .location(`/v1/reports/${bundle.report_id}`)
      .json({
        report_id: bundle.report_id,
        generated_at: details.generated_at,
        metadata: details.metadata,
        aggregates: details.aggregates,
        host_summaries: details.host_summaries,
        findings: details.findings.slice(0, config.PREVIEW_FINDINGS_LIMIT),
        total_findings: details.findings.length,
        charts: bundle.charts,
        links: reportLinks(bundle.report_id)
      });
  });

  router.get("/reports/:report_id", (req, res) => {
    const bundle = cache.get(req.params.report_id);
    if (!bundle) return sendError(req, res, 404, "NOT_FOUND", "Report not found");

    return res.status(200).json({
      report_id: bundle.report_id,
      ...bundle.details,
      charts: bundle.charts,
      links: reportLinks(bundle.report_id)
    });
  });

  router.get("/reports/:report_id/report.html", (req, res) => {
    const bundle = cache.get(req.params.report_id);
    if (!bundle) return sendError(req, res, 404, "NOT_FOUND", "Report not found");

    return res
      .status(200)
      .type("html")
      .set("Content-Disposition", `attachment; filename=nessus-report-${bundle.report_id}.html`)
      .send(bundle.html);
  });

  return router;
}

function reportLinks(reportId: string): { self: string; html: string } {
  return {
    self: `/v1/reports/${reportId}`,
    html: `/v1/reports/${reportId}/report.html`
  };
}
