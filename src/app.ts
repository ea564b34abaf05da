import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ErrorRequestHandler } from "express";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import type { AppConfig } from "./config.js";
import { buildMetaRouter } from "./api/meta.js";
import { buildReportsRouter } from "./api/reports.js";
import { sendError } from "./api/respond.js";
import { createModuleLogger } from "./lib/logger.js";
import { ReportCache } from "./lib/reportCache.js";

const log = createModuleLogger("app");

export function buildApp(args: { config: AppConfig; cache?: ReportCache }) {
  const { config } = args;
  const cache = args.cache ?? new ReportCache(config.REPORT_CACHE_LIMIT);
  const app = express();

  if (config.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors());
  app.use(
    rateLimit({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      max: config.RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => sendError(req, res, 429, "RATE_LIMITED", "too many requests")
    })
  );
  app.use(express.json({ limit: config.HTTP_JSON_BODY_LIMIT_BYTES }));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const openapiYaml = fs.readFileSync(path.join(moduleDir, "../openapi/nessus-report.openapi.yaml"), "utf8");
  const openapiObj: unknown = YAML.parse(openapiYaml);
  if (!isRecord(openapiObj)) {
    throw new Error("OpenAPI document must be a YAML mapping");
  }
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildReportsRouter({ config, cache }));
  app.use("/v1", buildMetaRouter({ config }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.use((req, res) => sendError(req, res, 404, "NOT_FOUND", "Not found"));
  app.use(errorHandler);

  return app;
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = httpStatusOf(err);
  if (status === 413) {
    return sendError(req, res, 413, "PAYLOAD_TOO_LARGE", "request body too large");
  }
  if (status === 400) {
    return sendError(req, res, 400, "BAD_REQUEST", "malformed request body");
  }
  log.error({ err }, "unhandled application error");
  return sendError(req, res, 500, "INTERNAL_ERROR", "Something went wrong while generating the report.");
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// body-parser reports client errors through a numeric `status` on the error.
function httpStatusOf(err: unknown): number | null {
  if (err !== null && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}
