import type { Request, Response } from "express";
import { renderErrorHtml } from "../lib/render.js";

export type ErrorCode =
  | "BAD_REQUEST"
  | "INVALID_FILE"
  | "INVALID_NESSUS"
  | "EMPTY_REPORT"
  | "NOT_FOUND"
  | "PAYLOAD_TOO_LARGE"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

/** Browsers asking for HTML get the error page; everything else gets JSON. */
export function prefersHtml(req: Request): boolean {
  const accept = req.get("accept") ?? "";
  return accept.includes("text/html") && !accept.includes("application/json");
}

export function sendError(req: Request, res: Response, status: number, error_code: ErrorCode, message: string): Response {
  if (prefersHtml(req)) {
    return res.status(status).type("html").send(renderErrorHtml(status, message));
  }
  return res.status(status).json({ error: { error_code, message } });
}
