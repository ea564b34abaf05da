import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import { SEVERITY_ORDER } from "../lib/types.js";

export function buildMetaRouter(args: { config: AppConfig }): Router {
  const { config } = args;
  const router = express.Router();

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION,
      severity_order: SEVERITY_ORDER
    });
  });

  return router;
}
