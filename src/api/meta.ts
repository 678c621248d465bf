import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import type { FilterRuleSet } from "../lib/filters.js";

export function buildMetaRouter(args: { config: AppConfig; rules: FilterRuleSet }): Router {
  const { config, rules } = args;
  const router = express.Router();

  router.get("/filters", (_req, res) => {
    return res.status(200).json({
      count: rules.patterns.length,
      patterns: rules.patterns.map((re) => re.source)
    });
  });

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION,
      filter_count: rules.patterns.length
    });
  });

  return router;
}
