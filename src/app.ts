import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi, { type JsonObject } from "swagger-ui-express";
import YAML from "yaml";
import type { AppConfig } from "./config.js";
import type { CopyrightExtractor } from "./lib/extractor.js";
import type { FilterRuleSet } from "./lib/filters.js";
import type { Logger } from "./lib/logger.js";
import { buildCopyrightRouter } from "./api/copyright.js";
import { buildMetaRouter } from "./api/meta.js";

export function buildApp(args: {
  config: AppConfig;
  extractor: CopyrightExtractor;
  rules: FilterRuleSet;
  logger: Logger;
}) {
  const { config, extractor, rules, logger } = args;
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
      handler: (_req, res) =>
        res.status(429).json({
          error: {
            error_code: "RATE_LIMITED",
            message: "too many requests"
          }
        })
    })
  );
  app.use(express.json({ limit: config.HTTP_JSON_BODY_LIMIT_BYTES }));

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const openapiYaml = fs.readFileSync(path.join(moduleDir, "../openapi/attribution-extractor.openapi.yaml"), "utf8");
  const openapiObj: JsonObject = YAML.parse(openapiYaml);
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildCopyrightRouter({ config, extractor, rules, logger }));
  app.use("/v1", buildMetaRouter({ config, rules }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  return app;
}
