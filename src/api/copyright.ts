import type { Router } from "express";
import express from "express";
import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "../config.js";
import { scanArchive } from "../lib/archive.js";
import { formatArtifact, isSafeCoordinate } from "../lib/artifact.js";
import { resolveAttribution, type ArchiveOutcome, type CopyrightExtractor } from "../lib/extractor.js";
import type { FilterRuleSet } from "../lib/filters.js";
import type { Logger } from "../lib/logger.js";

const Coordinate = z
  .string()
  .trim()
  .min(1)
  .refine(isSafeCoordinate, "must contain only letters, digits, '.', '_' or '-'");

const ArtifactInput = z
  .object({
    groupId: Coordinate,
    artifactId: Coordinate,
    version: Coordinate,
    type: Coordinate.default("jar"),
    classifier: Coordinate.optional(),
    scope: z.string().optional(),
    packaging: z.string().optional()
  })
  .strict();

const CopyrightRequest = z
  .object({
    artifact: ArtifactInput
  })
  .strict();

const ArchiveRequest = z
  .object({
    jar_b64: z.string().min(1),
    name: z.string().min(1).optional()
  })
  .strict();

export function buildCopyrightRouter(args: {
  config: AppConfig;
  extractor: CopyrightExtractor;
  rules: FilterRuleSet;
  logger: Logger;
}): Router {
  const { config, extractor, rules, logger } = args;
  const router = express.Router();

  router.post("/copyright", (req, res) => {
    const parsed = CopyrightRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }

    const artifact = parsed.data.artifact;
    const report = extractor.extractCopyrightReport(artifact);
    return res.status(200).json({
      scan_id: uuidv4(),
      artifact: formatArtifact(artifact),
      copyright: report.copyright,
      text_copyrights: report.text_copyrights,
      metadata_copyrights: report.metadata_copyrights,
      archives: report.archives.map(publicOutcome)
    });
  });

  router.post("/copyright/archive", (req, res) => {
    const parsed = ArchiveRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }

    const bytes = Buffer.from(parsed.data.jar_b64, "base64");
    if (bytes.byteLength > config.INTAKE_MAX_ARCHIVE_BYTES) {
      return res.status(413).json({ error: { error_code: "ARCHIVE_TOO_LARGE", message: "archive exceeds size limit" } });
    }

    const name = parsed.data.name ?? "upload.jar";
    const scanned = scanArchive(
      { name, data: bytes },
      { rules, logger, max_entry_bytes: config.INTAKE_MAX_SINGLE_FILE_BYTES }
    );
    if (!scanned.ok) {
      return res.status(422).json({ error: { error_code: "ARCHIVE_UNREADABLE", message: scanned.reason } });
    }

    const attribution = resolveAttribution(scanned.text_copyrights, scanned.metadata_copyrights);
    return res.status(200).json({
      scan_id: uuidv4(),
      name,
      copyright: attribution.copyright,
      text_copyrights: attribution.text_copyrights,
      metadata_copyrights: attribution.metadata_copyrights,
      failed_entries: scanned.failed_entries
    });
  });

  return router;
}

// Local paths stay on the server.
function publicOutcome(outcome: ArchiveOutcome) {
  return {
    kind: outcome.kind,
    artifact: outcome.artifact,
    status: outcome.status,
    ...(outcome.reason !== undefined && outcome.status !== "unresolved" ? { reason: outcome.reason } : {}),
    ...(outcome.failed_entries ? { failed_entries: outcome.failed_entries } : {})
  };
}
