import fs from "node:fs";
import path from "node:path";
import { scanArchive, type EntryFailure } from "./archive.js";
import { formatArtifact, siblingOf, type ArtifactDescriptor, type ArtifactResolver } from "./artifact.js";
import type { FilterRuleSet } from "./filters.js";
import { silentLogger, type Logger } from "./logger.js";

export const COPYRIGHT_SEPARATOR = "; ";

export type ArchiveKind = "primary" | "sources";

export type ArchiveOutcome = {
  kind: ArchiveKind;
  artifact: string;
  status: "scanned" | "unresolved" | "missing" | "not-an-archive" | "unreadable";
  file?: string;
  reason?: string;
  failed_entries?: EntryFailure[];
};

export type Attribution = {
  copyright: string | null;
  text_copyrights: string[];
  metadata_copyrights: string[];
};

export type CopyrightReport = Attribution & {
  archives: ArchiveOutcome[];
};

export interface CopyrightExtractorDeps {
  resolver: ArtifactResolver;
  rules: FilterRuleSet;
  logger?: Logger;
  max_entry_bytes?: number;
}

export interface CopyrightExtractor {
  /** The attribution string for an artifact, or null when none was found. */
  extractCopyright: (artifact: ArtifactDescriptor) => string | null;
  extractCopyrightReport: (artifact: ArtifactDescriptor) => CopyrightReport;
}

/**
 * Picks the final attribution: text-file matches when there are any, otherwise the
 * manifest vendors. Duplicates collapse to their first occurrence.
 */
export function resolveAttribution(textCopyrights: Iterable<string>, metadataCopyrights: Iterable<string>): Attribution {
  const text = [...new Set(textCopyrights)];
  const metadata = [...new Set(metadataCopyrights)];
  const chosen = text.length > 0 ? text : metadata;
  return {
    copyright: chosen.length > 0 ? chosen.join(COPYRIGHT_SEPARATOR) : null,
    text_copyrights: text,
    metadata_copyrights: metadata
  };
}

export function createCopyrightExtractor(deps: CopyrightExtractorDeps): CopyrightExtractor {
  const logger = deps.logger ?? silentLogger;

  const extractCopyrightReport = (artifact: ArtifactDescriptor): CopyrightReport => {
    // The project packaging wins; a bare descriptor falls back to its own type.
    if ((artifact.packaging ?? artifact.type) === "pom") {
      return { ...resolveAttribution([], []), archives: [] };
    }

    const primary = artifact.type === "bundle" ? siblingOf(artifact, "jar") : artifact;
    const candidates: Array<{ kind: ArchiveKind; artifact: ArtifactDescriptor }> = [
      { kind: "primary", artifact: primary },
      { kind: "sources", artifact: siblingOf(primary, "java-source") }
    ];

    const textCopyrights: string[] = [];
    const metadataCopyrights: string[] = [];
    const archives: ArchiveOutcome[] = [];

    for (const candidate of candidates) {
      const outcome = processArtifact(candidate.kind, candidate.artifact);
      archives.push(outcome.outcome);
      textCopyrights.push(...outcome.text_copyrights);
      metadataCopyrights.push(...outcome.metadata_copyrights);
    }

    return { ...resolveAttribution(textCopyrights, metadataCopyrights), archives };
  };

  const processArtifact = (
    kind: ArchiveKind,
    artifact: ArtifactDescriptor
  ): { outcome: ArchiveOutcome; text_copyrights: string[]; metadata_copyrights: string[] } => {
    const id = formatArtifact(artifact);
    const empty = { text_copyrights: [], metadata_copyrights: [] };

    const resolved = artifact.file ? { ok: true as const, file: artifact.file } : deps.resolver.resolve(artifact);
    if (!resolved.ok) {
      logger.warn("artifact.unresolved", { artifact: id, message: resolved.reason });
      return { outcome: { kind, artifact: id, status: "unresolved", reason: resolved.reason }, ...empty };
    }

    const file = resolved.file;
    if (!fs.existsSync(file)) {
      logger.warn("artifact.missing_file", {
        artifact: id,
        file,
        message: `Artifact ${id} has no valid file set, cannot extract copyright information.`
      });
      return { outcome: { kind, artifact: id, status: "missing", file }, ...empty };
    }
    if (!path.basename(file).endsWith(".jar")) {
      return { outcome: { kind, artifact: id, status: "not-an-archive", file }, ...empty };
    }

    const scanned = scanArchive({ name: file, data: file }, { rules: deps.rules, logger, max_entry_bytes: deps.max_entry_bytes });
    if (!scanned.ok) {
      return { outcome: { kind, artifact: id, status: "unreadable", file, reason: scanned.reason }, ...empty };
    }

    return {
      outcome: { kind, artifact: id, status: "scanned", file, failed_entries: scanned.failed_entries },
      text_copyrights: scanned.text_copyrights,
      metadata_copyrights: scanned.metadata_copyrights
    };
  };

  return {
    extractCopyright: (artifact) => extractCopyrightReport(artifact).copyright,
    extractCopyrightReport
  };
}
