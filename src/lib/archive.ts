import AdmZip from "adm-zip";
import { classifyEntry } from "../analyzers/fileClassifier.js";
import { scanManifest } from "../analyzers/manifest.js";
import { scanNoticeText } from "../analyzers/noticeText.js";
import { errorMessage, failure, type Failure } from "./errors.js";
import type { FilterRuleSet } from "./filters.js";
import { silentLogger, type Logger } from "./logger.js";

export type ArchiveSource = {
  /** Used in diagnostics only. */
  name: string;
  /** Path of the archive on disk, or its bytes. */
  data: string | Buffer;
};

export interface ArchiveScanOptions {
  rules: FilterRuleSet;
  logger?: Logger;
  max_entry_bytes?: number;
}

export type EntryFailure = {
  entry: string;
  reason: string;
};

export type ArchiveFindings = {
  text_copyrights: string[];
  metadata_copyrights: string[];
  failed_entries: EntryFailure[];
};

export type ArchiveScanResult = ({ ok: true } & ArchiveFindings) | Failure;

type EntryScanResult = { ok: true; kind: "notice" | "metadata"; copyrights: string[] } | Failure;

const DEFAULT_MAX_ENTRY_BYTES = 2 * 1024 * 1024;

export function scanArchive(source: ArchiveSource, options: ArchiveScanOptions): ArchiveScanResult {
  const logger = options.logger ?? silentLogger;
  const maxEntryBytes = options.max_entry_bytes ?? DEFAULT_MAX_ENTRY_BYTES;

  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(source.data).getEntries();
  } catch (e) {
    const reason = `Could not read Zip file: ${errorMessage(e)}`;
    logger.warn("archive.unreadable", { archive: source.name, message: reason });
    return failure(reason);
  }

  const findings: ArchiveFindings = { text_copyrights: [], metadata_copyrights: [], failed_entries: [] };
  for (const entry of entries) {
    if (entry.isDirectory) continue;
    const kind = classifyEntry(entry.entryName);
    if (kind === "ignore") continue;

    let data: Buffer;
    try {
      data = entry.getData();
    } catch (e) {
      recordEntryFailure(findings, logger, source.name, entry.entryName, errorMessage(e));
      continue;
    }
    if (data.length > maxEntryBytes) {
      logger.warn("entry.oversized", { archive: source.name, entry: entry.entryName, size_bytes: data.length });
      findings.failed_entries.push({ entry: entry.entryName, reason: "entry exceeds size limit" });
      continue;
    }

    const result = scanEntry(source.name, entry.entryName, data, kind, options.rules, logger);
    if (!result.ok) {
      recordEntryFailure(findings, logger, source.name, entry.entryName, result.reason);
      continue;
    }
    if (result.kind === "notice") {
      findings.text_copyrights.push(...result.copyrights);
    } else {
      findings.metadata_copyrights.push(...result.copyrights);
    }
  }

  return { ok: true, ...findings };
}

function recordEntryFailure(findings: ArchiveFindings, logger: Logger, archiveName: string, entryName: string, reason: string): void {
  logger.warn("entry.unreadable", { archive: archiveName, entry: entryName, message: reason });
  findings.failed_entries.push({ entry: entryName, reason });
}

function scanEntry(
  archiveName: string,
  entryName: string,
  data: Buffer,
  kind: "notice" | "metadata",
  rules: FilterRuleSet,
  logger: Logger
): EntryScanResult {
  let text: string;
  try {
    text = decodeUtf8(data);
  } catch (e) {
    return failure(errorMessage(e));
  }

  if (kind === "metadata") {
    return { ok: true, kind, copyrights: scanManifest(text) };
  }

  const matches = scanNoticeText(text, rules);
  for (const m of matches) {
    logger.info("copyright.match", {
      archive: archiveName,
      entry: entryName,
      line: m.line_start,
      source: m.source,
      text: m.text
    });
  }
  return { ok: true, kind, copyrights: matches.map((m) => m.text) };
}

function decodeUtf8(bytes: Buffer): string {
  return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
}
