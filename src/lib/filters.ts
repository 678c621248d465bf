import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export interface FilterRuleSet {
  readonly patterns: readonly RegExp[];
  ignores: (text: string) => boolean;
}

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

export const BUNDLED_FILTERS_FILE = path.resolve(moduleDir, "../../resources/copyright-filters.txt");

export function createFilterRuleSet(patterns: readonly RegExp[]): FilterRuleSet {
  const frozen = Object.freeze([...patterns]);
  return {
    patterns: frozen,
    ignores: (text) => frozen.some((re) => re.test(text))
  };
}

export function parseFilterRules(source: string, logger: Logger = silentLogger): FilterRuleSet {
  const patterns: RegExp[] = [];
  const lines = source.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.startsWith("#") || line.trim().length === 0) return;
    try {
      // No "g" flag: test() must not carry lastIndex between calls.
      patterns.push(new RegExp(line, "i"));
    } catch (e) {
      logger.error("filters.invalid_pattern", { line: index + 1, pattern: line, message: errorMessage(e) });
    }
  });
  return createFilterRuleSet(patterns);
}

export function loadFilterRulesFromFile(file: string, logger: Logger = silentLogger): FilterRuleSet {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch (e) {
    logger.error("filters.unreadable", {
      file,
      message: `Could not read copyright filters, no filtering will be applied: ${errorMessage(e)}`
    });
    return createFilterRuleSet([]);
  }
  return parseFilterRules(source, logger);
}

let bundled: FilterRuleSet | null = null;

/**
 * The bundled rule set, read on first use and shared afterwards. Load diagnostics go to the
 * logger of that first call only; later calls get the shared set and log nothing.
 */
export function bundledFilterRules(logger: Logger = silentLogger): FilterRuleSet {
  if (!bundled) {
    bundled = loadFilterRulesFromFile(BUNDLED_FILTERS_FILE, logger);
  }
  return bundled;
}
