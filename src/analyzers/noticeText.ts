import type { FilterRuleSet } from "../lib/filters.js";
import {
  BLOCK_KEYWORD_PATTERN,
  COPYRIGHT_BLOCK_START_PATTERN,
  COPYRIGHT_LINE_PATTERN,
  isSectionHeader
} from "./patterns.js";
import { postProcess } from "./postProcess.js";
import type { CopyrightMatch } from "./types.js";

class LineCursor {
  private readonly lines: string[];
  private index = 0;

  constructor(text: string) {
    this.lines = text.split(/\r\n|\r|\n/);
    // A trailing terminator does not start another line.
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === "") this.lines.pop();
  }

  /** 1-based number of the line most recently returned by next(). */
  get lineNo(): number {
    return this.index;
  }

  next(): string | null {
    if (this.index >= this.lines.length) return null;
    const line = this.lines[this.index];
    this.index += 1;
    return line ?? null;
  }
}

/**
 * Returns the statement captured from a copyright line, or null when the line is not one
 * or the statement is excluded by the filter rules.
 */
export function matchCopyrightLine(line: string, rules: FilterRuleSet): string | null {
  const m = COPYRIGHT_LINE_PATTERN.exec(line);
  const captured = m?.[1];
  if (captured === undefined || captured.trim().length === 0) return null;
  if (rules.ignores(captured)) return null;
  return captured;
}

export function scanNoticeText(text: string, rules: FilterRuleSet): CopyrightMatch[] {
  const cursor = new LineCursor(text);
  const matches: CopyrightMatch[] = [];

  let line = cursor.next();
  while (line !== null) {
    const captured = matchCopyrightLine(line, rules);
    if (captured !== null) {
      matches.push({ text: postProcess(captured.trim()), source: "line", line_start: cursor.lineNo, line_end: cursor.lineNo });
    } else if (COPYRIGHT_BLOCK_START_PATTERN.test(line)) {
      matches.push(...extractCopyrightBlock(cursor, rules));
    }
    line = cursor.next();
  }

  return matches;
}

// Reads up to and including the next "## " heading; that heading line is not scanned again.
function extractCopyrightBlock(cursor: LineCursor, rules: FilterRuleSet): CopyrightMatch[] {
  const matches: CopyrightMatch[] = [];
  const parts: string[] = [];
  let blockStart = 0;
  let blockEnd = 0;

  let line = cursor.next();
  while (line !== null) {
    const trimmed = line.trim();
    if (isSectionHeader(trimmed)) break;
    if (trimmed.length > 0) {
      const captured = matchCopyrightLine(line, rules);
      if (captured !== null) {
        matches.push({ text: captured.trim(), source: "line", line_start: cursor.lineNo, line_end: cursor.lineNo });
      } else {
        parts.push(`${trimmed} `);
        if (blockStart === 0) blockStart = cursor.lineNo;
        blockEnd = cursor.lineNo;
      }
    }
    line = cursor.next();
  }

  const block = parts.join("").replace(BLOCK_KEYWORD_PATTERN, "").trim();
  if (block.length > 0) {
    matches.push({ text: postProcess(block), source: "block", line_start: blockStart, line_end: blockEnd });
  }
  return matches;
}
