import { COPYRIGHT_LICENSE_COMBINATION_PATTERN } from "./patterns.js";

/** Drops a trailing "... license." sentence that follows the copyright phrase on the same line. */
export function postProcess(text: string): string {
  const m = COPYRIGHT_LICENSE_COMBINATION_PATTERN.exec(text);
  if (m && m[1] !== undefined) return m[1];
  return text;
}
