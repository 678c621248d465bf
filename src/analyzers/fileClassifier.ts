import { COPYRIGHT_FILE_PATTERN, MANIFEST_ENTRY_PATH } from "./patterns.js";
import type { EntryKind } from "./types.js";

export function classifyEntry(entryName: string): EntryKind {
  const lower = entryName.toLowerCase();
  if (COPYRIGHT_FILE_PATTERN.test(lower)) return "notice";
  if (lower === MANIFEST_ENTRY_PATH) return "metadata";
  return "ignore";
}
