/** Archive entries worth scanning for copyright lines: notice, license, licence or pom files, anywhere in the tree. */
export const COPYRIGHT_FILE_PATTERN = /^(?:.+\/)?(?:[^/]+-)?(?:notice|license|licence|pom)(?:\.(?:md|txt|xml))?$/i;

export const MANIFEST_ENTRY_PATH = "meta-inf/manifest.mf";

/**
 * "Copyright", an optional marker (©, "(c)" or a templated `holder> =` token), then the
 * statement itself up to trailing whitespace and quotes. Group 1 is the statement.
 */
export const COPYRIGHT_LINE_PATTERN = /Copyright\s+(?:(?:©|\(c\)|holder>\s*=)\s+)?(.+?)[\s"]*$/i;

/** A markdown "## Copyright" heading on a line of its own. */
export const COPYRIGHT_BLOCK_START_PATTERN = /^\s*##\s*Copyright\s*$/i;

export const BLOCK_KEYWORD_PATTERN = /^copyright\s*/i;

/** A copyright phrase followed by a sentence that ends in "license.". Group 1 is the phrase. */
export const COPYRIGHT_LICENSE_COMBINATION_PATTERN = /^(.+)\.\s.+license\.$/i;

export function isSectionHeader(trimmedLine: string): boolean {
  return trimmedLine.startsWith("## ");
}
