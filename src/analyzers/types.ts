export type EntryKind = "notice" | "metadata" | "ignore";

export type CopyrightMatchSource = "line" | "block";

export type CopyrightMatch = {
  text: string;
  source: CopyrightMatchSource;
  line_start: number;
  line_end: number;
};
