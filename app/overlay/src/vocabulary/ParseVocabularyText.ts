import type { vocabularyEntry } from "./VocabularyStore.js";

export type parsedVocabularyLine =
  | { kind: "entry"; entry: vocabularyEntry }
  | { kind: "ignored" }
  | { kind: "skipped" };

export type parsedVocabularyText = {
  entries: vocabularyEntry[];
  skippedLines: number[];
};

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Parses one `term = translation` line. Blank lines and `#` comments are
 * ignored; anything else without two non-empty sides is skipped.
 */
export const parseVocabularyLine = (line: string): parsedVocabularyLine => {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return { kind: "ignored" };
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex < 0) {
    return { kind: "skipped" };
  }

  const term = trimmed.slice(0, separatorIndex).trim();
  const translation = trimmed.slice(separatorIndex + 1).trim();
  if (!term || !translation) {
    return { kind: "skipped" };
  }

  return { kind: "entry", entry: { term, translation } };
};

export const splitVocabularyLines = (text: string): string[] => {
  const withoutBom = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  return withoutBom.split(/\r\n|\r|\n/);
};

export const parseVocabularyText = (text: string): parsedVocabularyText => {
  const entries: vocabularyEntry[] = [];
  const skippedLines: number[] = [];

  splitVocabularyLines(text).forEach((line, index) => {
    const parsed = parseVocabularyLine(line);
    if (parsed.kind === "entry") {
      entries.push(parsed.entry);
    } else if (parsed.kind === "skipped") {
      skippedLines.push(index + 1);
    }
  });

  return { entries, skippedLines };
};
