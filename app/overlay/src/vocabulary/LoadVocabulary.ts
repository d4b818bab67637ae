import fs from "node:fs";
import type { overlayLogger } from "../logging/OverlayLogger.js";
import { defaultVocabulary } from "./DefaultVocabulary.js";
import { parseVocabularyText } from "./ParseVocabularyText.js";
import { VocabularyStore } from "./VocabularyStore.js";

export type vocabularySource = "file" | "defaults" | "unreadable";

export type vocabularyLoadResult = {
  store: VocabularyStore;
  source: vocabularySource;
  resourcePath: string;
  skippedLines: number[];
};

const isRegularFile = (filePath: string): boolean => {
  try {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch {
    return false;
  }
};

/**
 * Builds the vocabulary from `resourcePath`. A missing file yields the
 * built-in defaults; a file that exists but cannot be read yields an empty
 * store without falling back to the defaults.
 */
export const loadVocabulary = (
  resourcePath: string,
  logger: overlayLogger
): vocabularyLoadResult => {
  if (!isRegularFile(resourcePath)) {
    logger.info(`No vocabulary file at ${resourcePath}, using built-in defaults.`);
    return {
      store: VocabularyStore.fromEntries(defaultVocabulary),
      source: "defaults",
      resourcePath,
      skippedLines: []
    };
  }

  let text: string;
  try {
    text = fs.readFileSync(resourcePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to read vocabulary file ${resourcePath}: ${message}`);
    return {
      store: VocabularyStore.empty(),
      source: "unreadable",
      resourcePath,
      skippedLines: []
    };
  }

  const { entries, skippedLines } = parseVocabularyText(text);
  const store = VocabularyStore.fromPairs(entries);
  logger.info(`Loaded ${entries.length} vocabulary pairs (${store.size} keys) from ${resourcePath}.`);

  return { store, source: "file", resourcePath, skippedLines };
};
