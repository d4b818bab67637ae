import type { VocabularyStore } from "../vocabulary/VocabularyStore.js";
import { isSimilar } from "./IsSimilar.js";
import { normalizeForFuzzy } from "./NormalizeForFuzzy.js";

/**
 * Returns the translation of the first entry, in insertion order, whose key
 * is similar to `input`. Closer keys later in the store do not win.
 */
export const findFuzzyMatch = (store: VocabularyStore, input: string): string | null => {
  const normalizedInput = normalizeForFuzzy(input);

  for (const entry of store.entries()) {
    if (isSimilar(normalizedInput, normalizeForFuzzy(entry.term))) {
      return entry.translation;
    }
  }

  return null;
};
