import { findFuzzyMatch } from "../fuzzy/FindFuzzyMatch.js";
import type { VocabularyStore } from "../vocabulary/VocabularyStore.js";

/**
 * Text shown for `input`: the exact translation when there is one, else the
 * first fuzzy match, each behind `prefix`. No match shows nothing.
 */
export const lookupTranslation = (
  store: VocabularyStore,
  input: string,
  prefix: string
): string => {
  const term = input.trim();
  if (!term) {
    return "";
  }

  const translation = store.lookup(term) ?? findFuzzyMatch(store, term);
  return translation === null ? "" : `${prefix}${translation}`;
};
