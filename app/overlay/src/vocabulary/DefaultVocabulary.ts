import type { vocabularyEntry } from "./VocabularyStore.js";

export const defaultVocabulary: readonly vocabularyEntry[] = [
  { term: "apfel", translation: "Apple" },
  { term: "apple", translation: "Apfel" }
];
