export type vocabularyEntry = {
  readonly term: string;
  readonly translation: string;
};

const foldKey = (value: string): string => value.toLowerCase();

const insertEntry = (
  entriesByKey: Map<string, vocabularyEntry>,
  term: string,
  translation: string
): void => {
  const key = foldKey(term);
  const existing = entriesByKey.get(key);
  // An overwrite keeps the first spelling of the key and its position.
  entriesByKey.set(key, Object.freeze({ term: existing?.term ?? term, translation }));
};

/**
 * Case-insensitive term → translation mapping. Built once and never mutated,
 * so lookups and iteration can be shared freely.
 */
export class VocabularyStore {
  private readonly entriesByKey: ReadonlyMap<string, vocabularyEntry>;
  private readonly orderedEntries: readonly vocabularyEntry[];

  private constructor(entriesByKey: Map<string, vocabularyEntry>) {
    this.entriesByKey = entriesByKey;
    this.orderedEntries = Object.freeze(Array.from(entriesByKey.values()));
  }

  /**
   * Inserts every entry as given. A later entry whose term matches an earlier
   * one (ignoring case) replaces its translation.
   */
  static fromEntries(entries: Iterable<vocabularyEntry>): VocabularyStore {
    const entriesByKey = new Map<string, vocabularyEntry>();
    for (const entry of entries) {
      insertEntry(entriesByKey, entry.term, entry.translation);
    }
    return new VocabularyStore(entriesByKey);
  }

  /**
   * Inserts every pair in both directions: term → translation, then
   * translation → term. Last occurrence wins for either key.
   */
  static fromPairs(pairs: Iterable<vocabularyEntry>): VocabularyStore {
    const entriesByKey = new Map<string, vocabularyEntry>();
    for (const pair of pairs) {
      insertEntry(entriesByKey, pair.term, pair.translation);
      insertEntry(entriesByKey, pair.translation, pair.term);
    }
    return new VocabularyStore(entriesByKey);
  }

  static empty(): VocabularyStore {
    return new VocabularyStore(new Map());
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  lookup(term: string): string | null {
    return this.entriesByKey.get(foldKey(term))?.translation ?? null;
  }

  entries(): readonly vocabularyEntry[] {
    return this.orderedEntries;
  }
}
