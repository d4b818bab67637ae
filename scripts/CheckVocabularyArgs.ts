export type checkVocabularyArgs = {
  file: string | null;
  lookup: string | null;
};

export const parseCheckVocabularyArgs = (argv: readonly string[]): checkVocabularyArgs => {
  const args: Record<string, string> = {};
  for (let index = 0; index < argv.length; index += 1) {
    const key = argv[index];
    if (!key.startsWith("--")) {
      continue;
    }
    const value = argv[index + 1];
    // A flag without a value counts as not given.
    if (value && !value.startsWith("--")) {
      args[key] = value;
      index += 1;
    }
  }

  return {
    file: args["--file"] ?? null,
    lookup: args["--lookup"] ?? null
  };
};
