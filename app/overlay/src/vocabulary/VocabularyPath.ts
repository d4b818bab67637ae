import path from "node:path";

export const VOCABULARY_FILE_NAME = "vocabulary.txt";

export const resolveVocabularyPath = (executablePath: string = process.execPath): string => {
  return path.resolve(path.dirname(executablePath), VOCABULARY_FILE_NAME);
};
