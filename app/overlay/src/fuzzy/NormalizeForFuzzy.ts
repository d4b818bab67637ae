const foldTable: Record<string, string> = {
  "'": "",
  "’": "",
  "`": "",
  "´": "",
  "ä": "a",
  "ö": "o",
  "ü": "u",
  "ß": "ss",
  "é": "e",
  "è": "e",
  "ê": "e",
  "ë": "e",
  "à": "a",
  "â": "a",
  "î": "i",
  "ï": "i",
  "ô": "o",
  "û": "u",
  "ù": "u",
  "ç": "c",
  "œ": "oe",
  "æ": "ae"
};

const foldPattern = new RegExp(`[${Object.keys(foldTable).join("")}]`, "g");

/**
 * Lowercases `text`, drops apostrophes and accent marks and folds accented
 * Latin letters to their base letters.
 */
export const normalizeForFuzzy = (text: string): string => {
  return text.toLowerCase().replace(foldPattern, (character) => foldTable[character] ?? character);
};
