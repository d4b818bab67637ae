/**
 * Levenshtein distance: the fewest single-character insertions, deletions
 * or substitutions turning `source` into `target`.
 */
export const editDistance = (source: string, target: string): number => {
  const sourceLength = source.length;
  const targetLength = target.length;
  if (sourceLength === 0) {
    return targetLength;
  }
  if (targetLength === 0) {
    return sourceLength;
  }

  const distances: number[][] = Array.from({ length: sourceLength + 1 }, (_row, rowIndex) =>
    Array.from({ length: targetLength + 1 }, (_cell, columnIndex) =>
      rowIndex === 0 ? columnIndex : columnIndex === 0 ? rowIndex : 0
    )
  );

  for (let row = 1; row <= sourceLength; row += 1) {
    for (let column = 1; column <= targetLength; column += 1) {
      const substitutionCost = source[row - 1] === target[column - 1] ? 0 : 1;
      distances[row][column] = Math.min(
        distances[row - 1][column] + 1,
        distances[row][column - 1] + 1,
        distances[row - 1][column - 1] + substitutionCost
      );
    }
  }

  return distances[sourceLength][targetLength];
};
