import { editDistance } from "./EditDistance.js";

const MAX_LENGTH_DIFFERENCE = 2;
const LONG_INPUT_LENGTH = 4;

// Short inputs get one typo, longer ones two.
export const maxDistanceFor = (input: string): number => {
  return input.length >= LONG_INPUT_LENGTH ? 2 : 1;
};

/**
 * Both arguments are expected to be normalized already.
 */
export const isSimilar = (input: string, key: string): boolean => {
  if (input === key) {
    return true;
  }

  if (Math.abs(input.length - key.length) > MAX_LENGTH_DIFFERENCE) {
    return false;
  }

  return editDistance(input, key) <= maxDistanceFor(input);
};
