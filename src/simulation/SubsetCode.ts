/**
 * Letter codes for subsets of effect measures
 *
 * The Venn diagram names each region by the letters of the measures in it,
 * e.g. "abd". Letters map to bit weights a=32, b=16, c=1, d=4, e=8, f=2.
 */

import { LETTER_WEIGHTS, type SubsetLetter } from '../core/measures/EffectMeasures';
import { EmmError, ErrorCode } from '../core/errors';
import { SUBSET_COUNT } from './AgreementEvaluator';

const LETTERS: readonly SubsetLetter[] = ['a', 'b', 'c', 'd', 'e', 'f'];

function isSubsetLetter(char: string): char is SubsetLetter {
  return Object.prototype.hasOwnProperty.call(LETTER_WEIGHTS, char);
}

/**
 * Bitmask of a code. Repeated letters count once; anything outside a-f
 * is ignored.
 */
export function bitmaskOf(code: string): number {
  let bitmask = 0;
  for (const char of code) {
    if (isSubsetLetter(char)) {
      bitmask |= LETTER_WEIGHTS[char];
    }
  }
  return bitmask;
}

/**
 * Letters of a bitmask in alphabetical order
 */
export function codeOf(bitmask: number): string {
  if (!Number.isInteger(bitmask) || bitmask < 0 || bitmask >= SUBSET_COUNT) {
    throw new EmmError(ErrorCode.INVALID_INPUT, `Subset bitmask out of range: ${bitmask}`, {
      bitmask,
      max: SUBSET_COUNT - 1,
    });
  }
  return LETTERS.filter((letter) => (bitmask & LETTER_WEIGHTS[letter]) !== 0).join('');
}

/**
 * Share of trials in which the coded subset agreed
 */
export function probability(
  code: string,
  tallies: readonly number[],
  trialCount: number
): number {
  if (!Number.isInteger(trialCount) || trialCount <= 0) {
    throw new EmmError(ErrorCode.INVALID_INPUT, `Trial count must be a positive integer: ${trialCount}`, {
      trialCount,
    });
  }
  return tallies[bitmaskOf(code)] / trialCount;
}
