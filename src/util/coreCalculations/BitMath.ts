/*
 * Bit scanning over a 256-bit word.
 *
 * - x must be non-zero; both functions return a bit index in [0, 255]
 * - the search halves the candidate range at every step, so each call costs 8 comparisons
 */

import { BigNumber } from "ethers";
import * as word from "./word";

type uint256 = BigNumber;

const STEPS = [128, 64, 32, 16, 8, 4, 2, 1];

// Literal masks for the least significant bit scan, 2^s - 1 for every step s.
const LOW_MASKS = STEPS.map((s) => BigNumber.from(2).pow(s).sub(1));
// Thresholds for the most significant bit scan, 2^s for every step s.
const THRESHOLDS = STEPS.map((s) => BigNumber.from(2).pow(s));

function requireNonZero(x: uint256): void {
  if (word.toUIntBigNumber(x).isZero()) {
    throw new Error("BitMath: x must be non-zero");
  }
}

/** Index of the highest set bit: `2**msb <= x < 2**(msb+1)`. */
export function mostSignificantBit(x: uint256): number {
  requireNonZero(x);
  let rest = word.toUIntBigNumber(x);
  let r = 0;
  STEPS.forEach((s, i) => {
    if (rest.gte(THRESHOLDS[i])) {
      rest = rest.shr(s);
      r += s;
    }
  });
  return r;
}

/** Index of the lowest set bit: `x & 2**lsb != 0` and `x & (2**lsb - 1) == 0`. */
export function leastSignificantBit(x: uint256): number {
  requireNonZero(x);
  let rest = word.toUIntBigNumber(x);
  let r = 255;
  STEPS.forEach((s, i) => {
    if (!rest.and(LOW_MASKS[i]).isZero()) {
      r -= s;
    } else {
      rest = rest.shr(s);
    }
  });
  return r;
}
