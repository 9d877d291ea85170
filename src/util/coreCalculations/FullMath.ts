/*
 * Multiply-then-divide with full 512-bit intermediate precision.
 *
 * The product a*b is held as two 256-bit words [prod1 prod0]. The remainder is
 * subtracted so the division is exact, powers of two are factored out of the
 * denominator, and the remaining odd denominator is inverted modulo 2^256 by Newton
 * iteration. Every intermediate is a wrapping 256-bit word from word.ts.
 */

import { BigNumber } from "ethers";
import { MathError } from "../../errors";
import * as word from "./word";
import { MAX_UINT256 } from "./uint";

type uint256 = BigNumber;

const _0 = BigNumber.from(0);
const _1 = BigNumber.from(1);
const _2 = BigNumber.from(2);
const _3 = BigNumber.from(3);

/**
 * floor(a*b/denominator). Throws MathError("DivisionByZero") when the denominator is
 * zero and MathError("Overflow") when the result does not fit in 256 bits.
 */
export function mulDiv(a: uint256, b: uint256, denominator: uint256): uint256 {
  if (word.toUIntBigNumber(denominator).isZero()) {
    throw new MathError("DivisionByZero", { op: "mulDiv" });
  }

  // 512-bit multiply [prod1 prod0] = a * b
  let prod0 = word.mul(a, b);
  const mm = word.mulmod(a, b, word.not(_0));
  let prod1 = word.sub(word.sub(mm, prod0), word.lt(mm, prod0));

  // Short circuit 256 by 256 division
  if (prod1.isZero()) {
    return word.div(prod0, denominator);
  }

  // The result must be less than 2^256, so denominator > prod1
  if (word.toUIntBigNumber(denominator).lte(prod1)) {
    throw new MathError("Overflow", {
      op: "mulDiv",
      a: a.toString(),
      b: b.toString(),
      denominator: denominator.toString(),
    });
  }

  // Make division exact by subtracting the remainder from [prod1 prod0]
  const remainder = word.mulmod(a, b, denominator);
  prod1 = word.sub(prod1, word.gt(remainder, prod0));
  prod0 = word.sub(prod0, remainder);

  // Factor powers of two out of the denominator
  let twos = word.and(word.sub(_0, denominator), denominator);
  const odd = word.div(denominator, twos);
  prod0 = word.div(prod0, twos);
  // Flip twos such that it is 2^256 / twos
  twos = word.add(word.div(word.sub(_0, twos), twos), _1);
  prod0 = word.or(prod0, word.mul(prod1, twos));

  // Inverse of the odd denominator mod 2^256: seed correct to 4 bits, then
  // each Newton step doubles the number of correct bits.
  let inv = word.xor(word.mul(_3, odd), _2);
  for (let i = 0; i < 6; i++) {
    inv = word.mul(inv, word.sub(_2, word.mul(odd, inv)));
  }

  return word.mul(prod0, inv);
}

/**
 * ceil(a*b/denominator). Same failures as mulDiv, plus MathError("Overflow") when
 * rounding up exceeds 256 bits.
 */
export function mulDivRoundingUp(
  a: uint256,
  b: uint256,
  denominator: uint256,
): uint256 {
  const result = mulDiv(a, b, denominator);
  if (word.mulmod(a, b, denominator).gt(0)) {
    if (result.gte(MAX_UINT256)) {
      throw new MathError("Overflow", { op: "mulDivRoundingUp" });
    }
    return result.add(_1);
  }
  return result;
}
