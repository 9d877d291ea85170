/*
 * Checked signed integer operators.
 * Arbitrary integer precision is achieved by using BigNumber from ethers.js, so every
 * operator checks its result against the bit width it models.
 */

import { BigNumber, BigNumberish, ethers } from "ethers";
import { MathError } from "../../errors";

export type int = BigNumber;

const _1 = BigNumber.from(1);

export const MAX_INT128 = BigNumber.from(2).pow(127).sub(1);
export const MIN_INT128 = BigNumber.from(2).pow(127).mul(-1);
export const MAX_INT256 = ethers.constants.MaxInt256;
export const MIN_INT256 = ethers.constants.MinInt256;

function checkRange(
  a: BigNumber,
  min: BigNumber,
  max: BigNumber,
  op: string,
): BigNumber {
  if (a.lt(min) || a.gt(max)) {
    throw new MathError("Overflow", { op, value: a.toString() });
  }
  return a;
}

// a >> b for int, arithmetic: rounds toward negative infinity.
export function sar(a: BigNumberish, b: number): BigNumber {
  const aBN = BigNumber.from(a);
  if (!aBN.isNegative()) {
    return aBN.shr(b);
  }
  // floor(a / 2^b) == -ceil(-a / 2^b) == -(((-a - 1) >> b) + 1)
  return aBN.mul(-1).sub(_1).shr(b).add(_1).mul(-1);
}

// a + b for int256.
export function add(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).add(b), MIN_INT256, MAX_INT256, "int/add");
}

// a - b for int256.
export function sub(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).sub(b), MIN_INT256, MAX_INT256, "int/sub");
}

// a * b for int256.
export function mul(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).mul(b), MIN_INT256, MAX_INT256, "int/mul");
}

export function toInt128(a: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a), MIN_INT128, MAX_INT128, "int/toInt128");
}

export function toInt256(a: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a), MIN_INT256, MAX_INT256, "int/toInt256");
}
