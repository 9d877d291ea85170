/*
 * Checked unsigned integer operators.
 * Arbitrary integer precision is achieved by using BigNumber from ethers.js, so every
 * operator checks its result against the bit width it models and raises
 * MathError("Overflow") when it does not fit.
 */

import { BigNumber, BigNumberish, ethers } from "ethers";
import { MathError } from "../../errors";
import * as word from "./word";

export type uint = BigNumber;

export const MAX_UINT128 = BigNumber.from(2).pow(128).sub(1);
export const MAX_UINT160 = BigNumber.from(2).pow(160).sub(1);
export const MAX_UINT256 = ethers.constants.MaxUint256;

function checkRange(a: BigNumber, max: BigNumber, op: string): BigNumber {
  if (a.isNegative() || a.gt(max)) {
    throw new MathError("Overflow", { op, value: a.toString() });
  }
  return a;
}

// a + b for uint256.
export function add(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).add(b), MAX_UINT256, "uint/add");
}

// a - b for uint256.
export function sub(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).sub(b), MAX_UINT256, "uint/sub");
}

// a * b for uint256.
export function mul(a: BigNumberish, b: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a).mul(b), MAX_UINT256, "uint/mul");
}

// a / b for uint256, rounding down.
export function div(a: BigNumberish, b: BigNumberish): BigNumber {
  const d = BigNumber.from(b);
  if (d.isZero()) {
    throw new MathError("DivisionByZero", { op: "uint/div" });
  }
  return BigNumber.from(a).div(d);
}

// a << b for uint256; bits shifted off the left are discarded.
export function shl(a: BigNumberish, b: number): BigNumber {
  return word.shl(b, a);
}

// a >> b for uint256.
export function shr(a: BigNumberish, b: number): BigNumber {
  return word.shr(b, a);
}

export function toUint128(a: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a), MAX_UINT128, "uint/toUint128");
}

export function toUint160(a: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a), MAX_UINT160, "uint/toUint160");
}

export function toUint256(a: BigNumberish): BigNumber {
  return checkRange(BigNumber.from(a), MAX_UINT256, "uint/toUint256");
}

export function min(a: BigNumber, b: BigNumber): BigNumber {
  return a.lt(b) ? a : b;
}

export function max(a: BigNumber, b: BigNumber): BigNumber {
  return a.gt(b) ? a : b;
}
