/*
 * Q64.96 fixed-point numbers: a ratio r is stored as floor(r * 2^96).
 */

import { BigNumber } from "ethers";
import { Q96, RESOLUTION } from "./Constants";
import { mulDiv } from "./FullMath";
import * as UInt from "./uint";

export { Q96, RESOLUTION };

type uint256 = BigNumber;

/** a * b for two Q64.96 values, rounding down. */
export function mul(a: uint256, b: uint256): uint256 {
  return mulDiv(a, b, Q96);
}

/** a / b for two Q64.96 values, rounding down. */
export function div(a: uint256, b: uint256): uint256 {
  return mulDiv(a, Q96, b);
}

/** Integer to Q64.96; throws MathError("Overflow") past 256 bits. */
export function fromUint(x: uint256): uint256 {
  return UInt.mul(x, Q96);
}

/** Q64.96 to integer, truncating the fractional part. */
export function toUint(x: uint256): uint256 {
  return UInt.shr(x, RESOLUTION);
}
