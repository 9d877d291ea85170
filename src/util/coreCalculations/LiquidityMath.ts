import { BigNumber } from "ethers";
import { MathError } from "../../errors";
import { MAX_UINT128 } from "./uint";

type uint128 = BigNumber;
type int128 = BigNumber;

/**
 * x + y for a uint128 liquidity and a signed delta.
 * Throws MathError("InvalidLiquidity") below zero and MathError("Overflow") above 2^128 - 1.
 */
export function addDelta(x: uint128, y: int128): uint128 {
  const z = x.add(y);
  if (z.isNegative()) {
    throw new MathError("InvalidLiquidity", {
      liquidity: x.toString(),
      delta: y.toString(),
    });
  }
  if (z.gt(MAX_UINT128)) {
    throw new MathError("Overflow", {
      op: "addDelta",
      liquidity: x.toString(),
      delta: y.toString(),
    });
  }
  return z;
}
