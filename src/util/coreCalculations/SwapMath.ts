/*
 * A single swap step inside one price range of constant liquidity.
 *
 * - amountRemaining < 0 is an exact input swap, amountRemaining >= 0 an exact output swap
 * - the direction is zeroForOne when the current price is at or above the target
 * - feePips is in hundredths of a bip; MAX_SWAP_FEE is 100%
 */

import { BigNumber } from "ethers";
import { MathError } from "../../errors";
import { MAX_SWAP_FEE } from "./Constants";
import { mulDiv, mulDivRoundingUp } from "./FullMath";
import {
  getAmount0Delta,
  getAmount1Delta,
  getNextSqrtPriceFromInput,
  getNextSqrtPriceFromOutput,
} from "./SqrtPriceMath";

type uint128 = BigNumber;
type uint160 = BigNumber;
type uint256 = BigNumber;
type int256 = BigNumber;

export type SwapStep = {
  sqrtPriceNextX96: uint160;
  amountIn: uint256;
  amountOut: uint256;
  feeAmount: uint256;
};

/** The price the next step aims for: the tick price, clamped by the swap's price limit. */
export function getSqrtPriceTarget(
  zeroForOne: boolean,
  sqrtPriceNextX96: uint160,
  sqrtPriceLimitX96: uint160,
): uint160 {
  if (zeroForOne) {
    return sqrtPriceNextX96.lt(sqrtPriceLimitX96) ? sqrtPriceLimitX96 : sqrtPriceNextX96;
  }
  return sqrtPriceNextX96.gt(sqrtPriceLimitX96) ? sqrtPriceLimitX96 : sqrtPriceNextX96;
}

/**
 * Swap as much of amountRemaining as fits between the current and the target price.
 *
 * The returned price never passes the target. For exact input swaps
 * amountIn + feeAmount never exceeds -amountRemaining; for exact output swaps
 * amountOut never exceeds amountRemaining.
 */
export function computeSwapStep(
  sqrtPriceCurrentX96: uint160,
  sqrtPriceTargetX96: uint160,
  liquidity: uint128,
  amountRemaining: int256,
  feePips: number,
): SwapStep {
  if (feePips > MAX_SWAP_FEE) {
    throw new MathError("InvalidPrice", { feePips });
  }
  if (liquidity.isZero()) {
    throw new MathError("NotEnoughLiquidity", {
      sqrtPriceCurrentX96: sqrtPriceCurrentX96.toString(),
    });
  }

  const zeroForOne = sqrtPriceCurrentX96.gte(sqrtPriceTargetX96);
  const exactIn = amountRemaining.isNegative();
  const fee = BigNumber.from(feePips);
  const feeComplement = BigNumber.from(MAX_SWAP_FEE - feePips);

  let sqrtPriceNextX96: uint160;
  let amountIn: uint256;
  let amountOut: uint256;
  let feeAmount: uint256;

  if (exactIn) {
    const amountRemainingAbs = amountRemaining.mul(-1);
    const amountRemainingLessFee = mulDiv(
      amountRemainingAbs,
      feeComplement,
      BigNumber.from(MAX_SWAP_FEE),
    );
    amountIn = zeroForOne
      ? getAmount0Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, true)
      : getAmount1Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, true);
    if (amountRemainingLessFee.gte(amountIn)) {
      // the target is reached
      sqrtPriceNextX96 = sqrtPriceTargetX96;
      feeAmount =
        feePips === MAX_SWAP_FEE
          ? amountIn
          : mulDivRoundingUp(amountIn, fee, feeComplement);
    } else {
      // the whole remaining amount is consumed
      amountIn = amountRemainingLessFee;
      sqrtPriceNextX96 = getNextSqrtPriceFromInput(
        sqrtPriceCurrentX96,
        liquidity,
        amountRemainingLessFee,
        zeroForOne,
      );
      // the residual left by rounding goes to the fee
      feeAmount = amountRemainingAbs.sub(amountIn);
    }
    amountOut = zeroForOne
      ? getAmount1Delta(sqrtPriceNextX96, sqrtPriceCurrentX96, liquidity, false)
      : getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceNextX96, liquidity, false);
  } else {
    amountOut = zeroForOne
      ? getAmount1Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, false)
      : getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, false);
    if (amountRemaining.gte(amountOut)) {
      sqrtPriceNextX96 = sqrtPriceTargetX96;
    } else {
      // cap the output at the amount requested
      amountOut = amountRemaining;
      sqrtPriceNextX96 = getNextSqrtPriceFromOutput(
        sqrtPriceCurrentX96,
        liquidity,
        amountOut,
        zeroForOne,
      );
    }
    amountIn = zeroForOne
      ? getAmount0Delta(sqrtPriceNextX96, sqrtPriceCurrentX96, liquidity, true)
      : getAmount1Delta(sqrtPriceCurrentX96, sqrtPriceNextX96, liquidity, true);
    // feePips == MAX_SWAP_FEE is rejected for exact output by the pool
    feeAmount = mulDivRoundingUp(amountIn, fee, feeComplement);
  }

  return { sqrtPriceNextX96, amountIn, amountOut, feeAmount };
}
