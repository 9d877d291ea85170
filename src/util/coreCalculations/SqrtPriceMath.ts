/*
 * Token amounts between two sqrt prices for a given liquidity, and the sqrt price
 * reached after adding or removing an amount of one token.
 *
 * Rounding always favours the pool: amounts owed to the pool round up, amounts paid
 * by the pool round down, and next prices move no further than the amount allows.
 */

import { BigNumber } from "ethers";
import { MathError } from "../../errors";
import { Q96, RESOLUTION } from "./FixedPoint96";
import { mulDiv, mulDivRoundingUp } from "./FullMath";
import * as Int from "./int";
import * as UInt from "./uint";
import { divRoundingUp } from "./UnsafeMath";

type uint128 = BigNumber;
type uint160 = BigNumber;
type uint256 = BigNumber;
type int128 = BigNumber;
type int256 = BigNumber;

function sort(a: uint160, b: uint160): [uint160, uint160] {
  return a.gt(b) ? [b, a] : [a, b];
}

/**
 * Next sqrt price given a delta of token0.
 *
 * Always rounds up: when adding token0 the price moves down less than exact, when
 * removing it the price moves up further than exact. The precise formula is
 * `liquidity * sqrtPX96 / (liquidity +- amount * sqrtPX96)`; when the product
 * overflows, `liquidity / (liquidity / sqrtPX96 +- amount)` is used instead.
 */
export function getNextSqrtPriceFromAmount0RoundingUp(
  sqrtPX96: uint160,
  liquidity: uint128,
  amount: uint256,
  add: boolean,
): uint160 {
  // short circuit, the result would not be guaranteed to equal the input price
  if (amount.isZero()) {
    return sqrtPX96;
  }
  const numerator1 = liquidity.shl(RESOLUTION);
  const product = amount.mul(sqrtPX96);
  const productFits = product.lte(UInt.MAX_UINT256);

  if (add) {
    if (productFits) {
      const denominator = numerator1.add(product);
      if (denominator.lte(UInt.MAX_UINT256)) {
        return UInt.toUint160(mulDivRoundingUp(numerator1, sqrtPX96, denominator));
      }
    }
    return UInt.toUint160(
      divRoundingUp(numerator1, UInt.add(numerator1.div(sqrtPX96), amount)),
    );
  }

  // removing token0: the product must fit and stay below the numerator
  if (!productFits || numerator1.lte(product)) {
    throw new MathError("PriceOverflow", {
      sqrtPX96: sqrtPX96.toString(),
      liquidity: liquidity.toString(),
      amount: amount.toString(),
    });
  }
  const denominator = numerator1.sub(product);
  return UInt.toUint160(mulDivRoundingUp(numerator1, sqrtPX96, denominator));
}

/**
 * Next sqrt price given a delta of token1.
 *
 * Always rounds down: `sqrtPX96 +- amount / liquidity`.
 */
export function getNextSqrtPriceFromAmount1RoundingDown(
  sqrtPX96: uint160,
  liquidity: uint128,
  amount: uint256,
  add: boolean,
): uint160 {
  if (liquidity.isZero()) {
    throw new MathError("InvalidLiquidity", { liquidity: liquidity.toString() });
  }
  if (add) {
    const quotient = amount.lte(UInt.MAX_UINT160)
      ? amount.shl(RESOLUTION).div(liquidity)
      : mulDiv(amount, Q96, liquidity);
    return UInt.toUint160(sqrtPX96.add(quotient));
  }

  const quotient = amount.lte(UInt.MAX_UINT160)
    ? divRoundingUp(amount.shl(RESOLUTION), liquidity)
    : mulDivRoundingUp(amount, Q96, liquidity);
  if (sqrtPX96.lte(quotient)) {
    throw new MathError("NotEnoughLiquidity", {
      sqrtPX96: sqrtPX96.toString(),
      liquidity: liquidity.toString(),
      amount: amount.toString(),
    });
  }
  return sqrtPX96.sub(quotient);
}

function requirePriceAndLiquidity(sqrtPX96: uint160, liquidity: uint128): void {
  if (sqrtPX96.lte(0)) {
    throw new MathError("InvalidPrice", { sqrtPX96: sqrtPX96.toString() });
  }
  if (liquidity.lte(0)) {
    throw new MathError("InvalidLiquidity", { liquidity: liquidity.toString() });
  }
}

/** Price after swapping amountIn of the input token, rounded so as not to pass the target. */
export function getNextSqrtPriceFromInput(
  sqrtPX96: uint160,
  liquidity: uint128,
  amountIn: uint256,
  zeroForOne: boolean,
): uint160 {
  requirePriceAndLiquidity(sqrtPX96, liquidity);
  return zeroForOne
    ? getNextSqrtPriceFromAmount0RoundingUp(sqrtPX96, liquidity, amountIn, true)
    : getNextSqrtPriceFromAmount1RoundingDown(sqrtPX96, liquidity, amountIn, true);
}

/** Price after swapping out amountOut of the output token, rounded so as to pass the target. */
export function getNextSqrtPriceFromOutput(
  sqrtPX96: uint160,
  liquidity: uint128,
  amountOut: uint256,
  zeroForOne: boolean,
): uint160 {
  requirePriceAndLiquidity(sqrtPX96, liquidity);
  return zeroForOne
    ? getNextSqrtPriceFromAmount1RoundingDown(sqrtPX96, liquidity, amountOut, false)
    : getNextSqrtPriceFromAmount0RoundingUp(sqrtPX96, liquidity, amountOut, false);
}

/**
 * Amount of token0 between two prices: `liquidity / sqrt(lower) - liquidity / sqrt(upper)`.
 * Throws MathError("InvalidPrice") when the lower price is zero.
 */
export function getAmount0Delta(
  sqrtPriceAX96: uint160,
  sqrtPriceBX96: uint160,
  liquidity: uint128,
  roundUp: boolean,
): uint256 {
  const [lower, upper] = sort(sqrtPriceAX96, sqrtPriceBX96);
  if (lower.isZero()) {
    throw new MathError("InvalidPrice", { sqrtPriceX96: lower.toString() });
  }
  const numerator1 = liquidity.shl(RESOLUTION);
  const numerator2 = upper.sub(lower);

  return roundUp
    ? divRoundingUp(mulDivRoundingUp(numerator1, numerator2, upper), lower)
    : mulDiv(numerator1, numerator2, upper).div(lower);
}

/** Amount of token1 between two prices: `liquidity * (sqrt(upper) - sqrt(lower))`. */
export function getAmount1Delta(
  sqrtPriceAX96: uint160,
  sqrtPriceBX96: uint160,
  liquidity: uint128,
  roundUp: boolean,
): uint256 {
  const [lower, upper] = sort(sqrtPriceAX96, sqrtPriceBX96);
  const numerator = upper.sub(lower);
  return roundUp
    ? mulDivRoundingUp(liquidity, numerator, Q96)
    : mulDiv(liquidity, numerator, Q96);
}

/**
 * Signed token0 delta for a signed liquidity change. Adding liquidity yields a
 * negative amount (owed by the caller, rounded up); removing it a positive one.
 */
export function getAmount0DeltaSigned(
  sqrtPriceAX96: uint160,
  sqrtPriceBX96: uint160,
  liquidity: int128,
): int256 {
  return liquidity.isNegative()
    ? Int.toInt256(getAmount0Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity.mul(-1), false))
    : Int.toInt256(getAmount0Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity, true)).mul(-1);
}

/** Signed token1 delta for a signed liquidity change; same sign convention as token0. */
export function getAmount1DeltaSigned(
  sqrtPriceAX96: uint160,
  sqrtPriceBX96: uint160,
  liquidity: int128,
): int256 {
  return liquidity.isNegative()
    ? Int.toInt256(getAmount1Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity.mul(-1), false))
    : Int.toInt256(getAmount1Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity, true)).mul(-1);
}
