/*
 * Conversions between ticks and Q64.96 square root prices.
 *
 * The price at tick t is 1.0001^t, so sqrtPriceX96(t) = sqrt(1.0001)^t * 2^96.
 *
 * - ticks are plain numbers, prices are BigNumbers
 * - literal constants are precomputed BigNumbers called _constant
 * - getSqrtPriceAtTick multiplies one Q128 factor 2^128 / sqrt(1.0001)^(2^i) per set bit i of |tick|
 * - getTickAtSqrtPrice is the exact inverse: for every tick t in range,
 *   getTickAtSqrtPrice(getSqrtPriceAtTick(t)) == t
 */

import { BigNumber } from "ethers";
import { MathError } from "../../errors";
import {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
} from "./Constants";
import { mostSignificantBit } from "./BitMath";
import * as Int from "./int";
import { MAX_UINT128, MAX_UINT256 } from "./uint";

export { MAX_SQRT_PRICE, MAX_TICK, MIN_SQRT_PRICE, MIN_TICK };

type uint160 = BigNumber;

// Literal constants are precomputed for efficiency and readability.
const _2pow32 = BigNumber.from(2).pow(32);
const _2pow64 = BigNumber.from(2).pow(64);
const _2pow128 = BigNumber.from(2).pow(128);

// 2^128 / sqrt(1.0001)^(2^i), indexed by bit i of |tick|
const SQRT_RATIO_FACTORS: BigNumber[] = [
  "0xfffcb933bd6fad37aa2d162d1a594001",
  "0xfff97272373d413259a46990580e213a",
  "0xfff2e50f5f656932ef12357cf3c7fdcc",
  "0xffe5caca7e10e4e61c3624eaa0941cd0",
  "0xffcb9843d60f6159c9db58835c926644",
  "0xff973b41fa98c081472e6896dfb254c0",
  "0xff2ea16466c96a3843ec78b326b52861",
  "0xfe5dee046a99a2a811c461f1969c3053",
  "0xfcbe86c7900a88aedcffc83b479aa3a4",
  "0xf987a7253ac413176f2b074cf7815e54",
  "0xf3392b0822b70005940c7a398e4b70f3",
  "0xe7159475a2c29b7443b29c7fa6e889d9",
  "0xd097f3bdfd2022b8845ad8f792aa5825",
  "0xa9f746462d870fdf8a65dc1f90e061e5",
  "0x70d869a156d2a1b890bb3df62baf32f7",
  "0x31be135f97d08fd981231505542fcfa6",
  "0x9aa508b5b7a84e1c677de54f3e99bc9",
  "0x5d6af8dedb81196699c329225ee604",
  "0x2216e584f5fa1ea926041bedfe98",
  "0x48a170391f7dc42444e8fa2",
].map((x) => BigNumber.from(x));

// log_sqrt(1.0001)(2) as a Q128.128 number
const _255738958999603826347141 = BigNumber.from("255738958999603826347141");
// Error bounds of the log approximation, Q128.128
const _3402992956809132418596140100660247210 = BigNumber.from(
  "3402992956809132418596140100660247210",
);
const _291339464771989622907027621153398088495 = BigNumber.from(
  "291339464771989622907027621153398088495",
);

/** Smallest multiple of tickSpacing that is a valid tick. */
export function minUsableTick(tickSpacing: number): number {
  return Math.trunc(MIN_TICK / tickSpacing) * tickSpacing;
}

/** Largest multiple of tickSpacing that is a valid tick. */
export function maxUsableTick(tickSpacing: number): number {
  return Math.trunc(MAX_TICK / tickSpacing) * tickSpacing;
}

/**
 * The most gross liquidity a single tick may carry, so that the sum over every usable
 * tick still fits in a uint128.
 */
export function tickSpacingToMaxLiquidityPerTick(tickSpacing: number): BigNumber {
  const numTicks =
    (maxUsableTick(tickSpacing) - minUsableTick(tickSpacing)) / tickSpacing + 1;
  return MAX_UINT128.div(numTicks);
}

/**
 * sqrt(1.0001^tick) * 2^96, rounded up.
 * Throws MathError("InvalidTick") when |tick| > MAX_TICK.
 */
export function getSqrtPriceAtTick(tick: number): uint160 {
  if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
    throw new MathError("InvalidTick", { tick });
  }
  const absTick = Math.abs(tick);

  let price = (absTick & 0x1) !== 0 ? SQRT_RATIO_FACTORS[0] : _2pow128;
  for (let i = 1; i < SQRT_RATIO_FACTORS.length; i++) {
    if ((absTick & (1 << i)) !== 0) {
      price = price.mul(SQRT_RATIO_FACTORS[i]).shr(128);
    }
  }

  if (tick > 0) {
    price = MAX_UINT256.div(price);
  }

  // Q128.128 to Q64.96, rounding up so that getTickAtSqrtPrice stays consistent
  return price.shr(32).add(price.mod(_2pow32).isZero() ? 0 : 1);
}

/**
 * The greatest tick t such that getSqrtPriceAtTick(t) <= sqrtPriceX96.
 * Throws MathError("InvalidPrice") outside [MIN_SQRT_PRICE, MAX_SQRT_PRICE].
 */
export function getTickAtSqrtPrice(sqrtPriceX96: uint160): number {
  if (sqrtPriceX96.lt(MIN_SQRT_PRICE) || sqrtPriceX96.gt(MAX_SQRT_PRICE)) {
    throw new MathError("InvalidPrice", { sqrtPriceX96: sqrtPriceX96.toString() });
  }

  const ratio = sqrtPriceX96.shl(32);
  const msb = mostSignificantBit(ratio);

  // normalize to r in [2^127, 2^128)
  let r = msb >= 128 ? ratio.shr(msb - 127) : ratio.shl(127 - msb);

  // integer part of log2, as a signed Q64.64
  let log2 = BigNumber.from(msb - 128).mul(_2pow64);

  // fractional bits 63..50 by repeated squaring
  for (let bit = 63; bit >= 50; bit--) {
    r = r.mul(r).shr(127);
    const f = r.shr(128).toNumber();
    log2 = log2.add(BigNumber.from(f).shl(bit));
    r = r.shr(f);
  }

  const logSqrt10001 = log2.mul(_255738958999603826347141);

  const tickLow = Int.sar(
    logSqrt10001.sub(_3402992956809132418596140100660247210),
    128,
  ).toNumber();
  const tickHi = Int.sar(
    logSqrt10001.add(_291339464771989622907027621153398088495),
    128,
  ).toNumber();

  if (tickLow === tickHi) {
    return tickLow;
  }
  return tickHi <= MAX_TICK && getSqrtPriceAtTick(tickHi).lte(sqrtPriceX96)
    ? tickHi
    : tickLow;
}
