/*
 * Shared constants of the fixed-point engine.
 *
 * - 160/128/96-bit values are BigNumbers
 * - ticks and fees in pips are plain numbers; they always fit in 32 bits
 */

import { BigNumber } from "ethers";

export const ONE = BigNumber.from(1);
export const ZERO = BigNumber.from(0);

/* Q64.96 fixed-point resolution */
export const RESOLUTION = 96;
export const Q96 = BigNumber.from("0x1000000000000000000000000");
/* Fee growth accumulators are Q128.128 */
export const Q128 = BigNumber.from("0x100000000000000000000000000000000");

/* Price of tick t is 1.0001^t; these bounds keep sqrt(price) * 2^96 inside 160 bits */
export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/* getSqrtPriceAtTick(MIN_TICK) */
export const MIN_SQRT_PRICE = BigNumber.from("4295128739");
/* getSqrtPriceAtTick(MAX_TICK) */
export const MAX_SQRT_PRICE = BigNumber.from(
  "1461446703485210103287273052203988822378723970342",
);

export const MIN_TICK_SPACING = 1;
export const MAX_TICK_SPACING = 16384;

/* Fees are expressed in hundredths of a bip: 1_000_000 is 100% */
export const MAX_SWAP_FEE = 1_000_000;
export const PIPS_DENOMINATOR = 1_000_000;
