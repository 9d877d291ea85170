import Big from "big.js";
import { BigNumber } from "ethers";
import {
  getSqrtPriceAtTick,
  getTickAtSqrtPrice,
  maxUsableTick,
  minUsableTick,
} from "./coreCalculations/TickMath";
import { Bigish } from "./types";

/** roundDown rounds to the tick at or below the price, roundUp to the tick at or above it, and nearest to the closer of the two. Default is nearest. */
export type RoundingMode = "nearest" | "roundDown" | "roundUp";

// A private big.js constructor: sqrt prices need far more decimals than the default 20.
const BigP = Big();
BigP.DP = 80;

const Q96 = BigP(2).pow(96);

/**
 * Converts between human readable prices (units of token1 per unit of token0, after
 * decimals) and the pool's ticks and Q64.96 sqrt prices.
 */
class TickPriceHelper {
  readonly decimals0: number;
  readonly decimals1: number;

  /**
   * Ctor
   * @param decimals0 decimals of currency0
   * @param decimals1 decimals of currency1
   */
  constructor(decimals0: number, decimals1: number) {
    this.decimals0 = decimals0;
    this.decimals1 = decimals1;
  }

  /** Factor from raw pool prices to human prices. */
  #scale(): Big {
    return BigP(10).pow(this.decimals0 - this.decimals1);
  }

  /**
   * Calculates the price at a given Q64.96 sqrt price.
   * @param sqrtPriceX96 sqrt price to calculate the price for
   * @returns token1 per token0, adjusted for decimals
   */
  priceFromSqrtPrice(sqrtPriceX96: BigNumber): Big {
    const sqrtPrice = BigP(sqrtPriceX96.toString()).div(Q96);
    return sqrtPrice.times(sqrtPrice).times(this.#scale());
  }

  /**
   * Calculates the price at a given tick.
   * @param tick tick to calculate the price for
   */
  priceFromTick(tick: number): Big {
    return this.priceFromSqrtPrice(getSqrtPriceAtTick(tick));
  }

  /**
   * Calculates the Q64.96 sqrt price of a human price, rounding down.
   * @param price token1 per token0, adjusted for decimals
   */
  sqrtPriceFromPrice(price: Bigish): BigNumber {
    const raw = BigP(price).div(this.#scale());
    const sqrtPriceX96 = raw.sqrt().times(Q96).round(0, BigP.roundDown);
    return BigNumber.from(sqrtPriceX96.toFixed(0));
  }

  /**
   * Calculates the tick of a price.
   * @param price token1 per token0, adjusted for decimals
   * @param roundingMode how to pick between the ticks around the price. @see RoundingMode
   */
  tickFromPrice(price: Bigish, roundingMode: RoundingMode = "nearest"): number {
    const target = BigP(price);
    const tick = getTickAtSqrtPrice(this.sqrtPriceFromPrice(target));
    if (roundingMode === "roundDown") {
      return tick;
    }
    const lowerPrice = this.priceFromTick(tick);
    if (lowerPrice.eq(target)) {
      return tick;
    }
    if (roundingMode === "roundUp") {
      return tick + 1;
    }
    const upperPrice = this.priceFromTick(tick + 1);
    return upperPrice.minus(target).lt(target.minus(lowerPrice)) ? tick + 1 : tick;
  }

  /**
   * The multiple of tickSpacing closest to tick, kept within the usable range.
   */
  static nearestUsableTick(tick: number, tickSpacing: number): number {
    const rounded = Math.round(tick / tickSpacing) * tickSpacing;
    return Math.min(
      Math.max(rounded, minUsableTick(tickSpacing)),
      maxUsableTick(tickSpacing),
    );
  }
}

export default TickPriceHelper;
