import { BigNumber } from "ethers";
import BalanceDelta from "./balanceDelta";
import { PoolError } from "./errors";
import PositionManager from "./positionManager";
import TickManager from "./tickManager";
import {
  MAX_SQRT_PRICE,
  MAX_SWAP_FEE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
  PIPS_DENOMINATOR,
  ZERO,
} from "./util/coreCalculations/Constants";
import { Q128 } from "./util/coreCalculations/FixedPoint128";
import { mulDiv } from "./util/coreCalculations/FullMath";
import * as Int from "./util/coreCalculations/int";
import { addDelta } from "./util/coreCalculations/LiquidityMath";
import * as LPFee from "./util/coreCalculations/LPFee";
import * as ProtocolFee from "./util/coreCalculations/ProtocolFee";
import {
  getAmount0DeltaSigned,
  getAmount1DeltaSigned,
} from "./util/coreCalculations/SqrtPriceMath";
import {
  computeSwapStep,
  getSqrtPriceTarget,
  SwapStep,
} from "./util/coreCalculations/SwapMath";
import {
  getSqrtPriceAtTick,
  getTickAtSqrtPrice,
  tickSpacingToMaxLiquidityPerTick,
} from "./util/coreCalculations/TickMath";
import * as UInt from "./util/coreCalculations/uint";
import * as word from "./util/coreCalculations/word";
import logger from "./util/logger";

// eslint-disable-next-line @typescript-eslint/no-namespace
namespace Pool {
  export type Slot0 = {
    /** sqrt(price) * 2^96; zero while the pool is uninitialized */
    sqrtPriceX96: BigNumber;
    /** Greatest tick whose sqrt price is at or below sqrtPriceX96 */
    tick: number;
    /** Packed directional protocol fees, see ProtocolFee */
    protocolFee: number;
    /** LP fee in pips */
    lpFee: number;
  };

  export type FeeGrowthGlobals = {
    feeGrowthGlobal0X128: BigNumber;
    feeGrowthGlobal1X128: BigNumber;
  };

  export type ModifyLiquidityParams = PositionManager.PositionId & {
    /** int128; positive adds liquidity, negative removes it, zero only settles fees */
    liquidityDelta: BigNumber;
  };

  export type ModifyLiquidityResult = {
    /** Principal moved by the liquidity change */
    delta: BalanceDelta;
    /** Fees credited to the position owner */
    feeDelta: BalanceDelta;
  };

  export type SwapParams = {
    /** Negative for an exact input swap, positive for an exact output swap */
    amountSpecified: BigNumber;
    zeroForOne: boolean;
    /** The swap stops when the price reaches this value */
    sqrtPriceLimitX96: BigNumber;
    /** LP fee in pips replacing the pool's own for this swap */
    lpFeeOverride?: number;
  };

  export type SwapResult = {
    delta: BalanceDelta;
    /** Amount of the input token diverted to the protocol */
    amountToProtocol: BigNumber;
    /** Total fee rate the swap was charged, in pips */
    swapFee: number;
    sqrtPriceX96: BigNumber;
    tick: number;
    liquidity: BigNumber;
  };
}

type Crossing = {
  tick: number;
  feeGrowthGlobal0X128: BigNumber;
  feeGrowthGlobal1X128: BigNumber;
};

/**
 * A single concentrated liquidity pool.
 *
 * Operations are synchronous and all or nothing: a failing call leaves every field,
 * tick and position as it was.
 */
class Pool {
  readonly tickSpacing: number;
  readonly maxLiquidityPerTick: BigNumber;

  #slot0: Pool.Slot0 = {
    sqrtPriceX96: ZERO,
    tick: 0,
    protocolFee: 0,
    lpFee: 0,
  };
  #feeGrowthGlobal0X128 = ZERO;
  #feeGrowthGlobal1X128 = ZERO;
  #liquidity = ZERO;
  readonly #ticks: TickManager;
  readonly #positions = new PositionManager();

  constructor(tickSpacing: number) {
    this.tickSpacing = tickSpacing;
    this.maxLiquidityPerTick = tickSpacingToMaxLiquidityPerTick(tickSpacing);
    this.#ticks = new TickManager(tickSpacing);
  }

  get slot0(): Pool.Slot0 {
    return { ...this.#slot0 };
  }

  /** Liquidity active at the current tick. */
  get liquidity(): BigNumber {
    return this.#liquidity;
  }

  get feeGrowthGlobals(): Pool.FeeGrowthGlobals {
    return {
      feeGrowthGlobal0X128: this.#feeGrowthGlobal0X128,
      feeGrowthGlobal1X128: this.#feeGrowthGlobal1X128,
    };
  }

  get isInitialized(): boolean {
    return !this.#slot0.sqrtPriceX96.isZero();
  }

  getTick(tick: number): TickManager.TickInfo | undefined {
    return this.#ticks.getTick(tick);
  }

  getTickBitmapWord(wordPos: number): BigNumber {
    return this.#ticks.getBitmapWord(wordPos);
  }

  /** Number of initialized ticks. */
  get initializedTickCount(): number {
    return this.#ticks.size;
  }

  getPosition(id: PositionManager.PositionId): PositionManager.PositionInfo | undefined {
    return this.#positions.get(id);
  }

  getFeeGrowthInside(tickLower: number, tickUpper: number): TickManager.FeeGrowthInside {
    return this.#ticks.getFeeGrowthInside(
      tickLower,
      tickUpper,
      this.#slot0.tick,
      this.#feeGrowthGlobal0X128,
      this.#feeGrowthGlobal1X128,
    );
  }

  #requireInitialized(): void {
    if (!this.isInitialized) {
      throw new PoolError("PoolNotInitialized");
    }
  }

  #requireValidLPFee(lpFee: number): void {
    if (!LPFee.isValid(lpFee)) {
      throw new PoolError("LPFeeTooLarge", { lpFee });
    }
  }

  /** Sets the starting price and returns the matching tick. */
  initialize(sqrtPriceX96: BigNumber, lpFee: number, protocolFee = 0): number {
    if (this.isInitialized) {
      throw new PoolError("PoolAlreadyInitialized");
    }
    if (sqrtPriceX96.lt(MIN_SQRT_PRICE) || sqrtPriceX96.gt(MAX_SQRT_PRICE)) {
      throw new PoolError("InvalidPrice", { sqrtPriceX96: sqrtPriceX96.toString() });
    }
    this.#requireValidLPFee(lpFee);
    if (!ProtocolFee.isValidProtocolFee(protocolFee)) {
      throw new PoolError("InvalidProtocolFee", { protocolFee });
    }

    const tick = getTickAtSqrtPrice(sqrtPriceX96);
    this.#slot0 = { sqrtPriceX96, tick, protocolFee, lpFee };

    logger.debug("Pool initialized", {
      contextInfo: "pool.initialize",
      data: { sqrtPriceX96: sqrtPriceX96.toString(), tick, lpFee, protocolFee },
    });
    return tick;
  }

  setProtocolFee(protocolFee: number): void {
    this.#requireInitialized();
    if (!ProtocolFee.isValidProtocolFee(protocolFee)) {
      throw new PoolError("InvalidProtocolFee", { protocolFee });
    }
    this.#slot0 = { ...this.#slot0, protocolFee };
  }

  setLPFee(lpFee: number): void {
    this.#requireInitialized();
    this.#requireValidLPFee(lpFee);
    this.#slot0 = { ...this.#slot0, lpFee };
  }

  #checkTicks(tickLower: number, tickUpper: number): void {
    if (tickLower >= tickUpper) {
      throw new PoolError("TicksMisordered", { tickLower, tickUpper });
    }
    if (tickLower < MIN_TICK) {
      throw new PoolError("TickLowerOutOfBounds", { tickLower });
    }
    if (tickUpper > MAX_TICK) {
      throw new PoolError("TickUpperOutOfBounds", { tickUpper });
    }
    for (const tick of [tickLower, tickUpper]) {
      if (tick % this.tickSpacing !== 0) {
        throw new PoolError("TickMisaligned", { tick, tickSpacing: this.tickSpacing });
      }
    }
  }

  /**
   * Adds liquidity to, removes it from, or settles the fees of one position.
   *
   * Adding liquidity yields negative principal amounts (owed by the caller), removing it
   * positive ones. Fees earned since the position's last update are always returned in
   * `feeDelta`.
   */
  modifyLiquidity(params: Pool.ModifyLiquidityParams): Pool.ModifyLiquidityResult {
    this.#requireInitialized();
    const { tickLower, tickUpper } = params;
    this.#checkTicks(tickLower, tickUpper);
    const liquidityDelta = Int.toInt128(params.liquidityDelta);

    const positionKey = PositionManager.calculatePositionKey(params);
    const tickSnapshot = this.#ticks.snapshot([tickLower, tickUpper]);
    const positionSnapshot = this.#positions.snapshot(positionKey);
    const liquidityBefore = this.#liquidity;

    try {
      const { tick, sqrtPriceX96 } = this.#slot0;

      // removal never reseeds an outside value, so it is read before a boundary is cleared
      const feeGrowthInsideBefore = liquidityDelta.isNegative()
        ? this.getFeeGrowthInside(tickLower, tickUpper)
        : undefined;

      if (!liquidityDelta.isZero()) {
        const lower = this.#ticks.updateTick(
          tickLower,
          liquidityDelta,
          this.#feeGrowthGlobal0X128,
          this.#feeGrowthGlobal1X128,
          false,
          tick,
        );
        const upper = this.#ticks.updateTick(
          tickUpper,
          liquidityDelta,
          this.#feeGrowthGlobal0X128,
          this.#feeGrowthGlobal1X128,
          true,
          tick,
        );
        if (!liquidityDelta.isNegative()) {
          if (lower.liquidityGrossAfter.gt(this.maxLiquidityPerTick)) {
            throw new PoolError("TickLiquidityOverflow", { tick: tickLower });
          }
          if (upper.liquidityGrossAfter.gt(this.maxLiquidityPerTick)) {
            throw new PoolError("TickLiquidityOverflow", { tick: tickUpper });
          }
        }
      }

      const { feeGrowthInside0X128, feeGrowthInside1X128 } =
        feeGrowthInsideBefore ?? this.getFeeGrowthInside(tickLower, tickUpper);
      const feeDelta = this.#positions.update(
        positionKey,
        liquidityDelta,
        feeGrowthInside0X128,
        feeGrowthInside1X128,
      );

      let delta = BalanceDelta.ZERO;
      if (!liquidityDelta.isZero()) {
        const sqrtPriceLower = getSqrtPriceAtTick(tickLower);
        const sqrtPriceUpper = getSqrtPriceAtTick(tickUpper);
        if (tick < tickLower) {
          // the range is above the price: only token0 is needed
          delta = new BalanceDelta(
            getAmount0DeltaSigned(sqrtPriceLower, sqrtPriceUpper, liquidityDelta),
            0,
          );
        } else if (tick < tickUpper) {
          delta = new BalanceDelta(
            getAmount0DeltaSigned(sqrtPriceX96, sqrtPriceUpper, liquidityDelta),
            getAmount1DeltaSigned(sqrtPriceLower, sqrtPriceX96, liquidityDelta),
          );
          this.#liquidity = addDelta(this.#liquidity, liquidityDelta);
        } else {
          // the range is below the price: only token1 is needed
          delta = new BalanceDelta(
            0,
            getAmount1DeltaSigned(sqrtPriceLower, sqrtPriceUpper, liquidityDelta),
          );
        }
      }

      logger.debug("Liquidity modified", {
        contextInfo: "pool.modifyLiquidity",
        data: {
          owner: params.owner,
          tickLower,
          tickUpper,
          liquidityDelta: liquidityDelta.toString(),
          delta: delta.toString(),
          feeDelta: feeDelta.toString(),
        },
      });
      return { delta, feeDelta };
    } catch (e) {
      this.#ticks.restore(tickSnapshot);
      this.#positions.restore(positionSnapshot);
      this.#liquidity = liquidityBefore;
      throw e;
    }
  }

  /**
   * Swaps against the pool until the specified amount is used up or the price limit is
   * reached. Tick crossings, the new price and the fee growth are committed only once
   * the whole swap has been computed.
   */
  swap(params: Pool.SwapParams): Pool.SwapResult {
    this.#requireInitialized();
    const slot0Start = this.#slot0;
    const { zeroForOne, sqrtPriceLimitX96 } = params;
    const amountSpecified = Int.toInt128(params.amountSpecified);
    const exactInput = amountSpecified.isNegative();

    const protocolFee = zeroForOne
      ? ProtocolFee.getZeroForOneFee(slot0Start.protocolFee)
      : ProtocolFee.getOneForZeroFee(slot0Start.protocolFee);

    let lpFee = slot0Start.lpFee;
    if (params.lpFeeOverride !== undefined) {
      this.#requireValidLPFee(params.lpFeeOverride);
      lpFee = params.lpFeeOverride;
    }
    const swapFee =
      protocolFee === 0 ? lpFee : ProtocolFee.calculateSwapFee(protocolFee, lpFee);

    let sqrtPriceX96 = slot0Start.sqrtPriceX96;
    let tick = slot0Start.tick;
    let liquidity = this.#liquidity;

    // a 100% fee leaves nothing to buy the output with
    if (swapFee >= MAX_SWAP_FEE && !exactInput && !amountSpecified.isZero()) {
      throw new PoolError("InvalidFeeForExactOut", { swapFee });
    }

    if (amountSpecified.isZero()) {
      return {
        delta: BalanceDelta.ZERO,
        amountToProtocol: ZERO,
        swapFee,
        sqrtPriceX96,
        tick,
        liquidity,
      };
    }

    if (zeroForOne) {
      if (sqrtPriceLimitX96.gte(slot0Start.sqrtPriceX96)) {
        throw new PoolError("PriceLimitAlreadyExceeded", {
          sqrtPriceCurrentX96: slot0Start.sqrtPriceX96.toString(),
          sqrtPriceLimitX96: sqrtPriceLimitX96.toString(),
        });
      }
      if (sqrtPriceLimitX96.lte(MIN_SQRT_PRICE)) {
        throw new PoolError("PriceLimitOutOfBounds", {
          sqrtPriceLimitX96: sqrtPriceLimitX96.toString(),
        });
      }
    } else {
      if (sqrtPriceLimitX96.lte(slot0Start.sqrtPriceX96)) {
        throw new PoolError("PriceLimitAlreadyExceeded", {
          sqrtPriceCurrentX96: slot0Start.sqrtPriceX96.toString(),
          sqrtPriceLimitX96: sqrtPriceLimitX96.toString(),
        });
      }
      if (sqrtPriceLimitX96.gte(MAX_SQRT_PRICE)) {
        throw new PoolError("PriceLimitOutOfBounds", {
          sqrtPriceLimitX96: sqrtPriceLimitX96.toString(),
        });
      }
    }

    let amountSpecifiedRemaining = amountSpecified;
    let amountCalculated = ZERO;
    let amountToProtocol = ZERO;
    let feeGrowthGlobalX128 = zeroForOne
      ? this.#feeGrowthGlobal0X128
      : this.#feeGrowthGlobal1X128;
    const crossings: Crossing[] = [];

    while (!(amountSpecifiedRemaining.isZero() || sqrtPriceX96.eq(sqrtPriceLimitX96))) {
      const sqrtPriceStartX96 = sqrtPriceX96;
      const next = this.#ticks.nextInitializedTickWithinOneWord(tick, zeroForOne);
      // the bitmap is not aware of the tick bounds
      const tickNext = Math.min(Math.max(next.tickNext, MIN_TICK), MAX_TICK);
      const sqrtPriceNextX96 = getSqrtPriceAtTick(tickNext);
      const sqrtPriceTargetX96 = getSqrtPriceTarget(
        zeroForOne,
        sqrtPriceNextX96,
        sqrtPriceLimitX96,
      );

      // without liquidity the price moves freely to the target
      const step: SwapStep = liquidity.isZero()
        ? {
            sqrtPriceNextX96: sqrtPriceTargetX96,
            amountIn: ZERO,
            amountOut: ZERO,
            feeAmount: ZERO,
          }
        : computeSwapStep(
            sqrtPriceX96,
            sqrtPriceTargetX96,
            liquidity,
            amountSpecifiedRemaining,
            swapFee,
          );
      sqrtPriceX96 = step.sqrtPriceNextX96;
      let feeAmount = step.feeAmount;

      if (exactInput) {
        amountSpecifiedRemaining = amountSpecifiedRemaining.add(step.amountIn.add(feeAmount));
        amountCalculated = amountCalculated.add(step.amountOut);
      } else {
        amountSpecifiedRemaining = amountSpecifiedRemaining.sub(step.amountOut);
        amountCalculated = amountCalculated.sub(step.amountIn.add(feeAmount));
      }

      if (protocolFee > 0) {
        // the protocol fee applies to the input amount, the LP fee to what remains
        const protocolFeeAmount =
          swapFee === protocolFee
            ? feeAmount
            : step.amountIn.add(feeAmount).mul(protocolFee).div(PIPS_DENOMINATOR);
        feeAmount = feeAmount.sub(protocolFeeAmount);
        amountToProtocol = amountToProtocol.add(protocolFeeAmount);
      }

      if (!liquidity.isZero()) {
        feeGrowthGlobalX128 = word.add(
          feeGrowthGlobalX128,
          mulDiv(feeAmount, Q128, liquidity),
        );
      }

      if (sqrtPriceX96.eq(sqrtPriceNextX96)) {
        // the step ended on a tick boundary
        if (next.initialized) {
          const crossing: Crossing = zeroForOne
            ? {
                tick: tickNext,
                feeGrowthGlobal0X128: feeGrowthGlobalX128,
                feeGrowthGlobal1X128: this.#feeGrowthGlobal1X128,
              }
            : {
                tick: tickNext,
                feeGrowthGlobal0X128: this.#feeGrowthGlobal0X128,
                feeGrowthGlobal1X128: feeGrowthGlobalX128,
              };
          crossings.push(crossing);
          const liquidityNet = this.#ticks.getTick(tickNext)?.liquidityNet ?? ZERO;
          // moving left, the net liquidity is removed rather than added
          liquidity = addDelta(liquidity, zeroForOne ? liquidityNet.mul(-1) : liquidityNet);
        }
        tick = zeroForOne ? tickNext - 1 : tickNext;
      } else if (!sqrtPriceX96.eq(sqrtPriceStartX96)) {
        tick = getTickAtSqrtPrice(sqrtPriceX96);
      }
    }

    const amountSpecifiedUsed = amountSpecified.sub(amountSpecifiedRemaining);
    const delta =
      zeroForOne !== exactInput
        ? new BalanceDelta(amountCalculated, amountSpecifiedUsed)
        : new BalanceDelta(amountSpecifiedUsed, amountCalculated);

    // commit
    for (const crossing of crossings) {
      this.#ticks.crossTick(
        crossing.tick,
        crossing.feeGrowthGlobal0X128,
        crossing.feeGrowthGlobal1X128,
      );
    }
    this.#slot0 = { ...slot0Start, sqrtPriceX96, tick };
    this.#liquidity = liquidity;
    if (zeroForOne) {
      this.#feeGrowthGlobal0X128 = feeGrowthGlobalX128;
    } else {
      this.#feeGrowthGlobal1X128 = feeGrowthGlobalX128;
    }

    logger.debug("Swap executed", {
      contextInfo: "pool.swap",
      data: {
        zeroForOne,
        amountSpecified: amountSpecified.toString(),
        delta: delta.toString(),
        amountToProtocol: amountToProtocol.toString(),
        ticksCrossed: crossings.length,
        tick,
      },
    });

    return { delta, amountToProtocol, swapFee, sqrtPriceX96, tick, liquidity };
  }

  /**
   * Distributes amount0 and amount1 to the liquidity active at the current tick.
   * Returns the amounts owed by the donor as a negative delta.
   */
  donate(amount0: BigNumber, amount1: BigNumber): BalanceDelta {
    this.#requireInitialized();
    const liquidity = this.#liquidity;
    if (liquidity.isZero()) {
      throw new PoolError("NoLiquidityToReceiveFees");
    }
    const delta = new BalanceDelta(
      UInt.toUint128(amount0).mul(-1),
      UInt.toUint128(amount1).mul(-1),
    );
    if (amount0.gt(0)) {
      this.#feeGrowthGlobal0X128 = word.add(
        this.#feeGrowthGlobal0X128,
        mulDiv(amount0, Q128, liquidity),
      );
    }
    if (amount1.gt(0)) {
      this.#feeGrowthGlobal1X128 = word.add(
        this.#feeGrowthGlobal1X128,
        mulDiv(amount1, Q128, liquidity),
      );
    }

    logger.debug("Donation received", {
      contextInfo: "pool.donate",
      data: { amount0: amount0.toString(), amount1: amount1.toString() },
    });
    return delta;
  }
}

export default Pool;
