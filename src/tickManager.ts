import { BigNumber } from "ethers";
import { PoolError } from "./errors";
import { ONE, ZERO } from "./util/coreCalculations/Constants";
import {
  leastSignificantBit,
  mostSignificantBit,
} from "./util/coreCalculations/BitMath";
import * as Int from "./util/coreCalculations/int";
import { MAX_UINT128 } from "./util/coreCalculations/uint";
import * as word from "./util/coreCalculations/word";

// eslint-disable-next-line @typescript-eslint/no-namespace
namespace TickManager {
  /** State kept for every initialized tick. */
  export type TickInfo = {
    /** Total liquidity of the positions that use this tick as a boundary */
    liquidityGross: BigNumber;
    /** Liquidity added when the price crosses this tick left to right (int128) */
    liquidityNet: BigNumber;
    /** Fee growth per unit of liquidity on the other side of this tick, relative to the current tick */
    feeGrowthOutside0X128: BigNumber;
    feeGrowthOutside1X128: BigNumber;
  };

  export type UpdateResult = {
    /** Whether the tick went from uninitialized to initialized or the reverse */
    flipped: boolean;
    liquidityGrossAfter: BigNumber;
  };

  export type NextTick = {
    tickNext: number;
    initialized: boolean;
  };

  export type FeeGrowthInside = {
    feeGrowthInside0X128: BigNumber;
    feeGrowthInside1X128: BigNumber;
  };

  /** Records and bitmap words as they were before an operation touched them. */
  export type Snapshot = {
    ticks: Map<number, TickInfo | undefined>;
    words: Map<number, BigNumber | undefined>;
  };
}

/**
 * Registry of initialized ticks together with the bitmap that indexes them.
 *
 * Tick t is initialized iff it has a record, iff bit `(t / tickSpacing) & 255` of bitmap
 * word `(t / tickSpacing) >> 8` is set. Both structures only change together.
 */
class TickManager {
  readonly tickSpacing: number;

  #ticks: Map<number, TickManager.TickInfo> = new Map();
  #bitmap: Map<number, BigNumber> = new Map();

  constructor(tickSpacing: number) {
    this.tickSpacing = tickSpacing;
  }

  /** Copy of the tick's record, or undefined if the tick is not initialized. */
  getTick(tick: number): TickManager.TickInfo | undefined {
    const info = this.#ticks.get(tick);
    return info === undefined ? undefined : { ...info };
  }

  isInitialized(tick: number): boolean {
    return this.#ticks.has(tick);
  }

  /** Number of initialized ticks. */
  get size(): number {
    return this.#ticks.size;
  }

  getBitmapWord(wordPos: number): BigNumber {
    return this.#bitmap.get(wordPos) ?? ZERO;
  }

  /** Word and bit index of a compressed tick. */
  static position(compressed: number): { wordPos: number; bitPos: number } {
    return { wordPos: compressed >> 8, bitPos: compressed & 0xff };
  }

  /** tick / tickSpacing, rounded toward negative infinity. */
  compress(tick: number): number {
    return Math.floor(tick / this.tickSpacing);
  }

  #requireAligned(tick: number): void {
    if (tick % this.tickSpacing !== 0) {
      throw new PoolError("TickMisaligned", {
        tick,
        tickSpacing: this.tickSpacing,
      });
    }
  }

  #flipTick(tick: number): void {
    const { wordPos, bitPos } = TickManager.position(tick / this.tickSpacing);
    const flipped = word.xor(this.getBitmapWord(wordPos), ONE.shl(bitPos));
    if (flipped.isZero()) {
      this.#bitmap.delete(wordPos);
    } else {
      this.#bitmap.set(wordPos, flipped);
    }
  }

  /**
   * Applies a liquidity delta to a position boundary.
   *
   * A tick that becomes initialized at or below the current tick takes the global fee
   * growth as its outside value; all growth so far is assumed to have happened below it.
   * A tick whose gross liquidity returns to zero is removed.
   */
  updateTick(
    tick: number,
    liquidityDelta: BigNumber,
    feeGrowthGlobal0X128: BigNumber,
    feeGrowthGlobal1X128: BigNumber,
    upper: boolean,
    tickCurrent: number,
  ): TickManager.UpdateResult {
    this.#requireAligned(tick);

    const info = this.#ticks.get(tick) ?? {
      liquidityGross: ZERO,
      liquidityNet: ZERO,
      feeGrowthOutside0X128: ZERO,
      feeGrowthOutside1X128: ZERO,
    };

    const liquidityGrossBefore = info.liquidityGross;
    const liquidityGrossAfter = liquidityGrossBefore.add(liquidityDelta);
    if (liquidityGrossAfter.isNegative() || liquidityGrossAfter.gt(MAX_UINT128)) {
      throw new PoolError("TickLiquidityOverflow", {
        tick,
        liquidityGross: liquidityGrossBefore.toString(),
        liquidityDelta: liquidityDelta.toString(),
      });
    }

    // upper boundaries remove liquidity when crossed left to right
    const liquidityNet = Int.toInt128(
      upper ? info.liquidityNet.sub(liquidityDelta) : info.liquidityNet.add(liquidityDelta),
    );

    const flipped = liquidityGrossAfter.isZero() !== liquidityGrossBefore.isZero();

    let { feeGrowthOutside0X128, feeGrowthOutside1X128 } = info;
    if (liquidityGrossBefore.isZero() && tick <= tickCurrent) {
      feeGrowthOutside0X128 = feeGrowthGlobal0X128;
      feeGrowthOutside1X128 = feeGrowthGlobal1X128;
    }

    if (flipped) {
      this.#flipTick(tick);
    }
    if (liquidityGrossAfter.isZero()) {
      this.#ticks.delete(tick);
    } else {
      this.#ticks.set(tick, {
        liquidityGross: liquidityGrossAfter,
        liquidityNet,
        feeGrowthOutside0X128,
        feeGrowthOutside1X128,
      });
    }

    return { flipped, liquidityGrossAfter };
  }

  /**
   * The next initialized tick in the same bitmap word as `tick`, searching to the left
   * (at or below `tick`) when `lte` holds and strictly to the right otherwise. When the
   * word holds no initialized tick in that direction, the word's boundary tick is
   * returned with `initialized = false`.
   */
  nextInitializedTickWithinOneWord(tick: number, lte: boolean): TickManager.NextTick {
    const compressed = this.compress(tick);

    if (lte) {
      const { wordPos, bitPos } = TickManager.position(compressed);
      // all the 1s at or to the right of the current bitPos
      const mask = ONE.shl(bitPos + 1).sub(ONE);
      const masked = this.getBitmapWord(wordPos).and(mask);

      const initialized = !masked.isZero();
      const tickNext = initialized
        ? (compressed - (bitPos - mostSignificantBit(masked))) * this.tickSpacing
        : (compressed - bitPos) * this.tickSpacing;
      return { tickNext, initialized };
    }

    // start from the word of the next tick, since the current tick state doesn't matter
    const { wordPos, bitPos } = TickManager.position(compressed + 1);
    // all the 1s at or to the left of the bitPos
    const mask = word.not(ONE.shl(bitPos).sub(ONE));
    const masked = this.getBitmapWord(wordPos).and(mask);

    const initialized = !masked.isZero();
    const tickNext = initialized
      ? (compressed + 1 + (leastSignificantBit(masked) - bitPos)) * this.tickSpacing
      : (compressed + 1 + (255 - bitPos)) * this.tickSpacing;
    return { tickNext, initialized };
  }

  /**
   * Transitions to `tick` during a swap: the outside fee growth flips sides.
   * Returns the liquidity to add when crossing left to right.
   */
  crossTick(
    tick: number,
    feeGrowthGlobal0X128: BigNumber,
    feeGrowthGlobal1X128: BigNumber,
  ): BigNumber {
    const info = this.#ticks.get(tick);
    if (info === undefined) {
      return ZERO;
    }
    this.#ticks.set(tick, {
      ...info,
      feeGrowthOutside0X128: word.sub(feeGrowthGlobal0X128, info.feeGrowthOutside0X128),
      feeGrowthOutside1X128: word.sub(feeGrowthGlobal1X128, info.feeGrowthOutside1X128),
    });
    return info.liquidityNet;
  }

  /**
   * Fee growth per unit of liquidity inside [tickLower, tickUpper), modulo 2^256.
   * Uninitialized boundaries count as zero outside growth.
   */
  getFeeGrowthInside(
    tickLower: number,
    tickUpper: number,
    tickCurrent: number,
    feeGrowthGlobal0X128: BigNumber,
    feeGrowthGlobal1X128: BigNumber,
  ): TickManager.FeeGrowthInside {
    const lower = this.#ticks.get(tickLower);
    const upper = this.#ticks.get(tickUpper);
    const lower0 = lower?.feeGrowthOutside0X128 ?? ZERO;
    const lower1 = lower?.feeGrowthOutside1X128 ?? ZERO;
    const upper0 = upper?.feeGrowthOutside0X128 ?? ZERO;
    const upper1 = upper?.feeGrowthOutside1X128 ?? ZERO;

    let feeGrowthInside0X128: BigNumber;
    let feeGrowthInside1X128: BigNumber;
    if (tickCurrent < tickLower) {
      feeGrowthInside0X128 = word.sub(lower0, upper0);
      feeGrowthInside1X128 = word.sub(lower1, upper1);
    } else if (tickCurrent >= tickUpper) {
      feeGrowthInside0X128 = word.sub(upper0, lower0);
      feeGrowthInside1X128 = word.sub(upper1, lower1);
    } else {
      feeGrowthInside0X128 = word.sub(word.sub(feeGrowthGlobal0X128, lower0), upper0);
      feeGrowthInside1X128 = word.sub(word.sub(feeGrowthGlobal1X128, lower1), upper1);
    }
    return { feeGrowthInside0X128, feeGrowthInside1X128 };
  }

  snapshot(ticks: number[]): TickManager.Snapshot {
    const snapshot: TickManager.Snapshot = { ticks: new Map(), words: new Map() };
    for (const tick of ticks) {
      snapshot.ticks.set(tick, this.getTick(tick));
      const { wordPos } = TickManager.position(this.compress(tick));
      snapshot.words.set(wordPos, this.#bitmap.get(wordPos));
    }
    return snapshot;
  }

  restore(snapshot: TickManager.Snapshot): void {
    snapshot.ticks.forEach((info, tick) => {
      if (info === undefined) {
        this.#ticks.delete(tick);
      } else {
        this.#ticks.set(tick, info);
      }
    });
    snapshot.words.forEach((value, wordPos) => {
      if (value === undefined) {
        this.#bitmap.delete(wordPos);
      } else {
        this.#bitmap.set(wordPos, value);
      }
    });
  }
}

export default TickManager;
