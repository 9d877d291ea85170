import { BigNumber, ethers } from "ethers";
import BalanceDelta from "./balanceDelta";
import { PoolError } from "./errors";
import { ZERO } from "./util/coreCalculations/Constants";
import { Q128 } from "./util/coreCalculations/FixedPoint128";
import { mulDiv } from "./util/coreCalculations/FullMath";
import { addDelta } from "./util/coreCalculations/LiquidityMath";
import { MAX_UINT128 } from "./util/coreCalculations/uint";
import * as word from "./util/coreCalculations/word";

// eslint-disable-next-line @typescript-eslint/no-namespace
namespace PositionManager {
  export type PositionInfo = {
    liquidity: BigNumber;
    /** Fee growth inside the position's range at its last update */
    feeGrowthInside0LastX128: BigNumber;
    feeGrowthInside1LastX128: BigNumber;
    /** Fees credited to the owner over the position's lifetime, modulo 2^128 */
    tokensOwed0: BigNumber;
    tokensOwed1: BigNumber;
  };

  /** What identifies a position: its owner, its range and a salt to tell apart positions sharing both. */
  export type PositionId = {
    owner: string;
    tickLower: number;
    tickUpper: number;
    salt: string;
  };

  export type Snapshot = {
    key: string;
    info: PositionInfo | undefined;
  };
}

/**
 * Registry of liquidity positions keyed by the hash of their owner, range and salt.
 */
class PositionManager {
  #positions: Map<string, PositionManager.PositionInfo> = new Map();

  /** keccak256 of the packed `(owner, tickLower, tickUpper, salt)` encoding. */
  static calculatePositionKey(id: PositionManager.PositionId): string {
    return ethers.utils.solidityKeccak256(
      ["address", "int24", "int24", "bytes32"],
      [id.owner, id.tickLower, id.tickUpper, id.salt],
    );
  }

  get(id: PositionManager.PositionId): PositionManager.PositionInfo | undefined {
    return this.getByKey(PositionManager.calculatePositionKey(id));
  }

  getByKey(key: string): PositionManager.PositionInfo | undefined {
    const info = this.#positions.get(key);
    return info === undefined ? undefined : { ...info };
  }

  /** Number of live positions. */
  get size(): number {
    return this.#positions.size;
  }

  /**
   * Credits the fees earned since the last update, applies the liquidity delta and
   * checkpoints the fee growth. Returns the fees as a positive delta owed to the owner.
   * The position is created by its first positive delta and removed once its liquidity
   * returns to zero.
   */
  update(
    key: string,
    liquidityDelta: BigNumber,
    feeGrowthInside0X128: BigNumber,
    feeGrowthInside1X128: BigNumber,
  ): BalanceDelta {
    const info = this.#positions.get(key) ?? {
      liquidity: ZERO,
      feeGrowthInside0LastX128: ZERO,
      feeGrowthInside1LastX128: ZERO,
      tokensOwed0: ZERO,
      tokensOwed1: ZERO,
    };
    const liquidity = info.liquidity;

    if (liquidityDelta.isZero() && liquidity.isZero()) {
      // disallow pokes for 0 liquidity positions
      throw new PoolError("CannotUpdateEmptyPosition", { key });
    }
    const liquidityNext = liquidityDelta.isZero()
      ? liquidity
      : addDelta(liquidity, liquidityDelta);

    const feesOwed0 = mulDiv(
      word.sub(feeGrowthInside0X128, info.feeGrowthInside0LastX128),
      liquidity,
      Q128,
    );
    const feesOwed1 = mulDiv(
      word.sub(feeGrowthInside1X128, info.feeGrowthInside1LastX128),
      liquidity,
      Q128,
    );
    const feesDelta = new BalanceDelta(feesOwed0, feesOwed1);

    if (liquidityNext.isZero()) {
      this.#positions.delete(key);
    } else {
      this.#positions.set(key, {
        liquidity: liquidityNext,
        feeGrowthInside0LastX128: feeGrowthInside0X128,
        feeGrowthInside1LastX128: feeGrowthInside1X128,
        tokensOwed0: info.tokensOwed0.add(feesOwed0).and(MAX_UINT128),
        tokensOwed1: info.tokensOwed1.add(feesOwed1).and(MAX_UINT128),
      });
    }

    return feesDelta;
  }

  snapshot(key: string): PositionManager.Snapshot {
    return { key, info: this.getByKey(key) };
  }

  restore(snapshot: PositionManager.Snapshot): void {
    if (snapshot.info === undefined) {
      this.#positions.delete(snapshot.key);
    } else {
      this.#positions.set(snapshot.key, snapshot.info);
    }
  }
}

export default PositionManager;
