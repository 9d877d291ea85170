import { BigNumber, ethers } from "ethers";
import configuration from "./configuration";
import { PoolManagerError } from "./errors";
import {
  MAX_TICK_SPACING,
  MIN_TICK_SPACING,
} from "./util/coreCalculations/Constants";
import * as LPFee from "./util/coreCalculations/LPFee";

/** Identity of a pool. */
export type PoolKey = {
  /** The currency with the lower address */
  currency0: string;
  currency1: string;
  /** Static LP fee in pips, or LPFee.DYNAMIC_FEE_FLAG */
  fee: number;
  tickSpacing: number;
  /** Address of the pool's extension; the zero address for none */
  hooks: string;
};

/** keccak256 of the ABI encoded key. */
export function toId(key: PoolKey): string {
  return ethers.utils.keccak256(
    ethers.utils.defaultAbiCoder.encode(
      ["address", "address", "uint24", "int24", "address"],
      [key.currency0, key.currency1, key.fee, key.tickSpacing, key.hooks],
    ),
  );
}

export function hasHooks(key: PoolKey): boolean {
  return BigNumber.from(key.hooks).gt(0);
}

export function sortCurrencies(tokenA: string, tokenB: string): [string, string] {
  return BigNumber.from(tokenA).lt(tokenB) ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Checks the key's invariants: ordered distinct currencies, a tick spacing in
 * [MIN_TICK_SPACING, MAX_TICK_SPACING], a valid or dynamic fee, and a hook address for
 * dynamic fee pools.
 */
export function validatePoolKey(key: PoolKey): void {
  if (key.tickSpacing > MAX_TICK_SPACING) {
    throw new PoolManagerError("TickSpacingTooLarge", { tickSpacing: key.tickSpacing });
  }
  if (key.tickSpacing < MIN_TICK_SPACING) {
    throw new PoolManagerError("TickSpacingTooSmall", { tickSpacing: key.tickSpacing });
  }
  if (BigNumber.from(key.currency0).gte(key.currency1)) {
    throw new PoolManagerError("CurrenciesOutOfOrderOrEqual", {
      currency0: key.currency0,
      currency1: key.currency1,
    });
  }
  if (LPFee.getInitialLPFee(key.fee) === undefined) {
    throw new PoolManagerError("LPFeeTooLarge", { fee: key.fee });
  }
  if (LPFee.isDynamicFee(key.fee) && !hasHooks(key)) {
    // nothing could ever set the fee of a dynamic pool without an extension
    throw new PoolManagerError("InvalidHookConfiguration", { fee: key.fee });
  }
}

/**
 * Builds a key for two tokens in any order, taking the fee and tick spacing from a
 * configured fee tier.
 */
export function createPoolKey(
  tokenA: string,
  tokenB: string,
  feeTier: string,
  hooks: string = ethers.constants.AddressZero,
): PoolKey {
  const tier = configuration.pool.getFeeTier(feeTier);
  const [currency0, currency1] = sortCurrencies(tokenA, tokenB);
  return {
    currency0,
    currency1,
    fee: tier.fee,
    tickSpacing: tier.tickSpacing,
    hooks,
  };
}
