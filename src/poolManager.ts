import { BigNumber, BigNumberish, ethers } from "ethers";
import BalanceDelta from "./balanceDelta";
import configuration from "./configuration";
import { PoolError, PoolManagerError } from "./errors";
import { BaseHooks, HookPermissions } from "./hooks/baseHooks";
import NoHooks from "./hooks/noHooks";
import Pool from "./pool";
import { PoolKey, hasHooks, toId, validatePoolKey } from "./poolKey";
import PositionManager from "./positionManager";
import {
  DonateParamsInput,
  ModifyLiquidityParamsInput,
  PoolKeyInput,
  SwapParamsInput,
  donateParamsSchema,
  evmAddress,
  hexData,
  liberalNonNegativeBigNumber,
  modifyLiquidityParamsSchema,
  poolKeySchema,
  swapParamsSchema,
} from "./schemas";
import type TickManager from "./tickManager";
import { ZERO } from "./util/coreCalculations/Constants";
import * as LPFee from "./util/coreCalculations/LPFee";
import logger from "./util/logger";

// eslint-disable-next-line @typescript-eslint/no-namespace
namespace PoolManager {
  export type PoolState = {
    key: PoolKey;
    pool: Pool;
    hooks: BaseHooks;
  };

  export type InitializeOptions = {
    /** The extension named by the key's hooks address; omitted for keys without one */
    hooks?: BaseHooks;
    sender?: string;
    hookData?: string;
  };

  export type CallOptions = {
    sender?: string;
    hookData?: string;
  };

  export type ModifyLiquidityResult = {
    /** Principal and fees together, from the caller's point of view */
    callerDelta: BalanceDelta;
    feesAccrued: BalanceDelta;
  };
}

/**
 * Owns every pool, keyed by the hash of its PoolKey, and runs each pool operation
 * between the callbacks its extension enables.
 */
class PoolManager {
  #pools: Map<string, PoolManager.PoolState> = new Map();
  // shared by every pool whose key names no extension
  readonly #noHooks = new NoHooks();
  #protocolFeesAccrued: Map<string, BigNumber> = new Map();

  #parseKey(key: PoolKeyInput): PoolKey {
    return poolKeySchema.parse(key);
  }

  #hookData(hookData: string | undefined): string {
    return hexData.parse(hookData ?? configuration.pool.getDefaultHookData());
  }

  #sender(sender: string | undefined): string {
    return evmAddress.parse(sender ?? ethers.constants.AddressZero);
  }

  #resolveHooks(key: PoolKey, hooks: BaseHooks | undefined): BaseHooks {
    if (!hasHooks(key)) {
      if (hooks !== undefined && BigNumber.from(hooks.address).gt(0)) {
        throw new PoolManagerError("HookAddressMismatch", {
          expected: key.hooks,
          actual: hooks.address,
        });
      }
      return this.#noHooks;
    }
    if (hooks === undefined) {
      throw new PoolManagerError("InvalidHookConfiguration", { hooks: key.hooks });
    }
    if (hooks.address.toLowerCase() !== key.hooks.toLowerCase()) {
      throw new PoolManagerError("HookAddressMismatch", {
        expected: key.hooks,
        actual: hooks.address,
      });
    }
    const permissions = hooks.getHookPermissions();
    if (
      (permissions.beforeSwapReturnDelta && !permissions.beforeSwap) ||
      (permissions.afterSwapReturnDelta && !permissions.afterSwap)
    ) {
      throw new PoolManagerError("InvalidHookConfiguration", {
        hooks: key.hooks,
        permissions,
      });
    }
    return hooks;
  }

  #getState(key: PoolKeyInput): PoolManager.PoolState {
    const id = toId(this.#parseKey(key));
    const state = this.#pools.get(id);
    if (state === undefined) {
      throw new PoolManagerError("PoolNotFound", { id });
    }
    return state;
  }

  #permissions(state: PoolManager.PoolState): HookPermissions {
    return state.hooks.getHookPermissions();
  }

  /** Whether a pool exists for the key. */
  has(key: PoolKeyInput): boolean {
    return this.#pools.has(toId(this.#parseKey(key)));
  }

  getPool(key: PoolKeyInput): Pool {
    return this.#getState(key).pool;
  }

  getSlot0(key: PoolKeyInput): Pool.Slot0 {
    return this.#getState(key).pool.slot0;
  }

  getLiquidity(key: PoolKeyInput): BigNumber {
    return this.#getState(key).pool.liquidity;
  }

  getFeeGrowthGlobals(key: PoolKeyInput): Pool.FeeGrowthGlobals {
    return this.#getState(key).pool.feeGrowthGlobals;
  }

  getTickInfo(key: PoolKeyInput, tick: number): TickManager.TickInfo | undefined {
    return this.#getState(key).pool.getTick(tick);
  }

  getPositionInfo(
    key: PoolKeyInput,
    id: PositionManager.PositionId,
  ): PositionManager.PositionInfo | undefined {
    return this.#getState(key).pool.getPosition(id);
  }

  /**
   * Creates and initializes the pool for `key` at `sqrtPriceX96`.
   * @returns the pool's initial tick
   */
  initialize(
    key: PoolKeyInput,
    sqrtPriceX96: BigNumberish,
    options: PoolManager.InitializeOptions = {},
  ): number {
    const poolKey = this.#parseKey(key);
    validatePoolKey(poolKey);
    const hooks = this.#resolveHooks(poolKey, options.hooks);
    const price = liberalNonNegativeBigNumber.parse(BigNumber.from(sqrtPriceX96));
    const sender = this.#sender(options.sender);
    const hookData = this.#hookData(options.hookData);
    const permissions = hooks.getHookPermissions();

    const id = toId(poolKey);
    if (this.#pools.has(id)) {
      throw new PoolError("PoolAlreadyInitialized", { id });
    }
    const pool = new Pool(poolKey.tickSpacing);

    if (permissions.beforeInitialize) {
      hooks.beforeInitialize(sender, poolKey, price, hookData);
    }

    // validatePoolKey has rejected keys without an initial fee
    const lpFee = LPFee.getInitialLPFee(poolKey.fee) ?? 0;
    const tick = pool.initialize(
      price,
      lpFee,
      configuration.pool.getDefaultProtocolFee(),
    );
    this.#pools.set(id, { key: poolKey, pool, hooks });

    try {
      if (permissions.afterInitialize) {
        hooks.afterInitialize(sender, poolKey, price, tick, hookData);
      }
    } catch (e) {
      this.#pools.delete(id);
      throw e;
    }

    logger.debug("Pool created", {
      contextInfo: "poolManager.initialize",
      data: { id, key: poolKey, tick },
    });
    return tick;
  }

  /**
   * Adds or removes liquidity of the position `(params.owner, tickLower, tickUpper, salt)`.
   * The caller's delta includes the fees the position accrued.
   */
  modifyLiquidity(
    key: PoolKeyInput,
    params: ModifyLiquidityParamsInput,
    hookData?: string,
  ): PoolManager.ModifyLiquidityResult {
    const state = this.#getState(key);
    const parsed = modifyLiquidityParamsSchema.parse(params);
    const data = this.#hookData(hookData);
    const permissions = this.#permissions(state);
    const adding = parsed.liquidityDelta.gt(0);

    if (adding && permissions.beforeAddLiquidity) {
      state.hooks.beforeAddLiquidity(parsed.owner, state.key, parsed, data);
    } else if (!adding && permissions.beforeRemoveLiquidity) {
      state.hooks.beforeRemoveLiquidity(parsed.owner, state.key, parsed, data);
    }

    const { delta, feeDelta } = state.pool.modifyLiquidity(parsed);
    const callerDelta = delta.add(feeDelta);

    if (adding && permissions.afterAddLiquidity) {
      state.hooks.afterAddLiquidity(parsed.owner, state.key, parsed, callerDelta, feeDelta, data);
    } else if (!adding && permissions.afterRemoveLiquidity) {
      state.hooks.afterRemoveLiquidity(parsed.owner, state.key, parsed, callerDelta, feeDelta, data);
    }

    return { callerDelta, feesAccrued: feeDelta };
  }

  /**
   * Swaps against the pool for `key`. Amounts taken by the extension are removed from
   * the returned caller delta.
   */
  swap(
    key: PoolKeyInput,
    params: SwapParamsInput,
    options: PoolManager.CallOptions = {},
  ): BalanceDelta {
    const state = this.#getState(key);
    const parsed = swapParamsSchema.parse(params);
    if (parsed.amountSpecified.isZero()) {
      throw new PoolManagerError("SwapAmountCannotBeZero");
    }
    const sender = this.#sender(options.sender);
    const data = this.#hookData(options.hookData);
    const permissions = this.#permissions(state);
    const exactInput = parsed.amountSpecified.isNegative();

    let amountToSwap = parsed.amountSpecified;
    let lpFeeOverride: number | undefined;
    let hookDeltaSpecified = ZERO;

    if (permissions.beforeSwap) {
      const result = state.hooks.beforeSwap(sender, state.key, parsed, data);
      if (LPFee.isDynamicFee(state.key.fee) && result.lpFeeOverride !== undefined) {
        lpFeeOverride = result.lpFeeOverride;
      }
      if (permissions.beforeSwapReturnDelta && result.specifiedDelta !== undefined) {
        hookDeltaSpecified = result.specifiedDelta;
        amountToSwap = amountToSwap.add(hookDeltaSpecified);
        // the extension may not turn the swap around
        if (exactInput ? amountToSwap.gt(0) : amountToSwap.lt(0)) {
          throw new PoolManagerError("HookDeltaExceedsSwapAmount", {
            amountSpecified: parsed.amountSpecified.toString(),
            specifiedDelta: hookDeltaSpecified.toString(),
          });
        }
      }
    }

    const result = state.pool.swap({
      amountSpecified: amountToSwap,
      zeroForOne: parsed.zeroForOne,
      sqrtPriceLimitX96: parsed.sqrtPriceLimitX96,
      lpFeeOverride,
    });

    if (result.amountToProtocol.gt(0)) {
      const currency = parsed.zeroForOne ? state.key.currency0 : state.key.currency1;
      this.#accrueProtocolFees(currency, result.amountToProtocol);
    }

    let swapDelta = result.delta;
    let hookDeltaUnspecified = ZERO;
    if (permissions.afterSwap) {
      const after = state.hooks.afterSwap(sender, state.key, parsed, swapDelta, data);
      if (permissions.afterSwapReturnDelta && after.unspecifiedDelta !== undefined) {
        hookDeltaUnspecified = after.unspecifiedDelta;
      }
    }

    if (!hookDeltaSpecified.isZero() || !hookDeltaUnspecified.isZero()) {
      // the specified currency is currency0 for exact input zeroForOne and exact output oneForZero
      const hookDelta =
        exactInput === parsed.zeroForOne
          ? new BalanceDelta(hookDeltaSpecified, hookDeltaUnspecified)
          : new BalanceDelta(hookDeltaUnspecified, hookDeltaSpecified);
      swapDelta = swapDelta.sub(hookDelta);
      logger.debug("Extension took part of the swap", {
        contextInfo: "poolManager.swap",
        data: { hooks: state.key.hooks, hookDelta: hookDelta.toString() },
      });
    }

    return swapDelta;
  }

  /** Donates to the liquidity in range of the pool for `key`. */
  donate(
    key: PoolKeyInput,
    amounts: DonateParamsInput,
    options: PoolManager.CallOptions = {},
  ): BalanceDelta {
    const state = this.#getState(key);
    const { amount0, amount1 } = donateParamsSchema.parse(amounts);
    const sender = this.#sender(options.sender);
    const data = this.#hookData(options.hookData);
    const permissions = this.#permissions(state);

    if (permissions.beforeDonate) {
      state.hooks.beforeDonate(sender, state.key, amount0, amount1, data);
    }
    const delta = state.pool.donate(amount0, amount1);
    if (permissions.afterDonate) {
      state.hooks.afterDonate(sender, state.key, amount0, amount1, data);
    }
    return delta;
  }

  /**
   * Sets the LP fee of a dynamic fee pool. Only the pool's extension may do so.
   */
  updateDynamicLPFee(key: PoolKeyInput, newFee: number, sender: string): void {
    const state = this.#getState(key);
    if (
      !LPFee.isDynamicFee(state.key.fee) ||
      sender.toLowerCase() !== state.key.hooks.toLowerCase()
    ) {
      throw new PoolManagerError("UnauthorizedDynamicLPFeeUpdate", {
        fee: state.key.fee,
        sender,
      });
    }
    state.pool.setLPFee(newFee);
  }

  /** Sets the packed directional protocol fee of a pool. */
  setProtocolFee(key: PoolKeyInput, protocolFee: number): void {
    this.#getState(key).pool.setProtocolFee(protocolFee);
  }

  #accrueProtocolFees(currency: string, amount: BigNumber): void {
    const id = currency.toLowerCase();
    this.#protocolFeesAccrued.set(id, this.protocolFeesAccrued(currency).add(amount));
  }

  protocolFeesAccrued(currency: string): BigNumber {
    return this.#protocolFeesAccrued.get(currency.toLowerCase()) ?? ZERO;
  }

  /**
   * Withdraws accrued protocol fees of one currency; an amount of 0 withdraws all of them.
   * @returns the amount withdrawn
   */
  collectProtocolFees(currency: string, amount: BigNumberish = 0): BigNumber {
    const accrued = this.protocolFeesAccrued(currency);
    const requested = liberalNonNegativeBigNumber.parse(BigNumber.from(amount));
    const collected = requested.isZero() ? accrued : requested;
    if (collected.gt(accrued)) {
      throw new PoolManagerError("InsufficientProtocolFees", {
        currency,
        requested: collected.toString(),
        accrued: accrued.toString(),
      });
    }
    this.#protocolFeesAccrued.set(currency.toLowerCase(), accrued.sub(collected));
    return collected;
  }
}

export default PoolManager;
