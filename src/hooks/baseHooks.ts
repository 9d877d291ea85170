import { BigNumber } from "ethers";
import BalanceDelta from "../balanceDelta";
import type Pool from "../pool";
import type { PoolKey } from "../poolKey";
import type { Prettify } from "../util/types";

/**
 * @desc The capabilities an extension enables. The pool manager only calls the
 * callbacks whose flag is set.
 */
export type HookPermissions = {
  beforeInitialize: boolean;
  afterInitialize: boolean;
  beforeAddLiquidity: boolean;
  afterAddLiquidity: boolean;
  beforeRemoveLiquidity: boolean;
  afterRemoveLiquidity: boolean;
  beforeSwap: boolean;
  afterSwap: boolean;
  beforeDonate: boolean;
  afterDonate: boolean;
  /** beforeSwap may take part of the specified amount */
  beforeSwapReturnDelta: boolean;
  /** afterSwap may take part of the unspecified amount */
  afterSwapReturnDelta: boolean;
};

export const NO_PERMISSIONS: HookPermissions = {
  beforeInitialize: false,
  afterInitialize: false,
  beforeAddLiquidity: false,
  afterAddLiquidity: false,
  beforeRemoveLiquidity: false,
  afterRemoveLiquidity: false,
  beforeSwap: false,
  afterSwap: false,
  beforeDonate: false,
  afterDonate: false,
  beforeSwapReturnDelta: false,
  afterSwapReturnDelta: false,
};

export type HookLiquidityParams = Pool.ModifyLiquidityParams;

export type HookSwapParams = Pool.SwapParams;

export type BeforeSwapResult = {
  /** Amount of the specified currency taken (positive) or given (negative) by the extension */
  specifiedDelta?: BigNumber;
  /** LP fee for this swap, honoured for dynamic fee pools only */
  lpFeeOverride?: number;
};

export type AfterSwapResult = {
  /** Amount of the unspecified currency taken (positive) or given (negative) by the extension */
  unspecifiedDelta?: BigNumber;
};

/**
 * @title BaseHooks
 * @desc Defines the callbacks an extension may run around pool operations. Every
 * callback defaults to a no-op; subclasses override those they enable.
 */
export abstract class BaseHooks {
  /**
   * @desc The address pool keys use to select this extension.
   */
  readonly address: string;

  /**
   * @desc The title of the extension.
   */
  title: string;

  /**
   * @desc The description of the extension.
   */
  description: string;

  constructor(
    params: Prettify<Pick<BaseHooks, "address" | "title" | "description">>,
  ) {
    this.address = params.address;
    this.title = params.title;
    this.description = params.description;
  }

  /**
   * @desc The capabilities this extension enables.
   */
  abstract getHookPermissions(): HookPermissions;

  beforeInitialize(
    _sender: string,
    _key: PoolKey,
    _sqrtPriceX96: BigNumber,
    _hookData: string,
  ): void {}

  afterInitialize(
    _sender: string,
    _key: PoolKey,
    _sqrtPriceX96: BigNumber,
    _tick: number,
    _hookData: string,
  ): void {}

  beforeAddLiquidity(
    _sender: string,
    _key: PoolKey,
    _params: HookLiquidityParams,
    _hookData: string,
  ): void {}

  afterAddLiquidity(
    _sender: string,
    _key: PoolKey,
    _params: HookLiquidityParams,
    _delta: BalanceDelta,
    _feesAccrued: BalanceDelta,
    _hookData: string,
  ): void {}

  beforeRemoveLiquidity(
    _sender: string,
    _key: PoolKey,
    _params: HookLiquidityParams,
    _hookData: string,
  ): void {}

  afterRemoveLiquidity(
    _sender: string,
    _key: PoolKey,
    _params: HookLiquidityParams,
    _delta: BalanceDelta,
    _feesAccrued: BalanceDelta,
    _hookData: string,
  ): void {}

  beforeSwap(
    _sender: string,
    _key: PoolKey,
    _params: HookSwapParams,
    _hookData: string,
  ): BeforeSwapResult {
    return {};
  }

  afterSwap(
    _sender: string,
    _key: PoolKey,
    _params: HookSwapParams,
    _delta: BalanceDelta,
    _hookData: string,
  ): AfterSwapResult {
    return {};
  }

  beforeDonate(
    _sender: string,
    _key: PoolKey,
    _amount0: BigNumber,
    _amount1: BigNumber,
    _hookData: string,
  ): void {}

  afterDonate(
    _sender: string,
    _key: PoolKey,
    _amount0: BigNumber,
    _amount1: BigNumber,
    _hookData: string,
  ): void {}
}

export default BaseHooks;
