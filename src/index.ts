/**
 * @file clmm-engine
 * @desc This file defines the exports of the `clmm-engine` package.
 * @hidden
 */

import PoolManager from "./poolManager";
import Pool from "./pool";
import TickManager from "./tickManager";
import PositionManager from "./positionManager";
import BalanceDelta from "./balanceDelta";
import {
  PoolKey,
  createPoolKey,
  hasHooks,
  sortCurrencies,
  toId,
  validatePoolKey,
} from "./poolKey";
import {
  AfterSwapResult,
  BaseHooks,
  BeforeSwapResult,
  HookLiquidityParams,
  HookPermissions,
  HookSwapParams,
  NO_PERMISSIONS,
} from "./hooks/baseHooks";
import NoHooks from "./hooks/noHooks";
import {
  MathError,
  MathErrorCode,
  PoolError,
  PoolErrorCode,
  PoolManagerError,
  PoolManagerErrorCode,
} from "./errors";
import { ErrorWithData } from "./util/errorWithData";
import configuration, {
  Configuration,
  FeeTierConfig,
  PartialConfiguration,
  ProtocolFeeConfig,
  RecursivePartial,
} from "./configuration";
import {
  DonateParamsInput,
  ModifyLiquidityParamsInput,
  PoolKeyInput,
  SwapParamsInput,
} from "./schemas";
import TickPriceHelper, { RoundingMode } from "./util/tickPriceHelper";
import { Bigish, Prettify } from "./util/types";
import logger, {
  disableLogging,
  enableLogging,
  isLoggingEnabled,
} from "./util/logger";
import * as BitMath from "./util/coreCalculations/BitMath";
import * as FullMath from "./util/coreCalculations/FullMath";
import * as UnsafeMath from "./util/coreCalculations/UnsafeMath";
import * as FixedPoint96 from "./util/coreCalculations/FixedPoint96";
import * as FixedPoint128 from "./util/coreCalculations/FixedPoint128";
import * as TickMath from "./util/coreCalculations/TickMath";
import * as SqrtPriceMath from "./util/coreCalculations/SqrtPriceMath";
import * as LiquidityMath from "./util/coreCalculations/LiquidityMath";
import * as SwapMath from "./util/coreCalculations/SwapMath";
import * as LPFee from "./util/coreCalculations/LPFee";
import * as ProtocolFee from "./util/coreCalculations/ProtocolFee";
import * as Constants from "./util/coreCalculations/Constants";
import * as word from "./util/coreCalculations/word";
import * as UInt from "./util/coreCalculations/uint";
import * as Int from "./util/coreCalculations/int";

export default PoolManager;

// Pools
export { PoolManager, Pool, TickManager, PositionManager, BalanceDelta };

// Pool keys
export { createPoolKey, hasHooks, sortCurrencies, toId, validatePoolKey };
export type { PoolKey };

// Hooks
export { BaseHooks, NoHooks, NO_PERMISSIONS };
export type {
  AfterSwapResult,
  BeforeSwapResult,
  HookLiquidityParams,
  HookPermissions,
  HookSwapParams,
};

// Errors
export { ErrorWithData, MathError, PoolError, PoolManagerError };
export type { MathErrorCode, PoolErrorCode, PoolManagerErrorCode };

// Math
export {
  BitMath,
  FullMath,
  UnsafeMath,
  FixedPoint96,
  FixedPoint128,
  TickMath,
  SqrtPriceMath,
  LiquidityMath,
  SwapMath,
  LPFee,
  ProtocolFee,
  Constants,
  word,
  UInt,
  Int,
};

// Tick price helper
export { TickPriceHelper };
export type { RoundingMode };

// Configuration
export { configuration };
export type {
  Configuration,
  FeeTierConfig,
  PartialConfiguration,
  ProtocolFeeConfig,
  RecursivePartial,
};

// Inputs
export type {
  DonateParamsInput,
  ModifyLiquidityParamsInput,
  PoolKeyInput,
  SwapParamsInput,
};

// Utils
export { logger, enableLogging, disableLogging, isLoggingEnabled };
export type { Bigish, Prettify };
