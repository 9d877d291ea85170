import { ErrorData, ErrorWithData } from "./util/errorWithData";

/** Failures raised by the fixed-point math modules. */
export type MathErrorCode =
  | "Overflow"
  | "DivisionByZero"
  | "InvalidPrice"
  | "InvalidTick"
  | "InvalidLiquidity"
  | "PriceOverflow"
  | "NotEnoughLiquidity";

/** Failures raised by the pool state machine and its registries. */
export type PoolErrorCode =
  | "TicksMisordered"
  | "TickLowerOutOfBounds"
  | "TickUpperOutOfBounds"
  | "TickMisaligned"
  | "TickLiquidityOverflow"
  | "PoolAlreadyInitialized"
  | "PoolNotInitialized"
  | "PriceLimitAlreadyExceeded"
  | "PriceLimitOutOfBounds"
  | "NoLiquidityToReceiveFees"
  | "InvalidFeeForExactOut"
  | "InvalidPrice"
  | "CannotUpdateEmptyPosition"
  | "InvalidProtocolFee"
  | "LPFeeTooLarge";

/** Failures raised while resolving keys and dispatching hooks. */
export type PoolManagerErrorCode =
  | "TickSpacingTooLarge"
  | "TickSpacingTooSmall"
  | "CurrenciesOutOfOrderOrEqual"
  | "HookAddressMismatch"
  | "InvalidHookConfiguration"
  | "LPFeeTooLarge"
  | "PoolNotFound"
  | "SwapAmountCannotBeZero"
  | "UnauthorizedDynamicLPFeeUpdate"
  | "HookDeltaExceedsSwapAmount"
  | "InsufficientProtocolFees";

export class MathError extends ErrorWithData {
  readonly code: MathErrorCode;

  constructor(code: MathErrorCode, data: ErrorData = {}) {
    super(`${code}`, data);
    this.code = code;
  }
}

export class PoolError extends ErrorWithData {
  readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, data: ErrorData = {}) {
    super(`${code}`, data);
    this.code = code;
  }
}

export class PoolManagerError extends ErrorWithData {
  readonly code: PoolManagerErrorCode;

  constructor(code: PoolManagerErrorCode, data: ErrorData = {}) {
    super(`${code}`, data);
    this.code = code;
  }
}
