import loadedPoolDefaults from "./constants/poolDefaults.json";

import clone from "just-clone";
import deepmerge from "deepmerge";
import * as ProtocolFee from "./util/coreCalculations/ProtocolFee";

// Make keys optional at all levels of T
export type RecursivePartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[]
    ? RecursivePartial<U>[]
    : T[P] extends object | undefined
      ? RecursivePartial<T[P]>
      : T[P];
};

/** A fee tier pairs an LP fee in pips with the tick spacing pools of that fee use. */
export type FeeTierConfig = {
  fee: number;
  tickSpacing: number;
};

/** Directional protocol fees in pips that new pools start with. */
export type ProtocolFeeConfig = {
  zeroForOne: number;
  oneForZero: number;
};

export type Configuration = {
  feeTiers: Record<string, FeeTierConfig>;
  defaultProtocolFee: ProtocolFeeConfig;
  /** Hook data passed to extensions when the caller supplies none */
  defaultHookData: string;
};

export type PartialConfiguration = RecursivePartial<Configuration>;

let config: Configuration;

export const poolConfiguration = {
  /**
   * Gets the named fee tier.
   * @throws if the tier is not configured
   */
  getFeeTier(name: string): FeeTierConfig {
    const tier = config.feeTiers[name];
    if (tier === undefined) {
      throw Error(`Unknown fee tier: ${name}`);
    }
    return { ...tier };
  },

  /** Gets the tick spacing configured for a static fee, if any tier uses that fee. */
  getTickSpacingForFee(fee: number): number | undefined {
    return Object.values(config.feeTiers).find((tier) => tier.fee === fee)
      ?.tickSpacing;
  },

  /** Gets the packed protocol fee new pools are initialized with. */
  getDefaultProtocolFee(): number {
    const { zeroForOne, oneForZero } = config.defaultProtocolFee;
    const packed = ProtocolFee.pack(zeroForOne, oneForZero);
    if (
      ProtocolFee.getZeroForOneFee(packed) !== zeroForOne ||
      ProtocolFee.getOneForZeroFee(packed) !== oneForZero ||
      !ProtocolFee.isValidProtocolFee(packed)
    ) {
      throw Error(
        `Invalid default protocol fee: ${zeroForOne}/${oneForZero}, each must be at most ${ProtocolFee.MAX_PROTOCOL_FEE}`,
      );
    }
    return packed;
  },

  getDefaultHookData(): string {
    return config.defaultHookData;
  },
};

/// CONFIGURATION MANAGEMENT

/**
 * Read-only access to the full configuration.
 */
export function getConfiguration(): Configuration {
  return clone(config);
}

/**
 * Reset the configuration to the default.
 */
export function resetConfiguration(): void {
  config = clone(loadedPoolDefaults);
}

/**
 * Update the configuration by providing a partial configuration containing only the values that should be changed/added.
 *
 * @param overrides a partial configuration
 *
 * @example
 * ```
 *    updateConfiguration({feeTiers: { custom: { fee: 2500, tickSpacing: 50 }}})
 * ```
 */
export function updateConfiguration(overrides: PartialConfiguration): void {
  config = deepmerge<Configuration, PartialConfiguration>(config, overrides);
}

// Initialize configuration
resetConfiguration();

export const configuration = {
  pool: poolConfiguration,
  getConfiguration,
  resetConfiguration,
  updateConfiguration,
};
export default configuration;
