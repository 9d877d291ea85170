import { BigNumber, ethers } from "ethers";
import { z } from "zod";

export const liberalBigNumber = z
  .union([
    z.instanceof(BigNumber),
    z.string().refine((x) => /^-?\d+$/.test(x), "Invalid integer"),
    z.number().refine((x) => Number.isSafeInteger(x), "Unsafe integer"),
    z.bigint(),
  ])
  .transform((x) => BigNumber.from(x.toString()));

export const liberalNonNegativeBigNumber = liberalBigNumber.refine(
  (x) => !x.isNegative(),
  "Must not be negative",
);

export const evmAddress = z
  .string()
  .refine((v) => ethers.utils.isAddress(v), "Invalid EVM Address");

export const bytes32 = z
  .string()
  .refine((v) => ethers.utils.isHexString(v, 32), "Invalid 32 byte value");

export const hexData = z
  .string()
  .refine((v) => ethers.utils.isHexString(v), "Invalid hex data");

export const tick = z.number().int();

export const poolKeySchema = z.object({
  currency0: evmAddress,
  currency1: evmAddress,
  fee: z.number().int().min(0).max(0xffffff),
  tickSpacing: z.number().int(),
  hooks: evmAddress,
});

export const modifyLiquidityParamsSchema = z.object({
  owner: evmAddress,
  tickLower: tick,
  tickUpper: tick,
  liquidityDelta: liberalBigNumber,
  salt: bytes32.default(ethers.constants.HashZero),
});

export const swapParamsSchema = z.object({
  zeroForOne: z.boolean(),
  amountSpecified: liberalBigNumber,
  sqrtPriceLimitX96: liberalNonNegativeBigNumber,
});

export const donateParamsSchema = z.object({
  amount0: liberalNonNegativeBigNumber,
  amount1: liberalNonNegativeBigNumber,
});

export type PoolKeyInput = z.input<typeof poolKeySchema>;
export type ModifyLiquidityParamsInput = z.input<typeof modifyLiquidityParamsSchema>;
export type SwapParamsInput = z.input<typeof swapParamsSchema>;
export type DonateParamsInput = z.input<typeof donateParamsSchema>;
