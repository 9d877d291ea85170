/*
 * LP fee encoding. A pool key's fee is either a static fee in pips or the dynamic
 * fee flag, in which case the pool starts at 0 and its extension sets the fee.
 */

/** 100% in pips */
export const MAX_LP_FEE = 1_000_000;
/** Set in a key's fee to mark the pool's LP fee as dynamic */
export const DYNAMIC_FEE_FLAG = 0x800000;

export function isDynamicFee(fee: number): boolean {
  return fee === DYNAMIC_FEE_FLAG;
}

export function isValid(fee: number): boolean {
  return Number.isInteger(fee) && fee >= 0 && fee <= MAX_LP_FEE;
}

/** The fee a newly initialized pool starts with, or undefined if the key's fee is invalid. */
export function getInitialLPFee(fee: number): number | undefined {
  if (isDynamicFee(fee)) {
    return 0;
  }
  return isValid(fee) ? fee : undefined;
}
