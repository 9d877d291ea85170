/*
 * Protocol fee encoding: two directional fees in pips packed in 24 bits,
 * zeroForOne in the low 12 bits and oneForZero in the high 12 bits.
 */

import { PIPS_DENOMINATOR } from "./Constants";

/** Each directional protocol fee is capped at 0.1% */
export const MAX_PROTOCOL_FEE = 1000;

const FEE_MASK = 0xfff;

export function pack(zeroForOneFee: number, oneForZeroFee: number): number {
  return (zeroForOneFee & FEE_MASK) | ((oneForZeroFee & FEE_MASK) << 12);
}

export function getZeroForOneFee(protocolFee: number): number {
  return protocolFee & FEE_MASK;
}

export function getOneForZeroFee(protocolFee: number): number {
  return (protocolFee >> 12) & FEE_MASK;
}

export function isValidProtocolFee(protocolFee: number): boolean {
  if (!Number.isInteger(protocolFee) || protocolFee < 0 || protocolFee > 0xffffff) {
    return false;
  }
  return (
    getZeroForOneFee(protocolFee) <= MAX_PROTOCOL_FEE &&
    getOneForZeroFee(protocolFee) <= MAX_PROTOCOL_FEE
  );
}

/**
 * Total fee charged by a swap when the protocol fee is taken first and the LP fee
 * applies to what is left: `p + l - p * l / 1e6`, rounded down.
 */
export function calculateSwapFee(protocolFee: number, lpFee: number): number {
  return protocolFee + lpFee - Math.floor((protocolFee * lpFee) / PIPS_DENOMINATOR);
}
