/*
 * 256-bit machine word primitives.
 * Arbitrary integer precision is achieved by using BigNumber from ethers.js, so every
 * function here reduces its result modulo 2^256 to reproduce wrapping word semantics.
 *
 * All functions accept BigNumbers representing either uint256 or int256; the two share
 * the same 256 bit words and are only told apart by the signed comparison helpers.
 */

import { BigNumber, BigNumberish } from "ethers";

// Literal constants are precomputed for efficiency and readability.
const _0 = BigNumber.from(0);
const _1 = BigNumber.from(1);

const _2pow255 = BigNumber.from(2).pow(255);
const _2pow256 = BigNumber.from(2).pow(256);

const _0xffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff =
  _2pow256.sub(_1); // 2^256 - 1

// Reduce any integer into the [0, 2^256) word range.
export function toUIntBigNumber(x: BigNumberish): BigNumber {
  const r = BigNumber.from(x).mod(_2pow256);
  return r.isNegative() ? r.add(_2pow256) : r;
}

// Read a word as a two's complement int256.
export function toIntBigNumber(x: BigNumberish): BigNumber {
  const u = toUIntBigNumber(x);
  return u.gte(_2pow255) ? u.sub(_2pow256) : u;
}

// (x + y) % 2^256
export function add(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(toUIntBigNumber(x).add(toUIntBigNumber(y)));
}

// (x - y) % 2^256
export function sub(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(toUIntBigNumber(x).sub(toUIntBigNumber(y)));
}

// (x * y) % 2^256
export function mul(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(toUIntBigNumber(x).mul(toUIntBigNumber(y)));
}

// x / y, or 0 if y == 0
export function div(x: BigNumberish, y: BigNumberish): BigNumber {
  const d = toUIntBigNumber(y);
  if (d.isZero()) {
    return _0;
  }
  return toUIntBigNumber(x).div(d);
}

// x % y, or 0 if y == 0
export function mod(x: BigNumberish, y: BigNumberish): BigNumber {
  const d = toUIntBigNumber(y);
  if (d.isZero()) {
    return _0;
  }
  return toUIntBigNumber(x).mod(d);
}

// (x * y) % m with arbitrary precision arithmetic, 0 when m == 0
export function mulmod(
  x: BigNumberish,
  y: BigNumberish,
  m: BigNumberish,
): BigNumber {
  const d = toUIntBigNumber(m);
  if (d.isZero()) {
    return _0;
  }
  return toUIntBigNumber(x).mul(toUIntBigNumber(y)).mod(d);
}

// (x + y) % m with arbitrary precision arithmetic, 0 when m == 0
export function addmod(
  x: BigNumberish,
  y: BigNumberish,
  m: BigNumberish,
): BigNumber {
  const d = toUIntBigNumber(m);
  if (d.isZero()) {
    return _0;
  }
  return toUIntBigNumber(x).add(toUIntBigNumber(y)).mod(d);
}

// bitwise “and” of x and y
export function and(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(x).and(toUIntBigNumber(y));
}

// bitwise “or” of x and y
export function or(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(x).or(toUIntBigNumber(y));
}

// bitwise “xor” of x and y
export function xor(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(x).xor(toUIntBigNumber(y));
}

// bitwise “not” of x (every bit of x is negated)
export function not(x: BigNumberish): BigNumber {
  return toUIntBigNumber(x).xor(
    _0xffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff,
  );
}

// y << bits, discarding bits shifted off the left
export function shl(bits: number, y: BigNumberish): BigNumber {
  if (bits >= 256) {
    return _0;
  }
  return toUIntBigNumber(y)
    .shl(bits)
    .and(_0xffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffffff);
}

// y >> bits, logical
export function shr(bits: number, y: BigNumberish): BigNumber {
  if (bits >= 256) {
    return _0;
  }
  return toUIntBigNumber(y).shr(bits);
}

// 1 if x == 0, 0 otherwise
export function iszero(x: BigNumberish): BigNumber {
  return toUIntBigNumber(x).isZero() ? _1 : _0;
}

// 1 if x < y, 0 otherwise
export function lt(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(x).lt(toUIntBigNumber(y)) ? _1 : _0;
}

// 1 if x > y, 0 otherwise
export function gt(x: BigNumberish, y: BigNumberish): BigNumber {
  return toUIntBigNumber(x).gt(toUIntBigNumber(y)) ? _1 : _0;
}

// 1 if x < y, 0 otherwise, for two's complement numbers
export function slt(x: BigNumberish, y: BigNumberish): BigNumber {
  return toIntBigNumber(x).lt(toIntBigNumber(y)) ? _1 : _0;
}

// 1 if x > y, 0 otherwise, for two's complement numbers
export function sgt(x: BigNumberish, y: BigNumberish): BigNumber {
  return toIntBigNumber(x).gt(toIntBigNumber(y)) ? _1 : _0;
}
