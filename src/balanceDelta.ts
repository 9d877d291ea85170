import { BigNumber, BigNumberish } from "ethers";
import * as Int from "./util/coreCalculations/int";

/**
 * A signed pair of token amounts from the caller's point of view: negative amounts are
 * owed by the caller to the pool, positive amounts are owed by the pool to the caller.
 * Both amounts are int128; construction and arithmetic throw MathError("Overflow") outside that range.
 */
class BalanceDelta {
  static readonly ZERO = new BalanceDelta(0, 0);

  readonly amount0: BigNumber;
  readonly amount1: BigNumber;

  constructor(amount0: BigNumberish, amount1: BigNumberish) {
    this.amount0 = Int.toInt128(amount0);
    this.amount1 = Int.toInt128(amount1);
  }

  add(other: BalanceDelta): BalanceDelta {
    return new BalanceDelta(
      this.amount0.add(other.amount0),
      this.amount1.add(other.amount1),
    );
  }

  sub(other: BalanceDelta): BalanceDelta {
    return new BalanceDelta(
      this.amount0.sub(other.amount0),
      this.amount1.sub(other.amount1),
    );
  }

  eq(other: BalanceDelta): boolean {
    return this.amount0.eq(other.amount0) && this.amount1.eq(other.amount1);
  }

  isZero(): boolean {
    return this.amount0.isZero() && this.amount1.isZero();
  }

  toString(): string {
    return `BalanceDelta(${this.amount0.toString()}, ${this.amount1.toString()})`;
  }
}

export default BalanceDelta;
