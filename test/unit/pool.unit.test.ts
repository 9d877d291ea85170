import assert from "assert";
import { describe, it } from "mocha";
import { BigNumber, ethers } from "ethers";
import Pool from "../../src/pool";
import {
  MAX_SQRT_PRICE,
  MIN_SQRT_PRICE,
} from "../../src/util/coreCalculations/Constants";
import { MAX_INT128 } from "../../src/util/coreCalculations/int";
import * as ProtocolFee from "../../src/util/coreCalculations/ProtocolFee";
import {
  getSqrtPriceAtTick,
  maxUsableTick,
  minUsableTick,
} from "../../src/util/coreCalculations/TickMath";

const Q96 = BigNumber.from(2).pow(96);
const ONE_ETHER = BigNumber.from(10).pow(18);
const alice = "0x00000000000000000000000000000000000000aa";
const bob = "0x00000000000000000000000000000000000000bb";

function position(
  owner: string,
  tickLower: number,
  tickUpper: number,
  liquidityDelta: BigNumber,
): Pool.ModifyLiquidityParams {
  return {
    owner,
    tickLower,
    tickUpper,
    salt: ethers.constants.HashZero,
    liquidityDelta,
  };
}

function exactInput(amount: BigNumber, zeroForOne: boolean): Pool.SwapParams {
  return {
    amountSpecified: amount.mul(-1),
    zeroForOne,
    sqrtPriceLimitX96: zeroForOne ? MIN_SQRT_PRICE.add(1) : MAX_SQRT_PRICE.sub(1),
  };
}

function exactOutput(amount: BigNumber, zeroForOne: boolean): Pool.SwapParams {
  return {
    amountSpecified: amount,
    zeroForOne,
    sqrtPriceLimitX96: zeroForOne ? MIN_SQRT_PRICE.add(1) : MAX_SQRT_PRICE.sub(1),
  };
}

/** A pool at price 1 with 1e18 liquidity between ticks -600 and 600. */
function deepPool(lpFee = 3000, protocolFee = 0): Pool {
  const pool = new Pool(60);
  pool.initialize(Q96, lpFee, protocolFee);
  pool.modifyLiquidity(position(alice, -600, 600, ONE_ETHER));
  return pool;
}

describe("Pool unit tests suite", () => {
  describe("initialize", () => {
    it("starts at tick 0 for a price of 1", () => {
      const pool = new Pool(60);
      assert.equal(pool.isInitialized, false);
      assert.equal(pool.initialize(Q96, 3000), 0);
      assert.deepStrictEqual(pool.slot0, {
        sqrtPriceX96: Q96,
        tick: 0,
        protocolFee: 0,
        lpFee: 3000,
      });
      assert.equal(pool.isInitialized, true);
    });

    it("can only be initialized once", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      assert.throws(() => pool.initialize(Q96, 3000), /PoolAlreadyInitialized/);
    });

    it("rejects prices outside the tick range", () => {
      const pool = new Pool(60);
      assert.throws(() => pool.initialize(MIN_SQRT_PRICE.sub(1), 3000), /InvalidPrice/);
      assert.throws(() => pool.initialize(MAX_SQRT_PRICE.add(1), 3000), /InvalidPrice/);
      assert.equal(pool.isInitialized, false);
    });

    it("rejects invalid fees", () => {
      const pool = new Pool(60);
      assert.throws(() => pool.initialize(Q96, 1_000_001), /LPFeeTooLarge/);
      assert.throws(
        () => pool.initialize(Q96, 3000, ProtocolFee.pack(1001, 0)),
        /InvalidProtocolFee/,
      );
    });

    it("derives the tick from the price", () => {
      const pool = new Pool(1);
      assert.equal(pool.initialize(getSqrtPriceAtTick(-60).sub(1), 0), -61);
    });
  });

  describe("operations before initialization", () => {
    it("throw PoolNotInitialized", () => {
      const pool = new Pool(60);
      assert.throws(
        () => pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(1))),
        /PoolNotInitialized/,
      );
      assert.throws(() => pool.swap(exactInput(ONE_ETHER, true)), /PoolNotInitialized/);
      assert.throws(() => pool.donate(BigNumber.from(1), BigNumber.from(1)), /PoolNotInitialized/);
      assert.throws(() => pool.setLPFee(500), /PoolNotInitialized/);
    });
  });

  describe("modifyLiquidity", () => {
    it("charges both tokens for a range around the price and refunds them on removal", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      const liquidity = BigNumber.from(1_000_000);

      const added = pool.modifyLiquidity(position(alice, -120, 120, liquidity));
      assert.equal(added.delta.toString(), "BalanceDelta(-5982, -5982)");
      assert.equal(added.feeDelta.isZero(), true);
      assert.equal(pool.liquidity.toString(), "1000000");
      assert.equal(pool.getTick(-120)?.liquidityNet.toString(), "1000000");
      assert.equal(pool.getTick(120)?.liquidityNet.toString(), "-1000000");

      const removed = pool.modifyLiquidity(position(alice, -120, 120, liquidity.mul(-1)));
      assert.equal(removed.delta.toString(), "BalanceDelta(5981, 5981)");
      assert.equal(pool.liquidity.toString(), "0");
      assert.equal(pool.initializedTickCount, 0);
      assert.equal(
        pool.getPosition({ owner: alice, tickLower: -120, tickUpper: 120, salt: ethers.constants.HashZero }),
        undefined,
      );
    });

    it("charges only token0 for a range above the price", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      const { delta } = pool.modifyLiquidity(position(alice, 600, 1200, ONE_ETHER));
      assert.equal(delta.toString(), "BalanceDelta(-28679630427114770, 0)");
      assert.equal(pool.liquidity.toString(), "0");
    });

    it("charges only token1 for a range below the price", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      const { delta } = pool.modifyLiquidity(position(alice, -600, -120, ONE_ETHER));
      assert.equal(delta.toString(), "BalanceDelta(0, -23571273118627508)");
      assert.equal(pool.liquidity.toString(), "0");
    });

    it("validates the range", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      const one = BigNumber.from(1);
      assert.throws(() => pool.modifyLiquidity(position(alice, 120, 120, one)), /TicksMisordered/);
      assert.throws(() => pool.modifyLiquidity(position(alice, 120, -120, one)), /TicksMisordered/);
      assert.throws(() => pool.modifyLiquidity(position(alice, -887280, 0, one)), /TickLowerOutOfBounds/);
      assert.throws(() => pool.modifyLiquidity(position(alice, 0, 887280, one)), /TickUpperOutOfBounds/);
      assert.throws(() => pool.modifyLiquidity(position(alice, -90, 120, one)), /TickMisaligned/);
    });

    it("rejects more liquidity per tick than the spacing allows", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      assert.throws(
        () => pool.modifyLiquidity(position(alice, -120, 120, pool.maxLiquidityPerTick.add(1))),
        /TickLiquidityOverflow/,
      );
      assert.equal(pool.initializedTickCount, 0);
      assert.equal(pool.liquidity.toString(), "0");
    });

    it("leaves ticks and liquidity untouched when the position update fails", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(1000)));
      pool.modifyLiquidity(position(bob, -120, 120, BigNumber.from(1000)));

      // the ticks could drop 2000 but alice only owns 1000 of it
      assert.throws(
        () => pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(-2000))),
        /InvalidLiquidity/,
      );
      assert.equal(pool.getTick(-120)?.liquidityGross.toString(), "2000");
      assert.equal(pool.getTick(120)?.liquidityGross.toString(), "2000");
      assert.equal(pool.getTickBitmapWord(-1).isZero(), false);
      assert.equal(pool.liquidity.toString(), "2000");
    });

    it("refuses to poke a position that does not exist", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      assert.throws(
        () => pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(0))),
        /CannotUpdateEmptyPosition/,
      );
    });
  });

  describe("swap", () => {
    it("swaps an exact input of token0 for token1", () => {
      const pool = deepPool();
      const result = pool.swap(exactInput(BigNumber.from(10).pow(15), true));
      assert.equal(result.delta.toString(), "BalanceDelta(-1000000000000000, 996006981039903)");
      assert.equal(result.sqrtPriceX96.toString(), "79149250711305166342700278159");
      assert.equal(result.tick, -20);
      assert.equal(result.swapFee, 3000);
      assert.equal(result.amountToProtocol.toString(), "0");
      assert.deepStrictEqual(pool.slot0, {
        sqrtPriceX96: result.sqrtPriceX96,
        tick: -20,
        protocolFee: 0,
        lpFee: 3000,
      });
      assert.equal(
        pool.feeGrowthGlobals.feeGrowthGlobal0X128.toString(),
        "1020847100762815390390123822295304",
      );
      assert.equal(pool.feeGrowthGlobals.feeGrowthGlobal1X128.toString(), "0");
    });

    it("swaps for an exact output of token0", () => {
      const pool = deepPool();
      const result = pool.swap(exactOutput(BigNumber.from(10).pow(15), false));
      assert.equal(result.delta.toString(), "BalanceDelta(1000000000000000, -1004013040121367)");
      assert.equal(result.sqrtPriceX96.toString(), "79307469984248586179723674011");
      assert.equal(result.tick, 20);
      assert.equal(
        pool.feeGrowthGlobals.feeGrowthGlobal1X128.toString(),
        "1024943801136263662990517543963260",
      );
    });

    it("swaps for an exact output of token1", () => {
      const pool = deepPool(500);
      const result = pool.swap(exactOutput(BigNumber.from(10).pow(15), true));
      assert.equal(result.delta.toString(), "BalanceDelta(-1001501751876941, 1000000000000000)");
      assert.equal(result.tick, -21);
    });

    it("stops at the price limit", () => {
      const pool = deepPool();
      const limit = getSqrtPriceAtTick(-60);
      const result = pool.swap({
        amountSpecified: ONE_ETHER.mul(-1),
        zeroForOne: true,
        sqrtPriceLimitX96: limit,
      });
      assert.equal(result.delta.toString(), "BalanceDelta(-3013394245478362, 2995354955910780)");
      assert.equal(result.sqrtPriceX96.toString(), limit.toString());
      assert.equal(result.tick, -60);
    });

    it("crosses initialized ticks and updates the active liquidity", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, -120, 120, ONE_ETHER));
      pool.modifyLiquidity(position(bob, -600, -120, ONE_ETHER));

      const result = pool.swap(exactInput(BigNumber.from(10).pow(16), true));
      assert.equal(result.delta.toString(), "BalanceDelta(-10000000000000000, 9871580343970610)");
      assert.equal(result.tick, -199);
      // alice's liquidity left the range as bob's entered it
      assert.equal(result.liquidity.toString(), ONE_ETHER.toString());
      assert.equal(
        pool.getTick(-120)?.feeGrowthOutside0X128.toString(),
        "6161671596273120681676461224913443",
      );
      assert.equal(
        pool.getFeeGrowthInside(-600, -120).feeGrowthInside0X128.toString(),
        "4046799411355373504591697936503066",
      );
    });

    it("returns every token and fee once all positions are withdrawn", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, -120, 120, ONE_ETHER));
      pool.modifyLiquidity(position(bob, -600, -120, ONE_ETHER));
      pool.swap(exactInput(BigNumber.from(10).pow(16), true));

      const a = pool.modifyLiquidity(position(alice, -120, 120, ONE_ETHER.mul(-1)));
      assert.equal(a.delta.toString(), "BalanceDelta(11999472029327827, 0)");
      assert.equal(a.feeDelta.toString(), "BalanceDelta(18107525382602, 0)");
      const b = pool.modifyLiquidity(position(bob, -600, -120, ONE_ETHER.mul(-1)));
      assert.equal(b.delta.toString(), "BalanceDelta(3952265731181832, 19681430535166558)");
      assert.equal(b.feeDelta.toString(), "BalanceDelta(11892474617397, 0)");

      assert.equal(pool.initializedTickCount, 0);
      assert.equal(pool.liquidity.toString(), "0");
    });

    it("crosses back to the starting range", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, -120, 120, ONE_ETHER));
      pool.modifyLiquidity(position(bob, -600, -120, ONE_ETHER));
      pool.swap(exactInput(BigNumber.from(10).pow(16), true));

      const back = pool.swap(exactInput(BigNumber.from(10).pow(16), false));
      assert.equal(back.delta.toString(), "BalanceDelta(10068409970553930, -10000000000000000)");
      assert.equal(back.tick, 1);
      assert.equal(
        pool.getTick(-120)?.feeGrowthOutside1X128.toString(),
        "3982883173269973540001464036302622",
      );
    });

    it("moves freely through ranges without liquidity", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, 600, 1200, ONE_ETHER));

      const result = pool.swap(exactInput(BigNumber.from(10).pow(15), false));
      assert.equal(result.delta.toString(), "BalanceDelta(938034474824077, -1000000000000000)");
      assert.equal(result.tick, 619);
      assert.equal(result.liquidity.toString(), ONE_ETHER.toString());
    });

    it("takes the protocol fee out of the input", () => {
      const pool = deepPool(3000, ProtocolFee.pack(1000, 500));
      const result = pool.swap(exactInput(BigNumber.from(10).pow(15), true));
      assert.equal(result.swapFee, 3997);
      assert.equal(result.amountToProtocol.toString(), "1000000000000");
      assert.equal(result.delta.toString(), "BalanceDelta(-1000000000000000, 995011965097726)");
      assert.equal(
        pool.feeGrowthGlobals.feeGrowthGlobal0X128.toString(),
        "1019826253662052574999733698473009",
      );
    });

    it("uses the LP fee override for a single swap", () => {
      const pool = deepPool(0);
      const result = pool.swap({
        ...exactInput(BigNumber.from(10).pow(15), true),
        lpFeeOverride: 10000,
      });
      assert.equal(result.swapFee, 10000);
      assert.equal(result.delta.toString(), "BalanceDelta(-1000000000000000, 989020869339354)");
      assert.equal(pool.slot0.lpFee, 0);
    });

    it("returns a zero delta for a zero amount", () => {
      const pool = deepPool();
      const result = pool.swap(exactInput(BigNumber.from(0), true));
      assert.equal(result.delta.isZero(), true);
      assert.equal(pool.slot0.sqrtPriceX96.toString(), Q96.toString());
    });

    it("validates the price limit", () => {
      const pool = deepPool();
      assert.throws(
        () => pool.swap({ ...exactInput(ONE_ETHER, true), sqrtPriceLimitX96: Q96 }),
        /PriceLimitAlreadyExceeded/,
      );
      assert.throws(
        () => pool.swap({ ...exactInput(ONE_ETHER, false), sqrtPriceLimitX96: Q96 }),
        /PriceLimitAlreadyExceeded/,
      );
      assert.throws(
        () => pool.swap({ ...exactInput(ONE_ETHER, true), sqrtPriceLimitX96: MIN_SQRT_PRICE }),
        /PriceLimitOutOfBounds/,
      );
      assert.throws(
        () => pool.swap({ ...exactInput(ONE_ETHER, false), sqrtPriceLimitX96: MAX_SQRT_PRICE }),
        /PriceLimitOutOfBounds/,
      );
    });

    it("rejects exact output swaps at a 100% fee", () => {
      const pool = deepPool(1_000_000);
      assert.throws(
        () => pool.swap(exactOutput(BigNumber.from(1000), true)),
        /InvalidFeeForExactOut/,
      );
    });

    it("leaves the pool untouched when the swap fails partway", () => {
      const pool = new Pool(1);
      pool.initialize(Q96, 3000);
      const lower = minUsableTick(1);
      const upper = maxUsableTick(1);
      pool.modifyLiquidity(position(alice, lower, upper, pool.maxLiquidityPerTick));

      const slot0 = pool.slot0;
      const liquidity = pool.liquidity;
      const feeGrowth = pool.feeGrowthGlobals;
      const lowerTick = pool.getTick(lower);

      assert.throws(() => pool.swap(exactOutput(MAX_INT128, true)), /Overflow/);

      assert.deepStrictEqual(pool.slot0, slot0);
      assert.deepStrictEqual(pool.liquidity, liquidity);
      assert.deepStrictEqual(pool.feeGrowthGlobals, feeGrowth);
      assert.deepStrictEqual(pool.getTick(lower), lowerTick);
      assert.equal(pool.initializedTickCount, 2);
    });

    it("keeps the price between the start and the limit", () => {
      const pool = deepPool();
      for (let i = 0; i < 6; i++) {
        const zeroForOne = i % 2 === 0;
        const before = pool.slot0.sqrtPriceX96;
        const result = pool.swap(exactInput(BigNumber.from(10).pow(14 + i), zeroForOne));
        if (zeroForOne) {
          assert.ok(result.sqrtPriceX96.lte(before) && result.sqrtPriceX96.gt(MIN_SQRT_PRICE));
          assert.ok(result.delta.amount1.gte(0));
        } else {
          assert.ok(result.sqrtPriceX96.gte(before) && result.sqrtPriceX96.lt(MAX_SQRT_PRICE));
          assert.ok(result.delta.amount0.gte(0));
        }
        assert.ok(!result.liquidity.isNegative());
      }
    });
  });

  describe("donate", () => {
    it("fails without liquidity in range", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      assert.throws(
        () => pool.donate(BigNumber.from(1000), BigNumber.from(2000)),
        /NoLiquidityToReceiveFees/,
      );
    });

    it("credits the donation to the liquidity in range", () => {
      const pool = new Pool(60);
      pool.initialize(Q96, 3000);
      pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(1_000_000)));

      const delta = pool.donate(BigNumber.from(1000), BigNumber.from(2000));
      assert.equal(delta.toString(), "BalanceDelta(-1000, -2000)");
      assert.equal(
        pool.feeGrowthGlobals.feeGrowthGlobal0X128.toString(),
        "340282366920938463463374607431768211",
      );

      const poke = pool.modifyLiquidity(position(alice, -120, 120, BigNumber.from(0)));
      assert.equal(poke.delta.isZero(), true);
      assert.equal(poke.feeDelta.toString(), "BalanceDelta(999, 1999)");
      const info = pool.getPosition({
        owner: alice,
        tickLower: -120,
        tickUpper: 120,
        salt: ethers.constants.HashZero,
      });
      assert.equal(info?.tokensOwed0.toString(), "999");
      assert.equal(info?.tokensOwed1.toString(), "1999");
    });
  });

  describe("fee setters", () => {
    it("update slot0", () => {
      const pool = deepPool();
      pool.setLPFee(500);
      pool.setProtocolFee(ProtocolFee.pack(100, 200));
      assert.equal(pool.slot0.lpFee, 500);
      assert.equal(pool.slot0.protocolFee, ProtocolFee.pack(100, 200));
      assert.throws(() => pool.setLPFee(1_000_001), /LPFeeTooLarge/);
      assert.throws(() => pool.setProtocolFee(ProtocolFee.pack(0, 2000)), /InvalidProtocolFee/);
    });
  });
});
