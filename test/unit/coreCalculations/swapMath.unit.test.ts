import { assert } from "chai";
import { BigNumber } from "ethers";
import {
  computeSwapStep,
  getSqrtPriceTarget,
} from "../../../src/util/coreCalculations/SwapMath";
import {
  getNextSqrtPriceFromInput,
  getNextSqrtPriceFromOutput,
} from "../../../src/util/coreCalculations/SqrtPriceMath";
import {
  assertEq,
  assertGe,
  assertLe,
  generateRandomBigNumber,
  vm_expectRevert,
} from "./coreCalculationsTestUtils";

const _0 = BigNumber.from(0);
const ONE_ETHER = BigNumber.from(10).pow(18);
const Q96 = BigNumber.from(2).pow(96);
// floor(sqrt(1.01) * 2^96)
const PRICE_101_100 = BigNumber.from("79623317895830914510639640423");
// floor(sqrt(10) * 2^96)
const PRICE_1000_100 = BigNumber.from("250541448375047931186413801569");

describe("SwapMath unit test suite", () => {
  describe("computeSwapStep", () => {
    it("exact amount in that gets capped at price target in one for zero", () => {
      const step = computeSwapStep(
        Q96,
        PRICE_101_100,
        ONE_ETHER.mul(2),
        ONE_ETHER.mul(-1),
        600,
      );
      assertEq(step.amountIn, "9975124224178055");
      assertEq(step.feeAmount, "5988667735148");
      assertEq(step.amountOut, "9925619580021728");
      assertEq(step.sqrtPriceNextX96, PRICE_101_100);
      // the whole input was not needed
      assertLe(step.amountIn.add(step.feeAmount), ONE_ETHER);
    });

    it("exact amount out that gets capped at price target in one for zero", () => {
      const step = computeSwapStep(
        Q96,
        PRICE_101_100,
        ONE_ETHER.mul(2),
        ONE_ETHER,
        600,
      );
      assertEq(step.amountIn, "9975124224178055");
      assertEq(step.feeAmount, "5988667735148");
      assertEq(step.amountOut, "9925619580021728");
      assertEq(step.sqrtPriceNextX96, PRICE_101_100);
    });

    it("exact amount in that is fully spent in one for zero", () => {
      const step = computeSwapStep(
        Q96,
        PRICE_1000_100,
        ONE_ETHER.mul(2),
        ONE_ETHER.mul(-1),
        600,
      );
      assertEq(step.amountIn, "999400000000000000");
      assertEq(step.feeAmount, "600000000000000");
      assertEq(step.amountOut, "666399946655997866");
      assertEq(step.sqrtPriceNextX96, "118818475322642227089037862318");
      assertEq(
        step.sqrtPriceNextX96,
        getNextSqrtPriceFromInput(Q96, ONE_ETHER.mul(2), step.amountIn, false),
      );
    });

    it("amount out is capped at the desired amount out", () => {
      const step = computeSwapStep(
        BigNumber.from("417332158212080721273783715441582"),
        BigNumber.from("1452870262520218020823638996"),
        BigNumber.from("159344665391607089467575320103"),
        BigNumber.from(1),
        1,
      );
      assertEq(step.amountIn, 1);
      assertEq(step.feeAmount, 1);
      assertEq(step.amountOut, 1);
      assertEq(step.sqrtPriceNextX96, "417332158212080721273783715441581");
    });

    it("exact output stops at the price the output requires", () => {
      const amountOut = BigNumber.from(10).pow(15);
      const step = computeSwapStep(
        Q96,
        PRICE_1000_100,
        ONE_ETHER.mul(2),
        amountOut,
        3000,
      );
      assertEq(step.amountOut, amountOut);
      assertEq(
        step.sqrtPriceNextX96,
        getNextSqrtPriceFromOutput(Q96, ONE_ETHER.mul(2), amountOut, false),
      );
    });

    it("throws for a fee above 100%", () => {
      vm_expectRevert("InvalidPrice", () =>
        computeSwapStep(Q96, PRICE_101_100, ONE_ETHER, ONE_ETHER.mul(-1), 1_000_001),
      );
    });

    it("throws without liquidity", () => {
      vm_expectRevert("NotEnoughLiquidity", () =>
        computeSwapStep(Q96, PRICE_101_100, _0, ONE_ETHER.mul(-1), 3000),
      );
    });

    it("never passes the target nor exceeds the amount", () => {
      for (let i = 0; i < 40; i++) {
        const current = generateRandomBigNumber(100).add(Q96.div(2));
        const target = generateRandomBigNumber(100).add(Q96.div(2));
        const liquidity = generateRandomBigNumber(100).add(1);
        const amount = generateRandomBigNumber(90).add(1);
        const feePips = Math.floor(Math.random() * 100_000);
        const exactIn = i % 2 === 0;
        const amountRemaining = exactIn ? amount.mul(-1) : amount;
        const zeroForOne = current.gte(target);

        const step = computeSwapStep(current, target, liquidity, amountRemaining, feePips);

        assertGe(step.amountIn, 0);
        assertGe(step.amountOut, 0);
        assertGe(step.feeAmount, 0);
        if (exactIn) {
          assertLe(step.amountIn.add(step.feeAmount), amount);
        } else {
          assertLe(step.amountOut, amount);
        }
        if (zeroForOne) {
          assertGe(step.sqrtPriceNextX96, target);
          assertLe(step.sqrtPriceNextX96, current);
        } else {
          assertLe(step.sqrtPriceNextX96, target);
          assertGe(step.sqrtPriceNextX96, current);
        }
      }
    });
  });

  describe("getSqrtPriceTarget", () => {
    it("clamps the next tick price by the limit", () => {
      const low = BigNumber.from(100);
      const high = BigNumber.from(200);
      assert.isTrue(getSqrtPriceTarget(true, low, high).eq(high));
      assert.isTrue(getSqrtPriceTarget(true, high, low).eq(high));
      assert.isTrue(getSqrtPriceTarget(false, high, low).eq(low));
      assert.isTrue(getSqrtPriceTarget(false, low, high).eq(low));
    });
  });
});
