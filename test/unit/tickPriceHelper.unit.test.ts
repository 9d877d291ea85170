import assert from "assert";
import { Big } from "big.js";
import { BigNumber } from "ethers";
import { describe, it } from "mocha";
import TickPriceHelper, { RoundingMode } from "../../src/util/tickPriceHelper";

const Q96 = BigNumber.from(2).pow(96);

describe(`${TickPriceHelper.prototype.constructor.name} unit tests suite`, () => {
  const helper = new TickPriceHelper(18, 18);

  describe("priceFromTick", () => {
    it("is 1 at tick 0", () => {
      assert.equal(helper.priceFromTick(0).toString(), "1");
    });

    it("grows by one basis point per tick", () => {
      const diff = helper.priceFromTick(1).minus("1.0001").abs();
      assert.ok(diff.lt("1e-15"), `diff ${diff.toString()}`);
    });

    it("applies the decimals", () => {
      const usdHelper = new TickPriceHelper(18, 6);
      assert.equal(usdHelper.priceFromSqrtPrice(Q96).toString(), "1000000000000");
      assert.equal(usdHelper.sqrtPriceFromPrice(Big(10).pow(12)).toString(), Q96.toString());
    });
  });

  describe("sqrtPriceFromPrice", () => {
    it("is Q96 for a price of 1", () => {
      assert.equal(helper.sqrtPriceFromPrice(1).toString(), Q96.toString());
      assert.equal(helper.sqrtPriceFromPrice(4).toString(), Q96.mul(2).toString());
    });
  });

  describe("tickFromPrice", () => {
    const cases: { price: string; expected: Record<RoundingMode, number> }[] = [
      { price: "1.005", expected: { roundDown: 49, roundUp: 50, nearest: 50 } },
      { price: "0.995", expected: { roundDown: -51, roundUp: -50, nearest: -50 } },
      { price: "1", expected: { roundDown: 0, roundUp: 0, nearest: 0 } },
    ];

    const modes: RoundingMode[] = ["roundDown", "roundUp", "nearest"];

    cases.forEach(({ price, expected }) => {
      modes.forEach((mode) => {
        it(`price ${price} ${mode} gives tick ${expected[mode]}`, () => {
          assert.equal(helper.tickFromPrice(price, mode), expected[mode]);
        });
      });
    });

    it("defaults to nearest", () => {
      assert.equal(helper.tickFromPrice("1.005"), 50);
    });
  });

  describe("nearestUsableTick", () => {
    it("rounds to the spacing", () => {
      assert.equal(TickPriceHelper.nearestUsableTick(85, 60), 60);
      assert.equal(TickPriceHelper.nearestUsableTick(90, 60), 120);
      assert.equal(TickPriceHelper.nearestUsableTick(-85, 60), -60);
    });

    it("stays within the usable range", () => {
      assert.equal(TickPriceHelper.nearestUsableTick(887272, 60), 887220);
      assert.equal(TickPriceHelper.nearestUsableTick(-887272, 60), -887220);
    });
  });
});
