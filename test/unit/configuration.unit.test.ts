import assert from "assert";
import { describe, it } from "mocha";
import configuration from "../../src/configuration";

describe("Configuration unit tests suite", () => {
  beforeEach(() => {
    configuration.resetConfiguration();
  });

  it("reads the default fee tiers", () => {
    assert.deepStrictEqual(configuration.pool.getFeeTier("medium"), {
      fee: 3000,
      tickSpacing: 60,
    });
    assert.equal(configuration.pool.getTickSpacingForFee(500), 10);
    assert.equal(configuration.pool.getTickSpacingForFee(2500), undefined);
    assert.throws(() => configuration.pool.getFeeTier("custom"), /Unknown fee tier: custom/);
  });

  it("Can add a fee tier", () => {
    configuration.updateConfiguration({
      feeTiers: {
        custom: { fee: 2500, tickSpacing: 50 },
      },
    });

    assert.deepStrictEqual(configuration.pool.getFeeTier("custom"), {
      fee: 2500,
      tickSpacing: 50,
    });
    assert.equal(configuration.pool.getTickSpacingForFee(2500), 50);
    assert.equal(configuration.pool.getFeeTier("low").tickSpacing, 10);
  });

  it("Returned fee tiers are copies", () => {
    const tier = configuration.pool.getFeeTier("high");
    tier.tickSpacing = 1;
    assert.equal(configuration.pool.getFeeTier("high").tickSpacing, 200);

    const config = configuration.getConfiguration();
    config.defaultHookData = "0x01";
    assert.equal(configuration.pool.getDefaultHookData(), "0x");
  });

  it("packs the default protocol fee", () => {
    assert.equal(configuration.pool.getDefaultProtocolFee(), 0);

    configuration.updateConfiguration({
      defaultProtocolFee: { zeroForOne: 1000, oneForZero: 500 },
    });
    assert.equal(configuration.pool.getDefaultProtocolFee(), 1000 | (500 << 12));

    configuration.updateConfiguration({ defaultProtocolFee: { oneForZero: 1001 } });
    assert.throws(
      () => configuration.pool.getDefaultProtocolFee(),
      /Invalid default protocol fee: 1000\/1001/,
    );
  });

  it("Reset of configuration reverts additions and changes", () => {
    configuration.updateConfiguration({
      feeTiers: {
        medium: { fee: 3000, tickSpacing: 30 },
        custom: { fee: 2500, tickSpacing: 50 },
      },
      defaultHookData: "0xbeef",
    });

    assert.equal(configuration.pool.getFeeTier("medium").tickSpacing, 30);
    assert.equal(configuration.pool.getDefaultHookData(), "0xbeef");

    configuration.resetConfiguration();

    assert.equal(configuration.pool.getFeeTier("medium").tickSpacing, 60);
    assert.throws(() => configuration.pool.getFeeTier("custom"));
    assert.equal(configuration.pool.getDefaultHookData(), "0x");
  });
});
