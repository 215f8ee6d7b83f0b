/**
 * Risk Parameter Store Tests
 */

import { RiskParameterStore, validateAssetParameters } from "../risk-parameter-store";
import { RiskEngineError } from "../errors";
import { makeAsset } from "./helpers/fixtures";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof RiskEngineError) return err.code;
    throw err;
  }
  return undefined;
}

describe("RiskParameterStore", () => {
  let store: RiskParameterStore;

  beforeEach(() => {
    store = new RiskParameterStore([makeAsset("X"), makeAsset("Y", { isCollateral: false })]);
  });

  describe("registerAsset", () => {
    it("lists registered assets in order", () => {
      expect(store.listAssets().map((a) => a.id)).toEqual(["X", "Y"]);
      expect(store.has("X")).toBe(true);
    });

    it("rejects a duplicate id", () => {
      expect(codeOf(() => store.registerAsset(makeAsset("X")))).toBe("InvalidParameter");
    });

    it("rejects out-of-range decimals", () => {
      expect(codeOf(() => store.registerAsset(makeAsset("Z", { decimals: 40 })))).toBe("InvalidParameter");
    });

    it("stores a copy of the caller's curve", () => {
      const asset = makeAsset("Z");
      store.registerAsset(asset);
      asset.interestRate.baseRateBps = 9_999n;
      expect(store.getAsset("Z").interestRate.baseRateBps).toBe(0n);
    });
  });

  describe("getAssetParameters", () => {
    it("fails with AssetNotFound for an unknown asset", () => {
      expect(codeOf(() => store.getAssetParameters("NOPE"))).toBe("AssetNotFound");
    });

    it("returns the governance parameters without identity fields", () => {
      const params = store.getAssetParameters("X");
      expect(params.collateralFactorBps).toBe(8_000n);
      expect(params).not.toHaveProperty("symbol");
    });
  });

  describe("setAssetParameters", () => {
    it("merges a partial update", () => {
      const next = store.setAssetParameters("X", { collateralFactorBps: 7_000n, interestRate: { baseRateBps: 100n } });
      expect(next.collateralFactorBps).toBe(7_000n);
      expect(next.liquidationThresholdBps).toBe(8_500n);
      expect(next.interestRate.baseRateBps).toBe(100n);
      expect(next.interestRate.kinkBps).toBe(8_000n);
      expect(store.getAsset("X").symbol).toBe("X");
    });

    it("rejects a liquidation threshold below the collateral factor", () => {
      expect(codeOf(() => store.setAssetParameters("X", { liquidationThresholdBps: 7_000n }))).toBe(
        "InvalidParameter",
      );
      expect(store.getAsset("X").liquidationThresholdBps).toBe(8_500n);
    });

    it("ignores the threshold ordering for non-collateral assets", () => {
      expect(() => store.setAssetParameters("Y", { liquidationThresholdBps: 1_000n })).not.toThrow();
    });

    it("rejects bps values above 100%", () => {
      expect(codeOf(() => store.setAssetParameters("X", { liquidationIncentiveBps: 10_001n }))).toBe(
        "InvalidParameter",
      );
      expect(codeOf(() => store.setAssetParameters("X", { interestRate: { reserveFactorBps: 10_001n } }))).toBe(
        "InvalidParameter",
      );
    });

    it("rejects a curve whose maximum rate exceeds 100%", () => {
      expect(
        codeOf(() => store.setAssetParameters("X", { interestRate: { slope1Bps: 3_000n, slope2Bps: 7_500n } })),
      ).toBe("InvalidParameter");
    });

    it("rejects a zero kink", () => {
      expect(codeOf(() => store.setAssetParameters("X", { interestRate: { kinkBps: 0n } }))).toBe("InvalidParameter");
    });

    it("fails with AssetNotFound for an unknown asset", () => {
      expect(codeOf(() => store.setAssetParameters("NOPE", { collateralFactorBps: 1n }))).toBe("AssetNotFound");
    });
  });

  it("validateAssetParameters names the asset in the message", () => {
    expect(() => validateAssetParameters("Q", { ...makeAsset("Q"), borrowCap: -1n })).toThrow(
      "InvalidParameter: Q: caps must be >= 0",
    );
  });
});
