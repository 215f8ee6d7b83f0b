/**
 * Liquidation Engine Tests
 */

import { parseEther } from "ethers";
import { WAD } from "../math";
import { RiskEngineError } from "../errors";
import type { Changeset } from "../ledger-state";
import type { LiquidationRequest } from "../types";
import { T0, createComponents, makeAsset } from "./helpers/fixtures";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof RiskEngineError) return err.code;
    throw err;
  }
  return undefined;
}

function request(overrides: Partial<LiquidationRequest> = {}): LiquidationRequest {
  return {
    liquidator: "liquidator",
    account: "alice",
    repayAsset: "Y",
    repayAmount: parseEther("35"),
    seizeAsset: "X",
    ...overrides,
  };
}

describe("LiquidationEngine", () => {
  let c: ReturnType<typeof createComponents>;

  function commit<T>(fn: (cs: Changeset) => T): T {
    const cs = c.ledger.begin();
    const result = fn(cs);
    cs.commit();
    return result;
  }

  function liquidate(overrides: Partial<LiquidationRequest> = {}) {
    return commit((cs) => c.liquidation.liquidate(cs, request(overrides), T0));
  }

  describe("100 X collateral, 70 Y debt", () => {
    beforeEach(() => {
      c = createComponents();
      commit((cs) => {
        c.ledger.deposit(cs, "bob", "Y", parseEther("100"), T0);
        c.ledger.deposit(cs, "alice", "X", parseEther("100"), T0);
      });
      commit((cs) => c.ledger.borrow(cs, "alice", "Y", parseEther("70"), T0));
    });

    it("rejects a healthy account", () => {
      expect(codeOf(() => liquidate())).toBe("NotLiquidatable");
    });

    describe("after X falls to $0.80", () => {
      beforeEach(() => {
        c.prices.setPrice("X", parseEther("0.8"));
      });

      it("seizes repay value plus a 10% incentive", () => {
        const outcome = liquidate();
        expect(outcome.repaidAmount).toBe(parseEther("35"));
        expect(outcome.liquidatorPaid).toBe(parseEther("35"));
        expect(outcome.seizedAmount).toBe(parseEther("48.125"));
        expect(outcome.incentivePaid).toBe(parseEther("4.375"));
        expect(outcome.badDebtIncurred).toBe(0n);
        expect(outcome.residualBadDebt).toEqual([]);
        expect(outcome.event).toEqual({
          account: "alice",
          liquidator: "liquidator",
          repayAsset: "Y",
          repaidAmount: parseEther("35"),
          liquidatorPaid: parseEther("35"),
          seizeAsset: "X",
          seizedAmount: parseEther("48.125"),
          incentivePaid: parseEther("4.375"),
          badDebtIncurred: 0n,
          timestamp: T0,
        });

        expect(c.ledger.getAccountPosition("alice", "Y", T0).debtAmount).toBe(parseEther("35"));
        expect(c.ledger.getAccountPosition("alice", "X", T0).collateralAmount).toBe(parseEther("51.875"));
        expect(c.store.getMarket("Y").cash).toBe(parseEther("65"));
        expect(c.ledger.getAccountPosition("liquidator", "X", T0).collateralAmount).toBe(parseEther("48.125"));
        expect(c.store.getMarket("X").cash).toBe(parseEther("100"));
        expect(c.store.getMarket("X").totalSupplyScaled).toBe(parseEther("100"));
      });

      it("hands over collateral even when the seize market is lent out", () => {
        commit((cs) => c.ledger.deposit(cs, "carol", "Y", parseEther("200"), T0));
        commit((cs) => c.ledger.borrow(cs, "carol", "X", parseEther("95"), T0));
        expect(c.store.getMarket("X").cash).toBe(parseEther("5"));

        const outcome = liquidate();
        expect(outcome.seizedAmount).toBe(parseEther("48.125"));
        expect(c.ledger.getAccountPosition("liquidator", "X", T0).collateralAmount).toBe(parseEther("48.125"));
        expect(c.ledger.getAccountPosition("alice", "X", T0).collateralAmount).toBe(parseEther("51.875"));
        expect(c.store.getMarket("X").cash).toBe(parseEther("5"));
      });

      it("caps the repay at the close factor", () => {
        const outcome = liquidate({ repayAmount: parseEther("50") });
        expect(outcome.repaidAmount).toBe(parseEther("35"));
      });

      it("keeps the close factor at any health factor unless a threshold is set", () => {
        // HF = 100 × 0.4 × 0.8 / 70 ≈ 0.457
        c.prices.setPrice("X", parseEther("0.4"));
        const outcome = liquidate({ repayAmount: parseEther("70") });
        expect(outcome.repaidAmount).toBe(parseEther("35"));
        expect(outcome.seizedAmount).toBe(parseEther("96.25"));
        expect(c.ledger.getAccountPosition("alice", "Y", T0).debtAmount).toBe(parseEther("35"));
      });

      it("allows a full repay below the full-liquidation threshold", () => {
        c.liquidation.setFullLiquidationThreshold(parseEther("0.95"));
        const outcome = liquidate({ repayAmount: parseEther("70") });
        expect(outcome.repaidAmount).toBe(parseEther("70"));
        expect(outcome.seizedAmount).toBe(parseEther("96.25"));
      });

      it("honours a lower close factor", () => {
        c.liquidation.setCloseFactor(2_000n);
        expect(liquidate({ repayAmount: parseEther("70") }).repaidAmount).toBe(parseEther("14"));
      });

      it("proceeds on stale prices", () => {
        c.prices.setPrice("X", parseEther("0.8"), { isStale: true });
        expect(liquidate().seizedAmount).toBe(parseEther("48.125"));
      });

      it("rejects self-liquidation", () => {
        expect(codeOf(() => liquidate({ liquidator: "alice" }))).toBe("SelfLiquidation");
      });

      it("rejects a zero repay", () => {
        expect(codeOf(() => liquidate({ repayAmount: 0n }))).toBe("InvalidParameter");
      });

      it("rejects a repay asset the account does not owe", () => {
        expect(codeOf(() => liquidate({ repayAsset: "X" }))).toBe("InvalidParameter");
      });

      it("rejects a seize asset the account does not hold", () => {
        expect(codeOf(() => liquidate({ seizeAsset: "Y" }))).toBe("InvalidParameter");
      });

      it("rounds the seize amount as configured", () => {
        // 1 wei × 1.1 / 0.8
        expect(c.liquidation.preview(request({ repayAmount: 1n }), T0).seizedAmount).toBe(1n);
        const up = createComponents(undefined, { incentiveRounding: "up" });
        const setup = up.ledger.begin();
        up.ledger.deposit(setup, "bob", "Y", parseEther("100"), T0);
        up.ledger.deposit(setup, "alice", "X", parseEther("100"), T0);
        setup.commit();
        const borrow = up.ledger.begin();
        up.ledger.borrow(borrow, "alice", "Y", parseEther("70"), T0);
        borrow.commit();
        up.prices.setPrice("X", parseEther("0.8"));
        expect(up.liquidation.preview(request({ repayAmount: 1n }), T0).seizedAmount).toBe(3n);
      });

      it("preview leaves the ledger untouched", () => {
        const version = c.store.version;
        expect(c.liquidation.preview(request(), T0).seizedAmount).toBe(parseEther("48.125"));
        expect(c.store.version).toBe(version);
        expect(c.ledger.getAccountPosition("alice", "Y", T0).debtAmount).toBe(parseEther("70"));
      });

      it("never seizes more than the collateral or repays more than the close factor allows", () => {
        const collateralBefore = c.ledger.getAccountPosition("alice", "X", T0).collateralAmount;
        const debtBefore = c.ledger.getAccountPosition("alice", "Y", T0).debtAmount;
        const outcome = liquidate({ repayAmount: parseEther("1000") });
        expect(outcome.seizedAmount).toBeLessThanOrEqual(collateralBefore);
        expect(outcome.repaidAmount).toBeLessThanOrEqual(debtBefore / 2n);
      });
    });
  });

  describe("collateral shortfall", () => {
    beforeEach(() => {
      c = createComponents();
      c.prices.setPrice("X", parseEther("1.25"));
      commit((cs) => {
        c.ledger.deposit(cs, "bob", "Y", parseEther("2000"), T0);
        c.ledger.deposit(cs, "alice", "X", parseEther("1000"), T0);
      });
      commit((cs) => c.ledger.borrow(cs, "alice", "Y", parseEther("1000"), T0));
      c.prices.setPrice("X", parseEther("0.44"));
    });

    it("seizes all collateral and books the uncovered repay plus residual debt as bad debt", () => {
      const outcome = liquidate({ repayAmount: parseEther("500") });

      expect(outcome.seizedAmount).toBe(parseEther("1000"));
      expect(outcome.repaidAmount).toBe(parseEther("500"));
      expect(outcome.liquidatorPaid).toBe(parseEther("400"));
      expect(outcome.incentivePaid).toBe(90_909_090_909_090_909_090n);
      expect(outcome.residualBadDebt).toEqual([{ account: "alice", asset: "Y", amount: parseEther("500") }]);
      expect(outcome.badDebtIncurred).toBe(parseEther("600"));

      expect(c.ledger.getAccountPosition("alice", "Y", T0)).toEqual({ collateralAmount: 0n, debtAmount: 0n });
      expect(c.ledger.getAccountPosition("alice", "X", T0)).toEqual({ collateralAmount: 0n, debtAmount: 0n });
      expect(c.store.getBadDebt("alice", "Y")).toBe(parseEther("600"));
      expect(c.store.getMarket("Y").totalBadDebt).toBe(parseEther("600"));
      expect(c.store.getMarket("Y").cash).toBe(parseEther("1400"));
      expect(c.store.getMarket("Y").totalBorrowScaled).toBe(0n);
      expect(c.store.getMarket("X").cash).toBe(parseEther("1000"));
      expect(c.ledger.getAccountPosition("liquidator", "X", T0).collateralAmount).toBe(parseEther("1000"));
    });

    it("writes off bad debt, in part or in full", () => {
      liquidate({ repayAmount: parseEther("500") });
      expect(commit((cs) => c.liquidation.writeOffBadDebt(cs, "alice", "Y", parseEther("100")))).toBe(
        parseEther("100"),
      );
      expect(c.store.getBadDebt("alice", "Y")).toBe(parseEther("500"));
      expect(commit((cs) => c.liquidation.writeOffBadDebt(cs, "alice", "Y"))).toBe(parseEther("500"));
      expect(c.store.getMarket("Y").totalBadDebt).toBe(0n);
      expect(codeOf(() => c.liquidation.writeOffBadDebt(c.ledger.begin(), "alice", "Y"))).toBe("NoBadDebt");
    });

    it("covers bad debt from reserves", () => {
      liquidate({ repayAmount: parseEther("500") });
      expect(codeOf(() => c.liquidation.coverBadDebt(c.ledger.begin(), "alice", "Y", parseEther("600"), T0))).toBe(
        "InsufficientReserves",
      );

      commit((cs) => cs.setMarket("Y", { ...cs.getMarket("Y"), totalReserves: parseEther("700") }));
      commit((cs) => c.liquidation.coverBadDebt(cs, "alice", "Y", parseEther("600"), T0));
      expect(c.store.getMarket("Y").totalReserves).toBe(parseEther("100"));
      expect(c.store.getMarket("Y").totalBadDebt).toBe(0n);
      expect(c.store.getBadDebt("alice", "Y")).toBe(0n);
    });

    it("rejects covering more than is outstanding", () => {
      liquidate({ repayAmount: parseEther("500") });
      expect(codeOf(() => c.liquidation.coverBadDebt(c.ledger.begin(), "alice", "Y", parseEther("601"), T0))).toBe(
        "InvalidParameter",
      );
    });
  });

  describe("seize beyond one of several collaterals", () => {
    beforeEach(() => {
      c = createComponents([makeAsset("X"), makeAsset("Y"), makeAsset("Z")]);
      commit((cs) => {
        c.ledger.deposit(cs, "bob", "Y", parseEther("100"), T0);
        c.ledger.deposit(cs, "alice", "X", parseEther("10"), T0);
        c.ledger.deposit(cs, "alice", "Z", parseEther("100"), T0);
      });
      commit((cs) => c.ledger.borrow(cs, "alice", "Y", parseEther("80"), T0));
      c.prices.setPrice("Z", parseEther("0.5"));
    });

    it("fails with SeizeAmountExceedsCollateral while other collateral remains", () => {
      expect(codeOf(() => liquidate({ repayAmount: parseEther("20") }))).toBe("SeizeAmountExceedsCollateral");
    });

    it("accepts a repay the chosen collateral can cover", () => {
      const outcome = liquidate({ repayAmount: parseEther("9") });
      expect(outcome.seizedAmount).toBe(parseEther("9.9"));
      expect(outcome.badDebtIncurred).toBe(0n);
    });
  });

  describe("non-collateral supply", () => {
    beforeEach(() => {
      c = createComponents([makeAsset("X"), makeAsset("Y"), makeAsset("NC", { isCollateral: false })]);
      c.prices.setPrice("NC", WAD);
      commit((cs) => {
        c.ledger.deposit(cs, "bob", "Y", parseEther("100"), T0);
        c.ledger.deposit(cs, "alice", "X", parseEther("100"), T0);
        c.ledger.deposit(cs, "alice", "NC", parseEther("100"), T0);
      });
      commit((cs) => c.ledger.borrow(cs, "alice", "Y", parseEther("70"), T0));
      c.prices.setPrice("X", parseEther("0.8"));
    });

    it("cannot be seized", () => {
      expect(codeOf(() => liquidate({ seizeAsset: "NC" }))).toBe("InvalidParameter");
    });

    it("leaves the uncovered debt owed while other supply remains", () => {
      c.prices.setPrice("X", parseEther("0.3"));
      const outcome = liquidate();
      // 30 of X covers 30 / 1.1 of Y
      expect(outcome.seizedAmount).toBe(parseEther("100"));
      expect(outcome.repaidAmount).toBe(27_272_727_272_727_272_727n);
      expect(outcome.liquidatorPaid).toBe(27_272_727_272_727_272_727n);
      expect(outcome.incentivePaid).toBe(9_090_909_090_909_090_909n);
      expect(outcome.badDebtIncurred).toBe(0n);
      expect(outcome.residualBadDebt).toEqual([]);

      expect(c.ledger.getAccountPosition("alice", "Y", T0).debtAmount).toBe(42_727_272_727_272_727_273n);
      expect(c.ledger.getAccountPosition("alice", "NC", T0).collateralAmount).toBe(parseEther("100"));
      expect(c.store.getBadDebt("alice", "Y")).toBe(0n);
      expect(c.store.getMarket("Y").totalBadDebt).toBe(0n);
      expect(
        codeOf(() => commit((cs) => c.ledger.withdraw(cs, "alice", "NC", parseEther("100"), T0))),
      ).toBe("InsufficientCollateral");
    });
  });

  describe("settings", () => {
    beforeEach(() => {
      c = createComponents();
    });

    it("rejects a close factor outside (0, 100%]", () => {
      expect(codeOf(() => c.liquidation.setCloseFactor(0n))).toBe("InvalidParameter");
      expect(codeOf(() => c.liquidation.setCloseFactor(10_001n))).toBe("InvalidParameter");
      expect(c.liquidation.getSettings().closeFactorBps).toBe(5_000n);
    });

    it("rejects a full-liquidation threshold above 1.0", () => {
      expect(codeOf(() => c.liquidation.setFullLiquidationThreshold(WAD + 1n))).toBe("InvalidParameter");
    });

    it("maxRepay switches to the whole debt below the threshold", () => {
      expect(c.liquidation.maxRepay(100n, 1n)).toBe(50n);
      c.liquidation.setFullLiquidationThreshold(WAD / 2n);
      expect(c.liquidation.maxRepay(100n, WAD / 2n)).toBe(50n);
      expect(c.liquidation.maxRepay(100n, WAD / 2n - 1n)).toBe(100n);
    });
  });
});
