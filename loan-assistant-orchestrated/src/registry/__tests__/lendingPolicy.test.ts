import { describe, it } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { ZodError } from "zod";

import { loadLendingPolicy, parseLendingPolicy } from "../lendingPolicy";
import { POLICY_PATH, makeTempDir } from "../../test/fixtures";

const VALID_POLICY = `
lender:
  name: Test Lender
  tagline: A test lender
  referencePrefix: TL/PL
loan:
  minAmount: 5000
  maxAmount: 200000
  minTenureMonths: 6
  maxTenureMonths: 24
  defaultInterestRate: 12
underwriting:
  minCreditScore: 650
  salarySlipMultiplier: 1.5
  maxEmiToSalaryRatio: 0.4
`;

describe("parseLendingPolicy", () => {
  it("reads every section of the policy", () => {
    const policy = parseLendingPolicy(VALID_POLICY);
    assert.deepEqual(policy, {
      lender: { name: "Test Lender", tagline: "A test lender", referencePrefix: "TL/PL" },
      loan: { minAmount: 5000, maxAmount: 200000, minTenureMonths: 6, maxTenureMonths: 24, defaultInterestRate: 12 },
      underwriting: { minCreditScore: 650, salarySlipMultiplier: 1.5, maxEmiToSalaryRatio: 0.4 },
    });
  });

  it("rejects inverted amount bounds", () => {
    const inverted = VALID_POLICY.replace("minAmount: 5000", "minAmount: 500000");
    assert.throws(() => parseLendingPolicy(inverted), ZodError);
  });

  it("rejects a missing section", () => {
    const withoutUnderwriting = VALID_POLICY.slice(0, VALID_POLICY.indexOf("underwriting:"));
    assert.throws(() => parseLendingPolicy(withoutUnderwriting), ZodError);
  });
});

describe("loadLendingPolicy", () => {
  it("loads the bundled policy", () => {
    const policy = loadLendingPolicy(POLICY_PATH);
    assert.equal(policy.lender.name, "Capital Finance Ltd.");
    assert.equal(policy.lender.referencePrefix, "CFL/PL");
    assert.equal(policy.loan.minAmount, 10_000);
    assert.equal(policy.loan.maxAmount, 5_000_000);
    assert.equal(policy.loan.defaultInterestRate, 10.5);
    assert.deepEqual(policy.underwriting, { minCreditScore: 700, salarySlipMultiplier: 2, maxEmiToSalaryRatio: 0.5 });
  });

  it("wraps a missing file in a load error", () => {
    const missing = path.join(makeTempDir(), "absent.yaml");
    assert.throws(() => loadLendingPolicy(missing), {
      message: `Failed to load lending policy from ${missing}`,
    });
  });
});
