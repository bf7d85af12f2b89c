import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { calculateEmi, calculateMaxLoanForEmi } from "../emi";
import { compactDate, compactTimestamp, formatRupees, longDate } from "../format";

describe("calculateEmi", () => {
  it("applies the reducing-balance formula and rounds to paise", () => {
    assert.equal(calculateEmi(300_000, 10.5, 24), 13912.81);
    assert.equal(calculateEmi(500_000, 11.5, 12), 44307.53);
    assert.equal(calculateEmi(500_000, 11.5, 36), 16488);
  });

  it("splits the principal evenly at a zero rate", () => {
    assert.equal(calculateEmi(120_000, 0, 12), 10_000);
  });

  it("falls as the tenure grows", () => {
    assert.ok(calculateEmi(500_000, 11.5, 36) < calculateEmi(500_000, 11.5, 24));
  });
});

describe("calculateMaxLoanForEmi", () => {
  it("inverts the EMI formula to the nearest rupee", () => {
    assert.equal(calculateMaxLoanForEmi(30_000, 11.5, 12), 338_543);
  });

  it("multiplies out at a zero rate", () => {
    assert.equal(calculateMaxLoanForEmi(10_000, 0, 12), 120_000);
  });

  it("yields a principal whose EMI fits the budget", () => {
    const principal = calculateMaxLoanForEmi(30_000, 11.5, 12);
    assert.ok(calculateEmi(principal, 11.5, 12) <= 30_000.01);
  });
});

describe("format helpers", () => {
  it("groups rupees the Indian way", () => {
    assert.equal(formatRupees(300_000), "₹3,00,000");
    assert.equal(formatRupees(5_000_000), "₹50,00,000");
    assert.equal(formatRupees(10_000), "₹10,000");
    assert.equal(formatRupees(13912.81), "₹13,913");
  });

  it("formats dates for references and letters", () => {
    const date = new Date(2025, 2, 7, 9, 5, 3);
    assert.equal(compactDate(date), "20250307");
    assert.equal(compactTimestamp(date), "20250307_090503");
    assert.equal(longDate(date), "March 07, 2025");
  });
});
