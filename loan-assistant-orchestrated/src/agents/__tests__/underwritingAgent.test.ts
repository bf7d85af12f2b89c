import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { UnderwritingAgent } from "../underwriting/UnderwritingAgent";
import { ASHA, BALA, CHITRA, makeSession, testPolicy } from "../../test/fixtures";
import type { Customer, LoanSession, SalarySlip } from "../../types/types";

const agent = new UnderwritingAgent(testPolicy);

const SLIP: SalarySlip = {
  originalName: "slip.pdf",
  mimeType: "application/pdf",
  filePath: "/tmp/slip.pdf",
  size: 1024,
  uploadedAt: 0,
};

function sessionFor(customer: Customer, loanAmount: number, tenureMonths: number, interestRate: number): LoanSession {
  return makeSession({ step: "UNDERWRITING", customer, loanAmount, tenureMonths, interestRate, kycVerified: true });
}

describe("UnderwritingAgent", () => {
  it("approves within the pre-approved limit", async () => {
    const session = sessionFor(ASHA, 300_000, 24, 10.5);
    const response = await agent.handle("", session);

    assert.equal(response.event, "LOAN_APPROVED");
    assert.deepEqual(session.decision, { outcome: "APPROVE", reason: "within_preapproved_limit", emi: 13912.81 });
    assert.equal(
      response.message,
      "🎉 Congratulations! Your loan is APPROVED!\n\n" +
        "📋 Loan Details:\n" +
        "• Loan Amount: ₹3,00,000\n" +
        "• Tenure: 24 months\n" +
        "• Interest Rate: 10.5% p.a.\n" +
        "• Monthly EMI: ₹13,913\n\n" +
        "Your loan is within your pre-approved limit of ₹5,00,000.\n" +
        "I'm generating your sanction letter now...",
    );
  });

  it("asks for a salary slip above the limit", async () => {
    const session = sessionFor(BALA, 500_000, 12, 11.5);
    const response = await agent.handle("", session);

    assert.equal(response.event, "SALARY_SLIP_REQUESTED");
    assert.equal(response.showUpload, true);
    assert.equal(session.decision?.reason, "salary_verification_required");
    assert.equal(
      response.message,
      "📝 Additional Verification Required\n\n" +
        "Your requested loan amount (₹5,00,000) exceeds your pre-approved limit of ₹3,00,000.\n\n" +
        "To proceed, I'll need to verify your income. Please upload your latest salary slip.\n\n" +
        "Click the 'Upload Salary Slip' button below to continue.",
    );
  });

  it("approves with a slip when the EMI fits the salary", async () => {
    const session = sessionFor(BALA, 500_000, 36, 11.5);
    session.salarySlip = SLIP;
    const response = await agent.handle("", session);

    assert.equal(response.event, "LOAN_APPROVED");
    assert.equal(session.decision?.reason, "salary_verified");
    assert.ok(
      response.message.endsWith(
        "• Monthly EMI: ₹16,488\n\n" +
          "Your salary verification was successful.\n" +
          "EMI to Income Ratio: 27.5% (within 50% limit)\n\n" +
          "I'm generating your sanction letter now...",
      ),
    );
  });

  it("rejects with a slip when the EMI is too high and quotes an affordable amount", async () => {
    const session = sessionFor(BALA, 500_000, 12, 11.5);
    session.salarySlip = SLIP;
    const response = await agent.handle("", session);

    assert.equal(response.event, "LOAN_REJECTED");
    assert.equal(session.decision?.reason, "high_emi_ratio");
    assert.equal(
      response.message,
      "❌ Loan Application Status: NOT APPROVED\n\n" +
        "Your EMI (₹44,308) exceeds 50% of your monthly salary (₹60,000).\n" +
        "EMI to Income Ratio: 73.8%\n\n" +
        "Maximum loan amount you can avail with your income: ₹3,38,543\n\n" +
        "Would you like to apply for a lower amount? Please start a new application.",
    );
  });

  it("rejects above twice the limit with the maximum eligible amount", async () => {
    const response = await agent.handle("", sessionFor(BALA, 700_000, 24, 11.5));

    assert.equal(response.event, "LOAN_REJECTED");
    assert.equal(
      response.message,
      "❌ Loan Application Status: NOT APPROVED\n\n" +
        "Your requested loan amount (₹7,00,000) exceeds the maximum eligible amount.\n" +
        "Maximum eligible: ₹6,00,000 (2× your pre-approved limit)\n\n" +
        "Would you like to apply for a lower amount? Please start a new application with an amount up to ₹6,00,000.",
    );
  });

  it("rejects a low credit score", async () => {
    const session = sessionFor(CHITRA, 100_000, 24, 10.5);
    const response = await agent.handle("", session);

    assert.equal(response.event, "LOAN_REJECTED");
    assert.equal(session.decision?.reason, "low_credit_score");
    assert.ok(
      response.message.startsWith(
        "❌ Loan Application Status: NOT APPROVED\n\n" +
          "Unfortunately, we cannot approve your loan at this time.\n" +
          "Reason: Your credit score (650) does not meet our minimum requirement of 700.\n\n",
      ),
    );
  });

  it("refuses a session without loan terms", async () => {
    await assert.rejects(agent.handle("", makeSession({ step: "UNDERWRITING", customer: ASHA })), {
      message: "Session session-test is missing customer or loan details for underwriting",
    });
  });
});
