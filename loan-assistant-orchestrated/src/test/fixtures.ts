import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadLendingPolicy } from "../registry/lendingPolicy";
import { JsonCustomerRepository } from "../repositories/customerRepository";
import type { Customer, LoanSession } from "../types/types";

export const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");
export const POLICY_PATH = path.join(PACKAGE_ROOT, "config", "lending.yaml");
export const DATA_DIR = path.join(PACKAGE_ROOT, "data");

export const testPolicy = loadLendingPolicy(POLICY_PATH);

export const ASHA: Customer = {
  id: "TC001",
  name: "Asha Rao",
  phone: "9000000001",
  city: "Pune",
  creditScore: 780,
  preApprovedLimit: 500_000,
  monthlySalary: 85_000,
};

export const BALA: Customer = {
  id: "TC002",
  name: "Bala Krishnan",
  phone: "9000000002",
  city: "Madurai",
  creditScore: 720,
  preApprovedLimit: 300_000,
  monthlySalary: 60_000,
};

/** Below the minimum credit score, and no offer on file. */
export const CHITRA: Customer = {
  id: "TC003",
  name: "Chitra Sen",
  phone: "9000000003",
  city: "Kolkata",
  creditScore: 650,
  preApprovedLimit: 400_000,
  monthlySalary: 70_000,
};

export function testCustomers(): JsonCustomerRepository {
  return new JsonCustomerRepository(
    [ASHA, BALA, CHITRA],
    [
      { customerId: ASHA.id, interestRate: 10.5 },
      { customerId: BALA.id, interestRate: 11.5 },
    ],
  );
}

export function makeSession(overrides: Partial<LoanSession> = {}): LoanSession {
  return {
    id: "session-test",
    createdAt: 0,
    step: "GREETING",
    history: [],
    interestRate: testPolicy.loan.defaultInterestRate,
    kycVerified: false,
    messages: [],
    ...overrides,
  };
}

export function makeTempDir(prefix = "loan-assistant-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
