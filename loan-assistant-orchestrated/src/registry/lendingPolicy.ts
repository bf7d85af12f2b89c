// src/registry/lendingPolicy.ts
import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import { appConfig } from "../config/appConfig";
import { logger } from "../utils/logger";

const policySchema = z.object({
  lender: z.object({
    name: z.string().min(1),
    tagline: z.string(),
    referencePrefix: z.string().min(1),
  }),
  loan: z
    .object({
      minAmount: z.number().positive(),
      maxAmount: z.number().positive(),
      minTenureMonths: z.number().int().positive(),
      maxTenureMonths: z.number().int().positive(),
      defaultInterestRate: z.number().nonnegative(),
    })
    .refine(l => l.minAmount <= l.maxAmount, "loan.minAmount must not exceed loan.maxAmount")
    .refine(l => l.minTenureMonths <= l.maxTenureMonths, "loan.minTenureMonths must not exceed loan.maxTenureMonths"),
  underwriting: z.object({
    minCreditScore: z.number().int().nonnegative(),
    salarySlipMultiplier: z.number().min(1),
    maxEmiToSalaryRatio: z.number().positive().max(1),
  }),
});

export type LendingPolicy = z.infer<typeof policySchema>;

let lendingPolicy: LendingPolicy | null = null;

export function parseLendingPolicy(source: string): LendingPolicy {
  return policySchema.parse(yaml.load(source));
}

export function loadLendingPolicy(policyPath?: string): LendingPolicy {
  if (lendingPolicy && !policyPath) return lendingPolicy;

  const policyFile = policyPath || appConfig.lendingPolicyPath;
  try {
    const policy = parseLendingPolicy(fs.readFileSync(policyFile, "utf8"));
    if (!policyPath) {
      lendingPolicy = policy;
    }
    logger.info("Lending policy loaded", { policyFile });
    return policy;
  } catch (error) {
    logger.error("Failed to load lending policy", {
      policyFile,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new Error(`Failed to load lending policy from ${policyFile}`, { cause: error });
  }
}
