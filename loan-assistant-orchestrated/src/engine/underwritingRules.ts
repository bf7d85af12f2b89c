import { RulesEngine } from './RulesEngine';
import { calculateEmi } from '../utils/emi';
import type { LendingPolicy } from '../registry/lendingPolicy';
import type { DecisionOutcome, DecisionReason, UnderwritingDecision, UnderwritingInput } from '../types/types';

type UnderwritingThresholds = LendingPolicy['underwriting'];

interface RuleContext extends UnderwritingInput {
    emi: number;
    thresholds: UnderwritingThresholds;
}

const DEFAULT_THRESHOLDS: UnderwritingThresholds = {
    minCreditScore: 700,
    salarySlipMultiplier: 2,
    maxEmiToSalaryRatio: 0.5
};

const result = (outcome: DecisionOutcome, reason: DecisionReason) =>
    (ctx: RuleContext): UnderwritingDecision => ({ outcome, reason, emi: ctx.emi });

const underwritingEngine = new RulesEngine<RuleContext, UnderwritingDecision>(
    [
        {
            name: 'minimum-credit-score',
            condition: ctx => ctx.creditScore < ctx.thresholds.minCreditScore,
            action: result('REJECT', 'low_credit_score')
        },
        {
            name: 'within-preapproved-limit',
            condition: ctx => ctx.requestedAmount <= ctx.preApprovedLimit,
            action: result('APPROVE', 'within_preapproved_limit')
        },
        {
            name: 'beyond-salary-verified-limit',
            condition: ctx => ctx.requestedAmount > ctx.thresholds.salarySlipMultiplier * ctx.preApprovedLimit,
            action: result('REJECT', 'exceeds_maximum_limit')
        },
        {
            name: 'salary-slip-required',
            condition: ctx => !ctx.hasSalarySlip,
            action: result('REQUEST_SALARY_SLIP', 'salary_verification_required')
        },
        {
            name: 'emi-affordable',
            condition: ctx => ctx.emi <= ctx.thresholds.maxEmiToSalaryRatio * ctx.monthlySalary,
            action: result('APPROVE', 'salary_verified')
        }
    ],
    result('REJECT', 'high_emi_ratio')
);

/**
 * Underwriting decision for a loan request. Pure: the same input always
 * yields the same outcome.
 */
export function decide(
    input: UnderwritingInput,
    thresholds: UnderwritingThresholds = DEFAULT_THRESHOLDS
): UnderwritingDecision {
    const emi = calculateEmi(input.requestedAmount, input.annualInterestRate, input.tenureMonths);
    return underwritingEngine.evaluate({ ...input, emi, thresholds });
}
