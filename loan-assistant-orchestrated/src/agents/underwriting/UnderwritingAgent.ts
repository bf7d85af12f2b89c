// src/agents/underwriting/UnderwritingAgent.ts
import { BaseAgent, AgentResponse } from '../BaseAgent';
import { decide } from '../../engine/underwritingRules';
import { Customer, LoanSession, UnderwritingDecision } from '../../types/types';
import { calculateMaxLoanForEmi } from '../../utils/emi';
import { formatRupees } from '../../utils/format';
import { logger } from '../../utils/logger';

interface LoanTerms {
    customer: Customer;
    amount: number;
    tenure: number;
    rate: number;
}

export class UnderwritingAgent extends BaseAgent {
    async handle(_input: string, session: LoanSession): Promise<AgentResponse> {
        const terms = this.requireTerms(session);
        const { customer, amount, tenure, rate } = terms;

        const decision = decide(
            {
                creditScore: customer.creditScore,
                requestedAmount: amount,
                preApprovedLimit: customer.preApprovedLimit,
                monthlySalary: customer.monthlySalary,
                hasSalarySlip: Boolean(session.salarySlip),
                tenureMonths: tenure,
                annualInterestRate: rate
            },
            this.policy.underwriting
        );
        session.decision = decision;

        logger.info('Underwriting decision', {
            sessionId: session.id,
            customerId: customer.id,
            creditScore: customer.creditScore,
            preApprovedLimit: customer.preApprovedLimit,
            requestedAmount: amount,
            monthlySalary: customer.monthlySalary,
            emi: decision.emi,
            outcome: decision.outcome,
            reason: decision.reason
        });

        switch (decision.outcome) {
            case 'APPROVE':
                return this.advance(this.approvalMessage(terms, decision), 'LOAN_APPROVED');
            case 'REQUEST_SALARY_SLIP':
                return { ...this.advance(this.salarySlipMessage(terms), 'SALARY_SLIP_REQUESTED'), showUpload: true };
            case 'REJECT':
                return this.advance(this.rejectionMessage(terms, decision), 'LOAN_REJECTED');
        }
    }

    private requireTerms(session: LoanSession): LoanTerms {
        const { customer, loanAmount, tenureMonths } = session;
        if (!customer || loanAmount === undefined || tenureMonths === undefined) {
            throw new Error(`Session ${session.id} is missing customer or loan details for underwriting`);
        }
        return { customer, amount: loanAmount, tenure: tenureMonths, rate: session.interestRate };
    }

    private emiToIncomePercent(emi: number, salary: number): number {
        return salary > 0 ? (emi / salary) * 100 : 100;
    }

    private approvalMessage({ customer, amount, tenure, rate }: LoanTerms, decision: UnderwritingDecision): string {
        const details =
            '🎉 Congratulations! Your loan is APPROVED!\n\n' +
            '📋 Loan Details:\n' +
            `• Loan Amount: ${formatRupees(amount)}\n` +
            `• Tenure: ${tenure} months\n` +
            `• Interest Rate: ${rate}% p.a.\n` +
            `• Monthly EMI: ${formatRupees(decision.emi)}\n\n`;

        if (decision.reason === 'salary_verified') {
            const ratio = this.emiToIncomePercent(decision.emi, customer.monthlySalary);
            const limit = Math.round(this.policy.underwriting.maxEmiToSalaryRatio * 100);
            return (
                details +
                'Your salary verification was successful.\n' +
                `EMI to Income Ratio: ${ratio.toFixed(1)}% (within ${limit}% limit)\n\n` +
                "I'm generating your sanction letter now..."
            );
        }
        return (
            details +
            `Your loan is within your pre-approved limit of ${formatRupees(customer.preApprovedLimit)}.\n` +
            "I'm generating your sanction letter now..."
        );
    }

    private salarySlipMessage({ customer, amount }: LoanTerms): string {
        return (
            '📝 Additional Verification Required\n\n' +
            `Your requested loan amount (${formatRupees(amount)}) exceeds your pre-approved limit ` +
            `of ${formatRupees(customer.preApprovedLimit)}.\n\n` +
            "To proceed, I'll need to verify your income. Please upload your latest salary slip.\n\n" +
            "Click the 'Upload Salary Slip' button below to continue."
        );
    }

    private rejectionMessage({ customer, amount, tenure, rate }: LoanTerms, decision: UnderwritingDecision): string {
        const header = '❌ Loan Application Status: NOT APPROVED\n\n';
        const { minCreditScore, salarySlipMultiplier, maxEmiToSalaryRatio } = this.policy.underwriting;

        if (decision.reason === 'low_credit_score') {
            return (
                header +
                'Unfortunately, we cannot approve your loan at this time.\n' +
                `Reason: Your credit score (${customer.creditScore}) does not meet our minimum requirement of ${minCreditScore}.\n\n` +
                '💡 Tips to improve your credit score:\n' +
                '• Pay all EMIs and credit card bills on time\n' +
                '• Keep credit utilisation below 30%\n' +
                '• Avoid multiple loan applications in a short period\n\n' +
                'Please try again after improving your credit score. Thank you for considering us!'
            );
        }

        if (decision.reason === 'exceeds_maximum_limit') {
            const maxEligible = salarySlipMultiplier * customer.preApprovedLimit;
            return (
                header +
                `Your requested loan amount (${formatRupees(amount)}) exceeds the maximum eligible amount.\n` +
                `Maximum eligible: ${formatRupees(maxEligible)} (${salarySlipMultiplier}× your pre-approved limit)\n\n` +
                'Would you like to apply for a lower amount? Please start a new application with an amount ' +
                `up to ${formatRupees(maxEligible)}.`
            );
        }

        const salary = customer.monthlySalary;
        const ratio = this.emiToIncomePercent(decision.emi, salary);
        const maxLoan = calculateMaxLoanForEmi(maxEmiToSalaryRatio * salary, rate, tenure);
        return (
            header +
            `Your EMI (${formatRupees(decision.emi)}) exceeds ${Math.round(maxEmiToSalaryRatio * 100)}% ` +
            `of your monthly salary (${formatRupees(salary)}).\n` +
            `EMI to Income Ratio: ${ratio.toFixed(1)}%\n\n` +
            `Maximum loan amount you can avail with your income: ${formatRupees(maxLoan)}\n\n` +
            'Would you like to apply for a lower amount? Please start a new application.'
        );
    }
}
