// src/agents/sales/SalesAgent.ts
import { BaseAgent, AgentResponse, normaliseReply } from '../BaseAgent';
import { LoanSession } from '../../types/types';
import { calculateEmi } from '../../utils/emi';
import { formatRupees } from '../../utils/format';
import { logger } from '../../utils/logger';

const AFFIRMATIVE = new Set(['yes', 'y', 'proceed', 'ok', 'sure', 'yeah']);
const NEGATIVE = new Set(['no', 'n', 'cancel', 'stop']);

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;
const TENURE_PATTERN = /^\+?\d+$/;

/**
 * Collects the loan amount and tenure, quotes an EMI estimate and asks the
 * customer to go ahead.
 */
export class SalesAgent extends BaseAgent {
    async handle(input: string, session: LoanSession): Promise<AgentResponse> {
        switch (session.step) {
            case 'GREETING':
                return this.advance(this.getInitialMessage(), 'GREETED');
            case 'ASK_AMOUNT':
                return this.captureAmount(input, session);
            case 'ASK_TENURE':
                return this.captureTenure(input, session);
            case 'CONFIRM_LOAN':
                return this.confirm(input, session);
            default:
                throw new Error(`SalesAgent cannot handle step ${session.step}`);
        }
    }

    getInitialMessage(): string {
        const { minAmount, maxAmount } = this.policy.loan;
        return (
            "Welcome to our Personal Loan service! 🏦\n\n" +
            "I'm here to help you find a loan offer that fits your needs.\n\n" +
            `To get started, how much would you like to borrow? (${formatRupees(minAmount)} - ${formatRupees(maxAmount)})`
        );
    }

    private captureAmount(input: string, session: LoanSession): AgentResponse {
        const cleaned = input.replace(/,/g, '').replace(/₹/g, '').trim();
        if (!AMOUNT_PATTERN.test(cleaned)) {
            return this.reprompt("I couldn't understand that amount. Please enter a number, e.g. 300000 or 3,00,000.");
        }

        const amount = Number(cleaned);
        const { minAmount, maxAmount, minTenureMonths, maxTenureMonths } = this.policy.loan;
        if (amount < minAmount) {
            return this.reprompt(`The minimum loan amount is ${formatRupees(minAmount)}. Please enter a valid amount.`);
        }
        if (amount > maxAmount) {
            return this.reprompt(`The maximum loan amount is ${formatRupees(maxAmount)}. Please enter a valid amount.`);
        }

        session.loanAmount = amount;
        logger.info('Loan amount captured', { sessionId: session.id, amount });
        return this.advance(
            `Great! You've requested a loan of ${formatRupees(amount)}. ` +
            `Now, please tell me your preferred tenure in months (${minTenureMonths} to ${maxTenureMonths} months).`,
            'AMOUNT_CAPTURED'
        );
    }

    private captureTenure(input: string, session: LoanSession): AgentResponse {
        const cleaned = input.trim();
        if (!TENURE_PATTERN.test(cleaned)) {
            return this.reprompt('Please enter a valid number of months, e.g. 24 or 36.');
        }

        const tenure = Number(cleaned);
        const { minTenureMonths, maxTenureMonths } = this.policy.loan;
        if (tenure < minTenureMonths) {
            return this.reprompt(`Minimum tenure is ${minTenureMonths} months. Please enter a valid tenure.`);
        }
        if (tenure > maxTenureMonths) {
            return this.reprompt(`Maximum tenure is ${maxTenureMonths} months. Please enter a valid tenure.`);
        }

        const amount = session.loanAmount ?? 0;
        const emi = calculateEmi(amount, session.interestRate, tenure);
        session.tenureMonths = tenure;
        session.estimatedEmi = emi;
        logger.info('Tenure captured', { sessionId: session.id, tenure, emi });

        return this.advance(
            "Excellent choice! Here's your loan summary:\n\n" +
            `📋 Loan Amount: ${formatRupees(amount)}\n` +
            `📅 Tenure: ${tenure} months\n` +
            `💰 Interest Rate: ${session.interestRate}% p.a.\n` +
            `💵 Estimated EMI: ${formatRupees(emi)}/month\n\n` +
            'Shall I proceed with the verification? (Yes/No)',
            'TENURE_CAPTURED'
        );
    }

    private confirm(input: string, session: LoanSession): AgentResponse {
        const reply = normaliseReply(input);
        if (AFFIRMATIVE.has(reply)) {
            logger.info('Loan confirmed by customer', { sessionId: session.id });
            return this.advance('Perfect! Let me verify your details from our records...', 'LOAN_CONFIRMED');
        }
        if (NEGATIVE.has(reply)) {
            logger.info('Loan cancelled by customer', { sessionId: session.id });
            return this.advance(
                'No problem! If you change your mind, feel free to start again. Have a great day!',
                'LOAN_CANCELLED'
            );
        }
        return this.reprompt("Please respond with 'Yes' to proceed or 'No' to cancel.");
    }
}
