// src/agents/verification/VerificationAgent.ts
import { BaseAgent, AgentResponse, normaliseReply } from '../BaseAgent';
import type { LendingPolicy } from '../../registry/lendingPolicy';
import type { CustomerRepository } from '../../repositories/customerRepository';
import { LoanSession } from '../../types/types';
import { logger } from '../../utils/logger';

const CONFIRMS = new Set(['yes', 'y', 'correct', 'right', 'ok']);
const DENIES = new Set(['no', 'n', 'wrong', 'incorrect']);
const RETRIES = new Set(['yes', 'y']);

/**
 * KYC step: looks the customer up by registered phone number and asks them
 * to confirm the record on file.
 */
export class VerificationAgent extends BaseAgent {
    constructor(policy: LendingPolicy, private readonly customers: CustomerRepository) {
        super(policy);
    }

    async handle(input: string, session: LoanSession): Promise<AgentResponse> {
        switch (session.step) {
            case 'ASK_PHONE':
                return this.lookUp(input, session);
            case 'CONFIRM_IDENTITY':
                return this.confirmIdentity(input, session);
            case 'CUSTOMER_NOT_FOUND':
                return this.retryOrLeave(input);
            default:
                throw new Error(`VerificationAgent cannot handle step ${session.step}`);
        }
    }

    getInitialMessage(): string {
        return 'To verify your identity, please enter your registered 10-digit phone number.';
    }

    private lookUp(input: string, session: LoanSession): AgentResponse {
        const phone = input.trim().replace(/[ -]/g, '');
        if (!/^\d{10}$/.test(phone)) {
            return this.reprompt('Please enter a valid 10-digit phone number.');
        }

        const customer = this.customers.findByPhone(phone);
        if (!customer) {
            logger.info('No customer on file for phone', { sessionId: session.id });
            return this.advance(
                "❌ Sorry, I couldn't find your profile in our records.\n" +
                'Please check your phone number or contact our branch for assistance.\n\n' +
                'Would you like to try again with a different number? (Yes/No)',
                'CUSTOMER_MISSING'
            );
        }

        session.customer = customer;
        const offer = this.customers.findOfferByCustomerId(customer.id);
        if (offer) {
            session.offer = offer;
            session.interestRate = offer.interestRate;
        }
        logger.info('Customer found', { sessionId: session.id, customerId: customer.id, hasOffer: Boolean(offer) });

        return this.advance(
            '✅ Verification Successful!\n\n' +
            'I found your profile in our records:\n' +
            `👤 Name: ${customer.name}\n` +
            `📍 City: ${customer.city}\n` +
            `📞 Phone: ${customer.phone}\n\n` +
            'Is this information correct? (Yes/No)',
            'CUSTOMER_FOUND'
        );
    }

    private confirmIdentity(input: string, session: LoanSession): AgentResponse {
        const reply = normaliseReply(input);
        if (CONFIRMS.has(reply)) {
            session.kycVerified = true;
            logger.info('Identity confirmed', { sessionId: session.id, customerId: session.customer?.id });
            return this.advance(
                'Great! Your identity has been verified. Let me now check your eligibility...',
                'IDENTITY_CONFIRMED'
            );
        }
        if (DENIES.has(reply)) {
            session.customer = undefined;
            session.offer = undefined;
            session.interestRate = this.policy.loan.defaultInterestRate;
            logger.info('Identity not confirmed, asking for phone again', { sessionId: session.id });
            return this.advance(
                'I apologize for the confusion. Please enter your registered phone number again.',
                'IDENTITY_REJECTED'
            );
        }
        return this.reprompt("Please respond with 'Yes' if the details are correct or 'No' if they're not.");
    }

    private retryOrLeave(input: string): AgentResponse {
        if (RETRIES.has(normaliseReply(input))) {
            return this.advance('Please enter your registered 10-digit phone number.', 'RETRY_PHONE');
        }
        return this.advance(
            'Thank you for your interest. Please visit our nearest branch for assistance. Have a great day!',
            'GAVE_UP'
        );
    }
}
