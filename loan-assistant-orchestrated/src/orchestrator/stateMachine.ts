import { ConversationEvent, ConversationStep, LoanSession } from "../types/types";
import { logger } from "../utils/logger";

export class InvalidTransitionError extends Error {
    constructor(readonly from: ConversationStep, readonly event: ConversationEvent) {
        super(`Invalid transition: ${from} -> ${event}`);
        this.name = 'InvalidTransitionError';
    }
}

const transitions: Record<ConversationStep, Partial<Record<ConversationEvent, ConversationStep>>> = {
    'GREETING': {
        'GREETED': 'ASK_AMOUNT'
    },
    'ASK_AMOUNT': {
        'AMOUNT_CAPTURED': 'ASK_TENURE'
    },
    'ASK_TENURE': {
        'TENURE_CAPTURED': 'CONFIRM_LOAN'
    },
    'CONFIRM_LOAN': {
        'LOAN_CONFIRMED': 'ASK_PHONE',
        'LOAN_CANCELLED': 'ENDED'
    },
    'ASK_PHONE': {
        'CUSTOMER_FOUND': 'CONFIRM_IDENTITY',
        'CUSTOMER_MISSING': 'CUSTOMER_NOT_FOUND'
    },
    'CUSTOMER_NOT_FOUND': {
        'RETRY_PHONE': 'ASK_PHONE',
        'GAVE_UP': 'ENDED'
    },
    'CONFIRM_IDENTITY': {
        'IDENTITY_CONFIRMED': 'UNDERWRITING',
        'IDENTITY_REJECTED': 'ASK_PHONE'
    },
    'UNDERWRITING': {
        'LOAN_APPROVED': 'COMPLETED',
        'LOAN_REJECTED': 'ENDED',
        'SALARY_SLIP_REQUESTED': 'AWAITING_SALARY_SLIP'
    },
    'AWAITING_SALARY_SLIP': {
        'SALARY_SLIP_RECEIVED': 'UNDERWRITING'
    },
    'COMPLETED': {},
    'ENDED': {}
};

export const getNextStep = (currentStep: ConversationStep, event: ConversationEvent): ConversationStep => {
    const nextStep = transitions[currentStep][event];
    if (!nextStep) {
        throw new InvalidTransitionError(currentStep, event);
    }
    return nextStep;
};

/**
 * Applies `event` to the session in place and records it in the step history.
 */
export const transitionSession = (session: LoanSession, event: ConversationEvent): ConversationStep => {
    const fromStep = session.step;
    const toStep = getNextStep(fromStep, event);

    session.step = toStep;
    session.history.push({ step: toStep, event, timestamp: new Date().toISOString() });

    logger.info('State transition', { sessionId: session.id, from: fromStep, to: toStep, event });
    return toStep;
};
