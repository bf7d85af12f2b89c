// src/agents/orchestrator/Orchestrator.ts
import { AgentResponse } from '../BaseAgent';
import { SalesAgent } from '../sales/SalesAgent';
import { VerificationAgent } from '../verification/VerificationAgent';
import { UnderwritingAgent } from '../underwriting/UnderwritingAgent';
import { Clock, SanctionLetterAgent } from '../sanction/SanctionLetterAgent';
import { EventBus, eventBus as defaultBus } from '../../eventBus/eventBus';
import { transitionSession } from '../../orchestrator/stateMachine';
import type { LendingPolicy } from '../../registry/lendingPolicy';
import type { CustomerRepository } from '../../repositories/customerRepository';
import { ChatReply } from '../../types/chat';
import { ConversationEvent, LoanSession, SalarySlip } from '../../types/types';
import { logger } from '../../utils/logger';

export interface OrchestratorOptions {
    policy: LendingPolicy;
    customers: CustomerRepository;
    uploadsDir: string;
    bus?: EventBus;
    clock?: Clock;
}

const emptyReply = (): ChatReply => ({
    message: '',
    showUpload: false,
    showDownload: false,
    downloadFile: null,
    sessionEnded: false
});

const join = (...parts: string[]) => parts.filter(Boolean).join('\n\n');

/**
 * Master agent: owns the conversation. Each turn is routed to the worker
 * that owns the session's current step, and the worker's event is applied
 * through the transition table.
 */
export class Orchestrator {
    private readonly policy: LendingPolicy;
    private readonly bus: EventBus;
    private readonly salesAgent: SalesAgent;
    private readonly verificationAgent: VerificationAgent;
    private readonly underwritingAgent: UnderwritingAgent;
    private readonly sanctionLetterAgent: SanctionLetterAgent;

    constructor(options: OrchestratorOptions) {
        this.policy = options.policy;
        this.bus = options.bus ?? defaultBus;
        this.salesAgent = new SalesAgent(options.policy);
        this.verificationAgent = new VerificationAgent(options.policy, options.customers);
        this.underwritingAgent = new UnderwritingAgent(options.policy);
        this.sanctionLetterAgent = new SanctionLetterAgent(options.policy, options.uploadsDir, options.clock);
    }

    public async process(session: LoanSession, text: string): Promise<ChatReply> {
        logger.info('Processing message', { sessionId: session.id, step: session.step });
        this.remember(session, 'user', text);

        const reply = await this.route(session, text);

        this.remember(session, 'assistant', reply.message);
        return reply;
    }

    public async processSalaryUpload(session: LoanSession, slip: SalarySlip): Promise<ChatReply> {
        logger.info('Processing salary slip upload', { sessionId: session.id, step: session.step });

        this.advance(session, 'SALARY_SLIP_RECEIVED');
        session.salarySlip = slip;
        this.bus.publish(
            'salary_slip.received',
            { originalName: slip.originalName, mimeType: slip.mimeType, size: slip.size },
            session.id
        );

        const reply = await this.underwrite(session);
        this.remember(session, 'assistant', reply.message);
        return reply;
    }

    private async route(session: LoanSession, text: string): Promise<ChatReply> {
        const reply = emptyReply();

        switch (session.step) {
            case 'GREETING':
            case 'ASK_AMOUNT':
            case 'ASK_TENURE':
            case 'CONFIRM_LOAN': {
                const response = await this.salesAgent.handle(text, session);
                reply.message = response.message;
                this.apply(session, response);

                if (response.event === 'LOAN_CONFIRMED') {
                    reply.message = join(reply.message, this.verificationAgent.getInitialMessage());
                } else if (response.event === 'LOAN_CANCELLED') {
                    reply.sessionEnded = true;
                }
                return reply;
            }

            case 'ASK_PHONE':
            case 'CONFIRM_IDENTITY':
            case 'CUSTOMER_NOT_FOUND': {
                const response = await this.verificationAgent.handle(text, session);
                this.apply(session, response);

                if (response.event === 'IDENTITY_CONFIRMED') {
                    const decided = await this.underwrite(session);
                    return { ...decided, message: join(response.message, decided.message) };
                }
                reply.message = response.message;
                reply.sessionEnded = response.event === 'GAVE_UP';
                return reply;
            }

            // Only reached after an earlier turn failed part-way, e.g. the
            // sanction letter could not be written. Decide again.
            case 'UNDERWRITING':
                return this.underwrite(session);

            case 'AWAITING_SALARY_SLIP':
                reply.message = 'Please upload your salary slip using the button below to continue.';
                reply.showUpload = true;
                return reply;

            case 'COMPLETED':
                reply.message = join(
                    'Your loan application has been completed! 🎉',
                    'If you need any further assistance or want to apply for another loan, please start a new conversation.',
                    `Thank you for choosing ${this.policy.lender.name}!`
                );
                reply.showDownload = true;
                reply.downloadFile = session.sanctionLetter?.filename ?? null;
                return reply;

            case 'ENDED':
                reply.message = 'This conversation has ended. Please start a new chat for a fresh application.';
                reply.sessionEnded = true;
                return reply;
        }
    }

    /**
     * Runs the decision for a session sitting in UNDERWRITING and, on
     * approval, issues the sanction letter before completing.
     */
    private async underwrite(session: LoanSession): Promise<ChatReply> {
        const reply = emptyReply();
        const response = await this.underwritingAgent.handle('', session);
        reply.message = response.message;

        if (session.decision && session.customer) {
            this.bus.publish(
                'underwriting.decided',
                {
                    customerId: session.customer.id,
                    loanAmount: session.loanAmount ?? 0,
                    tenureMonths: session.tenureMonths ?? 0,
                    interestRate: session.interestRate,
                    outcome: session.decision.outcome,
                    reason: session.decision.reason,
                    emi: session.decision.emi
                },
                session.id
            );
        }

        switch (response.event) {
            case 'LOAN_APPROVED': {
                const letter = await this.sanctionLetterAgent.handle('', session);
                const issued = session.sanctionLetter;
                if (issued) {
                    this.bus.publish(
                        'sanction.generated',
                        { referenceNo: issued.referenceNo, filename: issued.filename, approvedAmount: issued.approvedAmount },
                        session.id
                    );
                }
                this.advance(session, 'LOAN_APPROVED');
                reply.message = join(reply.message, letter.message);
                reply.showDownload = true;
                reply.downloadFile = letter.downloadFile ?? null;
                break;
            }
            case 'SALARY_SLIP_REQUESTED':
                this.advance(session, 'SALARY_SLIP_REQUESTED');
                reply.showUpload = response.showUpload === true;
                break;
            case 'LOAN_REJECTED':
                this.advance(session, 'LOAN_REJECTED');
                reply.sessionEnded = true;
                break;
            default:
                throw new Error(`Unexpected underwriting event: ${response.event ?? 'none'}`);
        }
        return reply;
    }

    private apply(session: LoanSession, response: AgentResponse): void {
        if (response.event) {
            this.advance(session, response.event);
        }
    }

    private advance(session: LoanSession, event: ConversationEvent): void {
        const from = session.step;
        const to = transitionSession(session, event);
        this.bus.publish('conversation.transition', { from, to, event }, session.id);
    }

    private remember(session: LoanSession, role: 'user' | 'assistant', text: string): void {
        session.messages.push({ role, text, ts: Date.now() });
    }
}
