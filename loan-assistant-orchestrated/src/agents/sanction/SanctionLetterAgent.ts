// src/agents/sanction/SanctionLetterAgent.ts
import fs from 'fs';
import path from 'path';
import { BaseAgent, AgentResponse } from '../BaseAgent';
import type { LendingPolicy } from '../../registry/lendingPolicy';
import { renderSanctionLetterPdf } from '../../pdf/renderSanctionLetterPdf';
import { LoanSession, SanctionLetter } from '../../types/types';
import { compactDate, compactTimestamp, formatRupees } from '../../utils/format';
import { logger } from '../../utils/logger';

export type Clock = () => Date;

/**
 * Renders the sanction letter for an approved loan and stores it in the
 * uploads directory, where the download route serves it from.
 */
export class SanctionLetterAgent extends BaseAgent {
    constructor(
        policy: LendingPolicy,
        private readonly outputDir: string,
        private readonly clock: Clock = () => new Date()
    ) {
        super(policy);
    }

    async handle(_input: string, session: LoanSession): Promise<AgentResponse> {
        const { customer, decision, loanAmount, tenureMonths } = session;
        if (!customer || decision?.outcome !== 'APPROVE' || loanAmount === undefined || tenureMonths === undefined) {
            throw new Error(`Session ${session.id} has no approved loan to sanction`);
        }

        const issuedAt = this.clock();
        const { lender } = this.policy;
        const referenceNo = `${lender.referencePrefix}/${compactDate(issuedAt)}/${customer.id}`;
        const filename = `sanction_letter_${customer.id}_${compactTimestamp(issuedAt)}.pdf`;
        const filePath = path.join(this.outputDir, filename);

        const pdf = await renderSanctionLetterPdf({
            lender,
            referenceNo,
            issuedAt,
            customer,
            loanAmount,
            tenureMonths,
            interestRate: session.interestRate,
            emi: decision.emi
        });
        await fs.promises.mkdir(this.outputDir, { recursive: true });
        await fs.promises.writeFile(filePath, pdf);

        const letter: SanctionLetter = {
            referenceNo,
            filename,
            filePath,
            approvedAmount: loanAmount,
            emi: decision.emi,
            generatedAt: issuedAt.getTime()
        };
        session.sanctionLetter = letter;
        logger.info('Sanction letter generated', { sessionId: session.id, referenceNo, filename, bytes: pdf.length });

        return {
            message:
                '📄 Your Sanction Letter has been generated!\n\n' +
                `Reference No: ${referenceNo}\n` +
                `Loan Amount: ${formatRupees(loanAmount)}\n` +
                `Monthly EMI: ${formatRupees(decision.emi)}\n\n` +
                'Click the download button below to get your sanction letter.\n\n' +
                `Thank you for choosing ${lender.name}! We look forward to serving you.`,
            downloadFile: filename
        };
    }
}
