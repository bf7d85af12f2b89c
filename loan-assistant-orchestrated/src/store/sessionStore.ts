import { v4 as uuidv4 } from 'uuid';
import { LoanSession } from '../types/types';

/**
 * In-memory sessions keyed by id. A session lives as long as one
 * conversation, or until it is reset.
 */
export class SessionStore {
    private sessions = new Map<string, LoanSession>();

    constructor(private readonly defaultInterestRate: number) {}

    create(): LoanSession {
        const now = Date.now();
        const session: LoanSession = {
            id: uuidv4(),
            createdAt: now,
            step: 'GREETING',
            history: [{ step: 'GREETING', timestamp: new Date(now).toISOString() }],
            interestRate: this.defaultInterestRate,
            kycVerified: false,
            messages: []
        };
        this.sessions.set(session.id, session);
        return session;
    }

    get(sessionId: string): LoanSession | undefined {
        return this.sessions.get(sessionId);
    }

    delete(sessionId: string): boolean {
        return this.sessions.delete(sessionId);
    }

    get size(): number {
        return this.sessions.size;
    }
}
