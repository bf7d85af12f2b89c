import type { LendingPolicy } from '../registry/lendingPolicy';
import type { ConversationEvent, LoanSession } from '../types/types';

export interface AgentResponse {
    message: string;
    /** Absent when the input was not accepted and the user is re-prompted. */
    event?: ConversationEvent;
    showUpload?: boolean;
    downloadFile?: string;
}

export abstract class BaseAgent {
    constructor(protected readonly policy: LendingPolicy) {}

    abstract handle(input: string, session: LoanSession): Promise<AgentResponse>;

    protected advance(message: string, event: ConversationEvent): AgentResponse {
        return { message, event };
    }

    protected reprompt(message: string): AgentResponse {
        return { message };
    }
}

export const normaliseReply = (input: string) => input.toLowerCase().trim();
