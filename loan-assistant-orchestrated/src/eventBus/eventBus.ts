import type { ConversationEvent, ConversationStep, DecisionOutcome, DecisionReason } from "../types/types";

export interface LoanEvents {
  "conversation.transition": { from: ConversationStep; to: ConversationStep; event: ConversationEvent };
  "salary_slip.received": { originalName: string; mimeType: string; size: number };
  "underwriting.decided": {
    customerId: string;
    loanAmount: number;
    tenureMonths: number;
    interestRate: number;
    outcome: DecisionOutcome;
    reason: DecisionReason;
    emi: number;
  };
  "sanction.generated": { referenceNo: string; filename: string; approvedAmount: number };
  "session.reset": { step: ConversationStep };
}

export type LoanEventType = keyof LoanEvents;

export interface EventEnvelope<K extends LoanEventType = LoanEventType> {
  type: K;
  data: LoanEvents[K];
  sessionId: string;
}

type Handler<K extends LoanEventType> = (event: EventEnvelope<K>) => void;

type HandlerTable = { [K in LoanEventType]: Handler<K>[] };

export class EventBus {
  private handlers: HandlerTable = {
    "conversation.transition": [],
    "salary_slip.received": [],
    "underwriting.decided": [],
    "sanction.generated": [],
    "session.reset": [],
  };

  subscribe<K extends LoanEventType>(eventType: K, handler: Handler<K>) {
    this.handlers[eventType].push(handler);
  }

  publish<K extends LoanEventType>(eventType: K, data: LoanEvents[K], sessionId: string) {
    const hs: Handler<K>[] = this.handlers[eventType];
    for (const h of hs) {
      h({ type: eventType, data, sessionId });
    }
  }
}

export const eventBus = new EventBus();
