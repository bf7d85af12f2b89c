import { EventBus, LoanEventType } from "../eventBus/eventBus";
import { logger } from "../utils/logger";

export interface AuditEvent {
  sessionId: string;
  stage: string;
  timestamp: string;
  payload: object;
}

const AUDITED_EVENTS: LoanEventType[] = [
  "conversation.transition",
  "salary_slip.received",
  "underwriting.decided",
  "sanction.generated",
  "session.reset",
];

/**
 * Append-only, in-memory record of what happened in each session.
 */
export class AuditTrail {
  private events: AuditEvent[] = [];

  record(sessionId: string, stage: string, payload: object) {
    const evt: AuditEvent = {
      sessionId,
      stage,
      timestamp: new Date().toISOString(),
      payload,
    };
    this.events.push(evt);
    logger.info("audit", { ...evt });
  }

  getTrace(sessionId: string): AuditEvent[] {
    return this.events.filter(e => e.sessionId === sessionId);
  }

  attach(bus: EventBus) {
    for (const type of AUDITED_EVENTS) {
      bus.subscribe(type, ({ data, sessionId }) => {
        this.record(sessionId, type, data);
      });
    }
  }
}

export const auditTrail = new AuditTrail();
