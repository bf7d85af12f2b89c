import type { ChatMessage } from './chat';

export type ConversationStep =
  | 'GREETING'
  | 'ASK_AMOUNT'
  | 'ASK_TENURE'
  | 'CONFIRM_LOAN'
  | 'ASK_PHONE'
  | 'CONFIRM_IDENTITY'
  | 'CUSTOMER_NOT_FOUND'
  | 'UNDERWRITING'
  | 'AWAITING_SALARY_SLIP'
  | 'COMPLETED'
  | 'ENDED';

export type ConversationEvent =
  | 'GREETED'
  | 'AMOUNT_CAPTURED'
  | 'TENURE_CAPTURED'
  | 'LOAN_CONFIRMED'
  | 'LOAN_CANCELLED'
  | 'CUSTOMER_FOUND'
  | 'CUSTOMER_MISSING'
  | 'RETRY_PHONE'
  | 'GAVE_UP'
  | 'IDENTITY_CONFIRMED'
  | 'IDENTITY_REJECTED'
  | 'LOAN_APPROVED'
  | 'LOAN_REJECTED'
  | 'SALARY_SLIP_REQUESTED'
  | 'SALARY_SLIP_RECEIVED';

export interface Customer {
  id: string;
  name: string;
  phone: string;
  city: string;
  creditScore: number;
  preApprovedLimit: number;
  monthlySalary: number;
}

export interface Offer {
  customerId: string;
  interestRate: number;
}

export type DecisionOutcome = 'APPROVE' | 'REJECT' | 'REQUEST_SALARY_SLIP';

export type DecisionReason =
  | 'low_credit_score'
  | 'within_preapproved_limit'
  | 'salary_verification_required'
  | 'salary_verified'
  | 'high_emi_ratio'
  | 'exceeds_maximum_limit';

export interface UnderwritingInput {
  creditScore: number;
  requestedAmount: number;
  preApprovedLimit: number;
  monthlySalary: number;
  hasSalarySlip: boolean;
  tenureMonths: number;
  annualInterestRate: number;
}

export interface UnderwritingDecision {
  outcome: DecisionOutcome;
  reason: DecisionReason;
  emi: number;
}

export interface SalarySlip {
  originalName: string;
  mimeType: string;
  filePath: string;
  size: number;
  uploadedAt: number;
}

export interface SanctionLetter {
  referenceNo: string;
  filename: string;
  filePath: string;
  approvedAmount: number;
  emi: number;
  generatedAt: number;
}

export interface StepHistoryEntry {
  step: ConversationStep;
  event?: ConversationEvent;
  timestamp: string;
}

export interface LoanSession {
  id: string;
  createdAt: number;
  step: ConversationStep;
  history: StepHistoryEntry[];
  interestRate: number;
  loanAmount?: number;
  tenureMonths?: number;
  estimatedEmi?: number;
  customer?: Customer;
  offer?: Offer;
  kycVerified: boolean;
  salarySlip?: SalarySlip;
  decision?: UnderwritingDecision;
  sanctionLetter?: SanctionLetter;
  messages: ChatMessage[];
}
