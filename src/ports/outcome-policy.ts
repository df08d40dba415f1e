export const DEFAULT_DECLINE_REASON = "Payment processing failed due to external service error";

export interface ProcessingDecision {
  approved: boolean;
  failureReason?: string;
}

/** Decides whether a claimed payment is approved. May take a while. */
export interface OutcomePolicyPort {
  decide(paymentId: string): Promise<ProcessingDecision>;
}
