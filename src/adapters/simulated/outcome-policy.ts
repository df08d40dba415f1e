import {
  DEFAULT_DECLINE_REASON,
  type OutcomePolicyPort,
  type ProcessingDecision,
} from "../../ports/outcome-policy.js";

export interface SimulatedOutcomePolicyOptions {
  /** Probability in [0, 1] that a payment is approved. */
  successRate: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Stands in for an external processor: random latency, random verdict. */
export class SimulatedOutcomePolicy implements OutcomePolicyPort {
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SimulatedOutcomePolicyOptions) {
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async decide(_paymentId: string): Promise<ProcessingDecision> {
    const spread = Math.max(0, this.options.maxLatencyMs - this.options.minLatencyMs);
    const latencyMs = this.options.minLatencyMs + Math.floor(this.random() * (spread + 1));
    if (latencyMs > 0) {
      await this.sleep(latencyMs);
    }

    if (this.random() < this.options.successRate) {
      return { approved: true };
    }
    return { approved: false, failureReason: DEFAULT_DECLINE_REASON };
  }
}
