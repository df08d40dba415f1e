import type { PaymentNotification } from "../domain/types.js";

export interface ReceiveOptions {
  maxMessages: number;
  waitMs: number;
  signal?: AbortSignal;
}

export interface ReceivedNotification {
  receipt: string;
  notification: PaymentNotification;
  redelivered: boolean;
}

/**
 * At-least-once delivery: a notification that is received but never
 * acknowledged will be handed out again.
 */
export interface MessageChannelPort {
  publish(notification: PaymentNotification): Promise<void>;
  receive(options: ReceiveOptions): Promise<ReceivedNotification[]>;
  acknowledge(receipt: string): Promise<void>;
  close?(): Promise<void>;
}
