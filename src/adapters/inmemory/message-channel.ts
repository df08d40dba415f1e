import type { PaymentNotification } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  MessageChannelPort,
  ReceivedNotification,
  ReceiveOptions,
} from "../../ports/message-channel.js";

interface QueuedNotification {
  receipt: string;
  notification: PaymentNotification;
  redelivered: boolean;
}

interface LeasedNotification extends QueuedNotification {
  receivedAt: number;
}

export interface InMemoryMessageChannelOptions {
  /** Received notifications left unacknowledged this long are handed out again. */
  reclaimIdleMs?: number;
  now?: () => number;
}

export class InMemoryMessageChannel implements MessageChannelPort {
  private readonly published: PaymentNotification[] = [];
  private readonly ready: QueuedNotification[] = [];
  private readonly unacknowledged = new Map<string, LeasedNotification>();
  private readonly waiters = new Set<() => void>();
  private sequence = 0;
  private closed = false;
  private readonly reclaimIdleMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryMessageChannelOptions = {}) {
    this.reclaimIdleMs = options.reclaimIdleMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  async publish(notification: PaymentNotification): Promise<void> {
    if (this.closed) {
      throw new AppError(503, "channel_closed", "Message channel is closed.");
    }
    this.published.push({ ...notification });
    this.sequence += 1;
    this.ready.push({
      receipt: `msg_${this.sequence}`,
      notification: { ...notification },
      redelivered: false,
    });
    this.wakeWaiters();
  }

  async receive(options: ReceiveOptions): Promise<ReceivedNotification[]> {
    this.reclaim(this.reclaimIdleMs);
    if (this.ready.length === 0 && !this.closed && !options.signal?.aborted) {
      await this.waitForMessages(options.waitMs, options.signal);
    }

    const batch = this.ready.splice(0, Math.max(1, options.maxMessages));
    const receivedAt = this.now();
    for (const item of batch) {
      this.unacknowledged.set(item.receipt, { ...item, receivedAt });
    }
    return batch.map((item) => ({
      receipt: item.receipt,
      notification: { ...item.notification },
      redelivered: item.redelivered,
    }));
  }

  async acknowledge(receipt: string): Promise<void> {
    this.unacknowledged.delete(receipt);
  }

  /** Puts every received-but-unacknowledged notification back in the queue. */
  redeliverUnacknowledged(): number {
    return this.reclaim(0);
  }

  getPublishedNotifications(): PaymentNotification[] {
    return this.published.map((notification) => ({ ...notification }));
  }

  unacknowledgedCount(): number {
    return this.unacknowledged.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.wakeWaiters();
  }

  private reclaim(idleMs: number): number {
    const cutoff = this.now() - idleMs;
    let reclaimed = 0;
    for (const [receipt, item] of this.unacknowledged) {
      if (item.receivedAt > cutoff) {
        continue;
      }
      this.unacknowledged.delete(receipt);
      this.ready.push({ receipt, notification: item.notification, redelivered: true });
      reclaimed += 1;
    }
    if (reclaimed > 0) {
      this.wakeWaiters();
    }
    return reclaimed;
  }

  private waitForMessages(waitMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", finish);
        this.waiters.delete(finish);
        resolve();
      };
      const timer = setTimeout(finish, waitMs);
      signal?.addEventListener("abort", finish, { once: true });
      this.waiters.add(finish);
    });
  }

  private wakeWaiters(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}
