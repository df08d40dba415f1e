import type { Redis } from "ioredis";
import type { PaymentNotification } from "../../domain/types.js";
import type {
  MessageChannelPort,
  ReceivedNotification,
  ReceiveOptions,
} from "../../ports/message-channel.js";

export interface RedisMessageChannelOptions {
  streamKey: string;
  consumerGroup: string;
  consumerName: string;
  /** Entries left unacknowledged this long are claimed by the next receive. */
  reclaimIdleMs: number;
}

type StreamEntry = [string, string[]];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStreamEntry(value: unknown): value is StreamEntry {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "string" && isStringArray(value[1]);
}

function fieldValue(fields: string[], name: string): string | undefined {
  for (let index = 0; index < fields.length; index += 2) {
    if (fields[index] === name) {
      return fields[index + 1];
    }
  }
  return undefined;
}

function isPaymentNotification(value: unknown): value is PaymentNotification {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "payment_id" in value &&
    typeof value.payment_id === "string" &&
    "amount" in value &&
    typeof value.amount === "number" &&
    "currency" in value &&
    typeof value.currency === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "number"
  );
}

// XREADGROUP reply: [[streamKey, [[entryId, fields], ...]], ...] or null.
function entriesFromReadReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply)) {
    return [];
  }
  const entries: StreamEntry[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) {
      continue;
    }
    for (const entry of stream[1]) {
      if (isStreamEntry(entry)) {
        entries.push(entry);
      }
    }
  }
  return entries;
}

// XAUTOCLAIM reply: [nextStartId, [[entryId, fields] | null, ...], deletedIds?].
function entriesFromClaimReply(reply: unknown): StreamEntry[] {
  if (!Array.isArray(reply) || !Array.isArray(reply[1])) {
    return [];
  }
  return reply[1].filter(isStreamEntry);
}

export class RedisMessageChannel implements MessageChannelPort {
  private readonly consumerRedis: Redis;
  private groupReady: Promise<void> | null = null;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisMessageChannelOptions,
  ) {
    // Dedicated connection avoids BLOCK read starving publish commands.
    this.consumerRedis = this.redis.duplicate();
  }

  async publish(notification: PaymentNotification): Promise<void> {
    await this.redis.xadd(
      this.options.streamKey,
      "*",
      "payment_id",
      notification.payment_id,
      "notification_json",
      JSON.stringify(notification),
    );
  }

  async receive(options: ReceiveOptions): Promise<ReceivedNotification[]> {
    await this.ensureConsumerGroup();
    if (options.signal?.aborted) {
      return [];
    }

    const count = String(Math.max(1, options.maxMessages));
    const claimed = entriesFromClaimReply(
      await this.consumerRedis.xautoclaim(
        this.options.streamKey,
        this.options.consumerGroup,
        this.options.consumerName,
        this.options.reclaimIdleMs,
        "0-0",
        "COUNT",
        count,
      ),
    );
    if (claimed.length > 0) {
      return this.decodeEntries(claimed, true);
    }

    const fresh = entriesFromReadReply(
      await this.consumerRedis.xreadgroup(
        "GROUP",
        this.options.consumerGroup,
        this.options.consumerName,
        "COUNT",
        count,
        "BLOCK",
        String(Math.max(1, options.waitMs)),
        "STREAMS",
        this.options.streamKey,
        ">",
      ),
    );
    return this.decodeEntries(fresh, false);
  }

  async acknowledge(receipt: string): Promise<void> {
    await this.consumerRedis.xack(this.options.streamKey, this.options.consumerGroup, receipt);
  }

  async close(): Promise<void> {
    await this.consumerRedis.quit();
  }

  private async decodeEntries(entries: StreamEntry[], redelivered: boolean): Promise<ReceivedNotification[]> {
    const received: ReceivedNotification[] = [];
    for (const [entryId, fields] of entries) {
      const notification = this.parseNotification(fields);
      if (!notification) {
        // Malformed entries can never be processed; drop them from the pending list.
        await this.acknowledge(entryId);
        continue;
      }
      received.push({ receipt: entryId, notification, redelivered });
    }
    return received;
  }

  private parseNotification(fields: string[]): PaymentNotification | null {
    const json = fieldValue(fields, "notification_json");
    if (!json) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(json);
      return isPaymentNotification(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private ensureConsumerGroup(): Promise<void> {
    if (!this.groupReady) {
      this.groupReady = this.createConsumerGroup().catch((error: unknown) => {
        this.groupReady = null;
        throw error;
      });
    }
    return this.groupReady;
  }

  private async createConsumerGroup(): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", this.options.streamKey, this.options.consumerGroup, "0", "MKSTREAM");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (!message.includes("BUSYGROUP")) {
        throw error;
      }
    }
  }
}
