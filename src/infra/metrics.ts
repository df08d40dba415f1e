import type { PaymentStatus } from "../domain/types.js";
import type { NotificationOperation, PaymentTelemetryPort } from "../ports/telemetry.js";

type LabelSet = Record<string, string>;

const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function buildLabelKey(labelNames: string[], labels: LabelSet): string {
  return labelNames.map((name) => `${name}=${labels[name] ?? ""}`).join("|");
}

function parseLabelKey(labelNames: string[], key: string): LabelSet {
  const parts = key.split("|");
  const labels: LabelSet = {};
  for (const [index, name] of labelNames.entries()) {
    const value = parts[index];
    labels[name] = value ? value.slice(name.length + 1) : "";
  }
  return labels;
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class ScalarMetric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "gauge",
    private readonly labelNames: string[],
  ) {}

  add(labels: LabelSet, value = 1): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current = this.values.get(key) ?? 0;
    this.values.set(key, current + value);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const [key, value] of this.values.entries()) {
      const labels = parseLabelKey(this.labelNames, key);
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class HistogramMetric {
  private readonly values = new Map<string, { count: number; sum: number; buckets: number[] }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
    private readonly buckets: number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current =
      this.values.get(key) ?? {
        count: 0,
        sum: 0,
        buckets: this.buckets.map(() => 0),
      };
    current.count += 1;
    current.sum += value;
    for (const [index, bucket] of this.buckets.entries()) {
      if (value <= bucket) {
        current.buckets[index] = (current.buckets[index] ?? 0) + 1;
      }
    }
    this.values.set(key, current);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [key, stats] of this.values.entries()) {
      const baseLabels = parseLabelKey(this.labelNames, key);
      for (const [index, bucket] of this.buckets.entries()) {
        lines.push(
          `${this.name}_bucket${formatLabels({ ...baseLabels, le: String(bucket) })} ${stats.buckets[index] ?? 0}`,
        );
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...baseLabels, le: "+Inf" })} ${stats.count}`);
      lines.push(`${this.name}_sum${formatLabels(baseLabels)} ${stats.sum}`);
      lines.push(`${this.name}_count${formatLabels(baseLabels)} ${stats.count}`);
    }
    return lines;
  }
}

export class PaymentMetricsRegistry implements PaymentTelemetryPort {
  private readonly paymentsCreated = new ScalarMetric(
    "payments_created_total",
    "Total number of payments created.",
    "counter",
    ["merchant_id", "currency"],
  );
  private readonly paymentsProcessed = new ScalarMetric(
    "payments_processed_total",
    "Total number of payments processed by terminal status.",
    "counter",
    ["status", "merchant_id"],
  );
  private readonly processingDuration = new HistogramMetric(
    "payment_processing_duration_seconds",
    "Time taken to process payments.",
    ["status"],
    DEFAULT_BUCKETS,
  );
  private readonly paymentAmount = new ScalarMetric(
    "payment_amount_total",
    "Total amount of payments created by currency.",
    "gauge",
    ["currency"],
  );
  private readonly notifications = new ScalarMetric(
    "payment_notifications_total",
    "Total number of payment notification operations by outcome.",
    "counter",
    ["operation", "outcome"],
  );
  private readonly httpRequests = new ScalarMetric(
    "http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    "counter",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    DEFAULT_BUCKETS,
  );

  recordPaymentCreated(merchantId: string, currency: string, amount: number): void {
    this.paymentsCreated.add({ merchant_id: merchantId, currency });
    this.paymentAmount.add({ currency }, amount);
  }

  recordPaymentProcessed(status: PaymentStatus, merchantId: string, durationSeconds: number): void {
    this.paymentsProcessed.add({ status, merchant_id: merchantId });
    this.processingDuration.observe({ status }, durationSeconds);
  }

  recordNotification(operation: NotificationOperation, outcome: "success" | "failure"): void {
    this.notifications.add({ operation, outcome });
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.add({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  renderPrometheus(): string {
    const lines = [
      ...this.paymentsCreated.render(),
      ...this.paymentsProcessed.render(),
      ...this.processingDuration.render(),
      ...this.paymentAmount.render(),
      ...this.notifications.render(),
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
