import { describe, expect, it } from "vitest";
import { PaymentMetricsRegistry } from "../src/infra/metrics.js";

describe("PaymentMetricsRegistry", () => {
  it("renders payment counters and the amount gauge", () => {
    const metrics = new PaymentMetricsRegistry();

    metrics.recordPaymentCreated("merchant-1", "BRL", 100.5);
    metrics.recordPaymentCreated("merchant-1", "BRL", 20);
    metrics.recordNotification("publish", "success");

    const lines = metrics.renderPrometheus().split("\n");
    expect(lines).toContain('payments_created_total{merchant_id="merchant-1",currency="BRL"} 2');
    expect(lines).toContain('payment_amount_total{currency="BRL"} 120.5');
    expect(lines).toContain("# TYPE payment_amount_total gauge");
    expect(lines).toContain('payment_notifications_total{operation="publish",outcome="success"} 1');
  });

  it("renders processing duration as a cumulative histogram", () => {
    const metrics = new PaymentMetricsRegistry();

    metrics.recordPaymentProcessed("completed", "merchant-1", 0.3);
    metrics.recordPaymentProcessed("completed", "merchant-1", 3);

    const lines = metrics.renderPrometheus().split("\n");
    expect(lines).toContain('payments_processed_total{status="completed",merchant_id="merchant-1"} 2');
    expect(lines).toContain('payment_processing_duration_seconds_bucket{status="completed",le="0.25"} 0');
    expect(lines).toContain('payment_processing_duration_seconds_bucket{status="completed",le="0.5"} 1');
    expect(lines).toContain('payment_processing_duration_seconds_bucket{status="completed",le="5"} 2');
    expect(lines).toContain('payment_processing_duration_seconds_bucket{status="completed",le="+Inf"} 2');
    expect(lines).toContain('payment_processing_duration_seconds_sum{status="completed"} 3.3');
    expect(lines).toContain('payment_processing_duration_seconds_count{status="completed"} 2');
  });

  it("escapes label values", () => {
    const metrics = new PaymentMetricsRegistry();

    metrics.recordHttpRequest("get", '/weird"route', 200, 0.01);

    expect(metrics.renderPrometheus()).toContain(
      'http_requests_total{method="GET",route="/weird\\"route",status_code="200"} 1',
    );
  });
});
