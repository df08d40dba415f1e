import { describe, expect, it } from "vitest";
import {
  assertTransition,
  canTransition,
  isPaymentStatus,
  isTerminalStatus,
} from "../src/domain/state-machine.js";
import { AppError } from "../src/infra/app-error.js";

describe("Payment state machine", () => {
  it("allows valid transitions", () => {
    expect(canTransition("pending", "processing")).toBe(true);
    expect(canTransition("pending", "cancelled")).toBe(true);
    expect(canTransition("processing", "completed")).toBe(true);
    expect(canTransition("processing", "failed")).toBe(true);
  });

  it("blocks invalid transitions", () => {
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("processing", "cancelled")).toBe(false);
    expect(canTransition("completed", "failed")).toBe(false);
    expect(() => assertTransition("pending", "completed")).toThrowError(AppError);
  });

  it("marks terminal statuses", () => {
    expect(isTerminalStatus("completed")).toBe(true);
    expect(isTerminalStatus("failed")).toBe(true);
    expect(isTerminalStatus("cancelled")).toBe(true);
    expect(isTerminalStatus("processing")).toBe(false);
    expect(isTerminalStatus("pending")).toBe(false);
  });

  it("recognises stored status strings", () => {
    expect(isPaymentStatus("processing")).toBe(true);
    expect(isPaymentStatus("succeeded")).toBe(false);
    expect(isPaymentStatus(3)).toBe(false);
  });
});
