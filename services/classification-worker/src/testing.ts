import { createLogger } from "@image-triage/shared";
import type { ClassificationResult } from "@image-triage/shared";
import type { ClassificationAdapter } from "./classifier.js";
import { PayloadUnavailableError } from "./errors.js";
import type { PayloadSource } from "./payload.js";

export const silentLogger = createLogger("test", "silent");

export const catResult: ClassificationResult = {
  label: "Cat",
  confidence: 0.95,
  scoreDistribution: { Cat: 0.95, Dog: 0.04, Bird: 0.01 },
};

/** Payloads held in memory; a ref mapped to an error rejects with it. */
export class FakePayloadSource implements PayloadSource {
  readonly loads: string[] = [];
  private readonly entries = new Map<string, Buffer | Error>();

  set(ref: string, value: Buffer | Error): this {
    this.entries.set(ref, value);
    return this;
  }

  async load(payloadRef: string): Promise<Buffer> {
    this.loads.push(payloadRef);
    const entry = this.entries.get(payloadRef);
    if (entry === undefined) {
      throw new PayloadUnavailableError(`payload not found: ${payloadRef}`, { transient: false });
    }
    if (entry instanceof Error) throw entry;
    return entry;
  }
}

export const fakeClassifier = (
  classify: (bytes: Buffer, signal: AbortSignal) => Promise<ClassificationResult>,
): ClassificationAdapter => ({
  name: "fake",
  modelVersion: "fake-v1",
  classify,
});

/** Resolves only when the signal aborts, then rejects with its reason. */
export const untilAborted = (signal: AbortSignal): Promise<never> =>
  new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
