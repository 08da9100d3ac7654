import type { ClassificationResult, ClassifierConfig } from "@image-triage/shared";
import { HttpClassifier } from "./classifiers/http.js";
import { MockClassifier } from "./classifiers/mock.js";

/**
 * Boundary to the out-of-process model. Implementations make a single attempt
 * and throw `AdapterError` on failure; retrying is the worker's decision.
 */
export interface ClassificationAdapter {
  readonly name: string;
  readonly modelVersion: string;
  classify(bytes: Buffer, signal: AbortSignal): Promise<ClassificationResult>;
}

export const createClassifier = (config: ClassifierConfig): ClassificationAdapter => {
  if (config.kind === "http") {
    return new HttpClassifier(config.url);
  }
  return new MockClassifier();
};
