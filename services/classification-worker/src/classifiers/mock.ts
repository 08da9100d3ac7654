import { createHash } from "node:crypto";
import type { ClassificationResult } from "@image-triage/shared";
import type { ClassificationAdapter } from "../classifier.js";
import { AdapterError } from "../errors.js";

export const ANIMAL_CLASSES = ["bird", "fish", "insect", "mammal", "reptile"] as const;

type ImageFormat = "png" | "jpeg" | "gif" | "webp";

const startsWith = (bytes: Buffer, signature: number[], offset = 0) =>
  bytes.length >= offset + signature.length && signature.every((byte, idx) => bytes[offset + idx] === byte);

export const detectImageFormat = (bytes: Buffer): ImageFormat | undefined => {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "png";
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return "jpeg";
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return "gif";
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) return "webp";
  return undefined;
};

const round4 = (value: number) => Math.round(value * 10_000) / 10_000;

/** Deterministic stand-in for the animal model: the same bytes always get the same scores. */
export class MockClassifier implements ClassificationAdapter {
  readonly name = "mock";
  readonly modelVersion = "mock-animal-v1";

  async classify(bytes: Buffer, signal: AbortSignal): Promise<ClassificationResult> {
    signal.throwIfAborted();
    if (!detectImageFormat(bytes)) {
      throw new AdapterError("corrupt image");
    }

    const digest = createHash("sha256").update(bytes).digest();
    const weights = ANIMAL_CLASSES.map((_, idx) => digest[idx] + 1);
    const total = weights.reduce((sum, weight) => sum + weight, 0);

    let best = 0;
    weights.forEach((weight, idx) => {
      if (weight > weights[best]) best = idx;
    });

    const scoreDistribution = Object.fromEntries(
      ANIMAL_CLASSES.map((label, idx) => [label, round4(weights[idx] / total)]),
    );
    const label = ANIMAL_CLASSES[best];

    return {
      label,
      confidence: scoreDistribution[label],
      scoreDistribution,
      modelVersion: this.modelVersion,
    };
  }
}
