import { z } from "zod";
import type { ClassificationResult } from "@image-triage/shared";
import type { ClassificationAdapter } from "../classifier.js";
import { AdapterError } from "../errors.js";

const unit = z.number().min(0).max(1);

const responseSchema = z.object({
  label: z.string().min(1),
  confidence: unit,
  scores: z.record(z.string(), unit),
  model_version: z.string().min(1).optional(),
});

/** Talks to a model server that accepts raw image bytes and answers with JSON scores. */
export class HttpClassifier implements ClassificationAdapter {
  readonly name = "http";
  readonly modelVersion = "remote";

  constructor(private readonly url: string) {}

  async classify(bytes: Buffer, signal: AbortSignal): Promise<ClassificationResult> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/octet-stream" },
        body: bytes,
        signal,
      });
    } catch (err) {
      if (signal.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new AdapterError(`classifier unreachable: ${message}`, { cause: err });
    }

    if (!res.ok) {
      const text = (await res.text()).trim().slice(0, 200);
      throw new AdapterError(text ? `classifier responded ${res.status}: ${text}` : `classifier responded ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new AdapterError("classifier returned a non-JSON response", { cause: err });
    }
    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AdapterError("classifier returned an invalid response", { cause: parsed.error });
    }

    return {
      label: parsed.data.label,
      confidence: parsed.data.confidence,
      scoreDistribution: parsed.data.scores,
      modelVersion: parsed.data.model_version ?? this.modelVersion,
    };
  }
}
