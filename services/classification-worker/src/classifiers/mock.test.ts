import { describe, expect, it } from "vitest";
import { AdapterError } from "../errors.js";
import { ANIMAL_CLASSES, MockClassifier, detectImageFormat } from "./mock.js";

const png = (...body: number[]) => Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, ...body]);
const signal = new AbortController().signal;

describe("detectImageFormat", () => {
  it("recognizes common image signatures", () => {
    expect(detectImageFormat(png())).toBe("png");
    expect(detectImageFormat(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe("jpeg");
    expect(detectImageFormat(Buffer.from("GIF89a", "latin1"))).toBe("gif");
    expect(detectImageFormat(Buffer.from("RIFF\u0000\u0000\u0000\u0000WEBPVP8 ", "latin1"))).toBe("webp");
    expect(detectImageFormat(Buffer.from("not an image"))).toBeUndefined();
    expect(detectImageFormat(Buffer.alloc(0))).toBeUndefined();
  });
});

describe("MockClassifier", () => {
  const classifier = new MockClassifier();

  it("rejects bytes that are not an image", async () => {
    const run = classifier.classify(Buffer.from("garbage"), signal);
    await expect(run).rejects.toBeInstanceOf(AdapterError);
    await expect(run).rejects.toThrow("corrupt image");
  });

  it("scores every class and picks the highest", async () => {
    const result = await classifier.classify(png(1, 2, 3), signal);
    expect(Object.keys(result.scoreDistribution).sort()).toEqual([...ANIMAL_CLASSES]);
    for (const score of Object.values(result.scoreDistribution)) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
    expect(result.confidence).toBe(Math.max(...Object.values(result.scoreDistribution)));
    expect(result.scoreDistribution[result.label]).toBe(result.confidence);
    expect(result.modelVersion).toBe("mock-animal-v1");
  });

  it("is deterministic for identical bytes", async () => {
    const first = await classifier.classify(png(9, 9, 9), signal);
    const second = await classifier.classify(png(9, 9, 9), signal);
    expect(second).toEqual(first);
  });

  it("honours an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stop"));
    await expect(classifier.classify(png(), controller.signal)).rejects.toThrow("stop");
  });
});
