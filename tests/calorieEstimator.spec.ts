import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import sharp from "sharp";
import {
  EstimatorResponseError,
  EstimatorTimeoutError,
  EstimatorTransportError,
  OpenAiCalorieEstimator,
} from "../src/services/calorieEstimator";
import { ImagePreprocessingError } from "../src/services/imagePreprocessor";

function fakeCompletions(answer: string | null | Error) {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => {
    if (answer instanceof Error) throw answer;
    return { choices: [{ message: { content: answer } }] };
  });
  return { create };
}

describe("OpenAiCalorieEstimator", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the description in a single low-temperature prompt and prefixes the answer", async () => {
    const completions = fakeCompletions(" 450 kcal ");
    const estimator = new OpenAiCalorieEstimator({ completions, model: "test-model" });

    expect(await estimator.analyzeText("two eggs")).toBe("Estimated calories: 450 kcal");
    expect(completions.create).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 50,
      temperature: 0.1,
      messages: [
        {
          role: "user",
          content:
            "Analyze this description of food and estimate the approximate number of calories: 'two eggs'. " +
            "Answer with the number of calories only, without any additional text.",
        },
      ],
    });
  });

  it("re-encodes photos as a JPEG data URL", async () => {
    const completions = fakeCompletions("620");
    const estimator = new OpenAiCalorieEstimator({
      completions,
      model: "test-model",
      image: { maxDimension: 100, quality: 60 },
    });
    const png = await sharp({
      create: { width: 400, height: 200, channels: 3, background: { r: 200, g: 120, b: 40 } },
    })
      .png()
      .toBuffer();

    expect(await estimator.analyzeImage(png)).toBe("Estimated calories: 620");

    const [body] = completions.create.mock.calls[0];
    const [message] = body.messages;
    if (message.role !== "user") throw new Error(`unexpected role ${message.role}`);
    const content = Array.isArray(message.content) ? message.content : [];
    const imagePart = content.find((part) => part.type === "image_url");
    const url = imagePart && imagePart.type === "image_url" ? imagePart.image_url.url : "";
    expect(url.startsWith("data:image/jpeg;base64,")).toBe(true);

    const sent = await sharp(Buffer.from(url.slice("data:image/jpeg;base64,".length), "base64")).metadata();
    expect([sent.format, sent.width, sent.height]).toEqual(["jpeg", 100, 50]);
  });

  it("does not call the endpoint when the photo cannot be decoded", async () => {
    const completions = fakeCompletions("620");
    const estimator = new OpenAiCalorieEstimator({ completions, model: "test-model" });

    await expect(estimator.analyzeImage(Buffer.from("not an image"))).rejects.toBeInstanceOf(
      ImagePreprocessingError
    );
    expect(completions.create).not.toHaveBeenCalled();
  });

  it("treats an empty answer as a response error", async () => {
    const estimator = new OpenAiCalorieEstimator({ completions: fakeCompletions("   "), model: "test-model" });
    await expect(estimator.analyzeText("air")).rejects.toThrow("Estimator returned an empty answer");

    const nullContent = new OpenAiCalorieEstimator({ completions: fakeCompletions(null), model: "test-model" });
    await expect(nullContent.analyzeText("air")).rejects.toBeInstanceOf(EstimatorResponseError);
  });

  it("classifies client failures", async () => {
    const timeout = new OpenAiCalorieEstimator({
      completions: fakeCompletions(new APIConnectionTimeoutError()),
      model: "test-model",
    });
    await expect(timeout.analyzeText("rice")).rejects.toBeInstanceOf(EstimatorTimeoutError);

    const transport = new OpenAiCalorieEstimator({
      completions: fakeCompletions(new APIConnectionError({ message: "socket hang up" })),
      model: "test-model",
    });
    await expect(transport.analyzeText("rice")).rejects.toBeInstanceOf(EstimatorTransportError);

    const status = new OpenAiCalorieEstimator({
      completions: fakeCompletions(new APIError(500, undefined, "upstream failure", undefined)),
      model: "test-model",
    });
    await expect(status.analyzeText("rice")).rejects.toThrow("Estimator answered with status 500");

    const other = new OpenAiCalorieEstimator({
      completions: fakeCompletions(new TypeError("unexpected")),
      model: "test-model",
    });
    await expect(other.analyzeText("rice")).rejects.toThrow("Estimator call failed");
  });
});
