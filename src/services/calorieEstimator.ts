// src/services/calorieEstimator.ts
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { DEFAULT_IMAGE_OPTIONS, prepareImage } from "./imagePreprocessor";
import type { ImageOptions } from "./imagePreprocessor";

/**
 * The calorie oracle. Answers are free text expected to contain a calorie
 * number; callers extract it. Failures are thrown as EstimatorError subclasses.
 */
export interface CalorieEstimator {
  analyzeImage(bytes: Buffer): Promise<string>;
  analyzeText(text: string): Promise<string>;
}

export class EstimatorError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "EstimatorError";
  }
}

export class EstimatorTimeoutError extends EstimatorError {
  constructor(cause?: unknown) {
    super("Estimator request timed out", cause);
    this.name = "EstimatorTimeoutError";
  }
}

export class EstimatorTransportError extends EstimatorError {
  constructor(cause?: unknown) {
    super("Estimator could not be reached", cause);
    this.name = "EstimatorTransportError";
  }
}

export class EstimatorResponseError extends EstimatorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "EstimatorResponseError";
  }
}

/** Structural slice of `openai.chat.completions` used here. */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming
  ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
}

export interface OpenAiEstimatorOptions {
  completions: ChatCompletionsApi;
  model: string;
  image?: ImageOptions;
}

const IMAGE_PROMPT =
  "Analyze this photo of food and estimate the approximate number of calories. " +
  "Answer with the number of calories only, without any additional text.";

const textPrompt = (description: string) =>
  `Analyze this description of food and estimate the approximate number of calories: '${description}'. ` +
  "Answer with the number of calories only, without any additional text.";

export const ESTIMATE_PREFIX = "Estimated calories: ";

// APIConnectionTimeoutError extends APIConnectionError extends APIError, so order matters.
function translateError(err: unknown): EstimatorError {
  if (err instanceof EstimatorError) return err;
  if (err instanceof APIConnectionTimeoutError) return new EstimatorTimeoutError(err);
  if (err instanceof APIConnectionError) return new EstimatorTransportError(err);
  if (err instanceof APIError) {
    return new EstimatorResponseError(`Estimator answered with status ${err.status ?? "unknown"}`, err);
  }
  return new EstimatorResponseError("Estimator call failed", err);
}

export class OpenAiCalorieEstimator implements CalorieEstimator {
  private readonly completions: ChatCompletionsApi;
  private readonly model: string;
  private readonly image: ImageOptions;

  constructor(options: OpenAiEstimatorOptions) {
    this.completions = options.completions;
    this.model = options.model;
    this.image = options.image ?? DEFAULT_IMAGE_OPTIONS;
  }

  async analyzeImage(bytes: Buffer): Promise<string> {
    // ImagePreprocessingError propagates untouched: it is not an oracle failure.
    const jpeg = await prepareImage(bytes, this.image);

    return this.complete("image", {
      model: this.model,
      max_tokens: 50,
      temperature: 0.1,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: IMAGE_PROMPT },
            { type: "image_url", image_url: { url: `data:image/jpeg;base64,${jpeg.toString("base64")}` } },
          ],
        },
      ],
    });
  }

  async analyzeText(text: string): Promise<string> {
    return this.complete("text", {
      model: this.model,
      max_tokens: 50,
      temperature: 0.1,
      messages: [{ role: "user", content: textPrompt(text) }],
    });
  }

  private async complete(kind: string, body: ChatCompletionCreateParamsNonStreaming): Promise<string> {
    const t0 = Date.now();
    try {
      const completion = await this.completions.create(body);
      const content = completion.choices[0]?.message.content?.trim();
      if (!content) {
        throw new EstimatorResponseError("Estimator returned an empty answer");
      }
      console.log(`[Estimator] ${kind} analysis ok in ${Date.now() - t0}ms`);
      return ESTIMATE_PREFIX + content;
    } catch (err) {
      const translated = translateError(err);
      console.error(`[Estimator] ${kind} analysis failed after ${Date.now() - t0}ms:`, translated.name, err);
      throw translated;
    }
  }
}

export interface EstimatorConfig {
  ESTIMATOR_API_KEY: string;
  ESTIMATOR_BASE_URL: string;
  ESTIMATOR_MODEL: string;
  ESTIMATOR_TIMEOUT_MS: number;
  IMAGE_MAX_DIMENSION: number;
  IMAGE_QUALITY: number;
}

export function createOpenAiCalorieEstimator(config: EstimatorConfig): OpenAiCalorieEstimator {
  const client = new OpenAI({
    apiKey: config.ESTIMATOR_API_KEY,
    baseURL: config.ESTIMATOR_BASE_URL,
    timeout: config.ESTIMATOR_TIMEOUT_MS,
    maxRetries: 0,
  });
  return new OpenAiCalorieEstimator({
    completions: client.chat.completions,
    model: config.ESTIMATOR_MODEL,
    image: { maxDimension: config.IMAGE_MAX_DIMENSION, quality: config.IMAGE_QUALITY },
  });
}
