import { z } from "zod";
import type { ModelConfig } from "../config/types.js";
import type { ModelCapability, ModelPart } from "../interfaces/index.js";
import { ModelRequestError, ModelUnreachableError } from "../errors.js";
import { logger } from "../logger.js";

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
});

/** Concatenated text of the first candidate; "" when it has no text parts. */
export function extractText(body: unknown): string {
  const parsed = generateContentResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ModelRequestError(
      `Unexpected Gemini response shape: ${parsed.error.message}`,
    );
  }
  const [candidate] = parsed.data.candidates;
  if (!candidate) {
    throw new ModelRequestError("Gemini returned no candidates");
  }
  return (candidate.content?.parts ?? [])
    .map((part) => part.text ?? "")
    .join("");
}

/**
 * ModelCapability backed by the Gemini generateContent REST endpoint.
 */
export class GeminiModel implements ModelCapability {
  private readonly config: ModelConfig & { apiKey: string };

  constructor(config: ModelConfig & { apiKey: string }) {
    this.config = config;
  }

  async generate(parts: ModelPart[]): Promise<string> {
    const { baseUrl, name, apiKey, timeoutMs } = this.config;
    const url = `${baseUrl.replace(/\/+$/, "")}/models/${encodeURIComponent(name)}:generateContent`;
    logger.debug({ model: name, parts: parts.length }, "Calling model");

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": apiKey,
        },
        body: JSON.stringify({ contents: [{ role: "user", parts }] }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new ModelRequestError(
        `Gemini request failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (!res.ok) {
      const body = await res.text();
      throw new ModelRequestError(
        `Gemini request failed with ${res.status}: ${body || res.statusText}`,
        res.status,
      );
    }
    const text = extractText(await res.json());
    logger.debug({ model: name, length: text.length }, "Model responded");
    return text;
  }
}

/**
 * Validate the model configuration and build the capability. Throws
 * ModelUnreachableError when no API key is configured.
 */
export function createGeminiModel(config: ModelConfig): GeminiModel {
  const { apiKey } = config;
  if (!apiKey) {
    throw new ModelUnreachableError("GEMINI_API_KEY is not set");
  }
  return new GeminiModel({ ...config, apiKey });
}
