import { z } from "zod";
import { UpstreamUnavailableError } from "../errors.js";
import type { ModelConfig } from "../config.js";

export interface GenerateOptions {
  /** Ask the model for a JSON body instead of free text. */
  json?: boolean;
  temperature?: number;
  maxOutputTokens?: number;
  /** Token budget for the model's internal reasoning; 0 turns it off. */
  thinkingBudget?: number;
}

/**
 * One prompt in, the model's text out. The gateway only talks to this
 * interface, so tests swap in a deterministic fake.
 */
export interface ModelClient {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        finishReason: z.string().optional(),
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      }),
    )
    .optional(),
});

function isAbortError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "name" in err
    && (err.name === "TimeoutError" || err.name === "AbortError");
}

/**
 * Calls the Gemini `generateContent` REST endpoint. Every failure on the way
 * (missing key, network, timeout, non-2xx, truncated or empty candidate) surfaces as
 * UpstreamUnavailableError.
 */
export class GeminiModelClient implements ModelClient {
  constructor(
    private readonly config: ModelConfig,
    private readonly fetchImpl: typeof fetch = (...args) => fetch(...args),
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (!this.config.apiKey) {
      throw new UpstreamUnavailableError("MODEL_API_KEY is not configured");
    }

    const url = `${this.config.endpoint}/models/${encodeURIComponent(this.config.model)}:generateContent`;
    const body = {
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      generationConfig: {
        ...(options.json ? { responseMimeType: "application/json" } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxOutputTokens !== undefined ? { maxOutputTokens: options.maxOutputTokens } : {}),
        ...(options.thinkingBudget !== undefined ? { thinkingConfig: { thinkingBudget: options.thinkingBudget } } : {}),
      },
    };

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": this.config.apiKey,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new UpstreamUnavailableError(`Model request timed out after ${this.config.timeoutMs}ms`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailableError(`Model request failed: ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      console.warn(`[model] ${this.config.model} returned ${response.status}:`, detail.slice(0, 500));
      throw new UpstreamUnavailableError(`Model API returned status ${response.status}`);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      throw new UpstreamUnavailableError("Model API returned a non-JSON body", { cause: err });
    }
    const parsed = generateContentResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamUnavailableError("Model API returned an unexpected body");
    }
    const candidate = parsed.data.candidates?.[0];

    // Thinking tokens count against maxOutputTokens, so a capped answer can be cut short or empty
    if (candidate?.finishReason === "MAX_TOKENS") {
      throw new UpstreamUnavailableError("Model output was cut off at the token limit");
    }

    const text = candidate?.content?.parts
      ?.map(part => part.text ?? "")
      .join("\n")
      .trim();

    if (!text) {
      throw new UpstreamUnavailableError("Model returned no content");
    }
    return text;
  }
}
