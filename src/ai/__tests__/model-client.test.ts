import { describe, it, expect, vi, beforeEach } from "vitest";
import { GeminiModelClient } from "../model-client.js";
import type { ModelConfig } from "../../config.js";
import { UpstreamUnavailableError } from "../../errors.js";

const config: ModelConfig = {
  apiKey: "test-key",
  model: "gemini-2.5-flash",
  endpoint: "https://model.test/v1beta",
  timeoutMs: 2000,
};

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function candidate(...texts: string[]) {
  return { candidates: [{ content: { parts: texts.map(text => ({ text })) } }] };
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe("GeminiModelClient", () => {
  it("posts the prompt and returns the joined candidate text", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(candidate("Line one.", "Line two.")));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Tell a story", { temperature: 0.8 })).resolves.toBe("Line one.\nLine two.");

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://model.test/v1beta/models/gemini-2.5-flash:generateContent");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", "x-goog-api-key": "test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      contents: [{ role: "user", parts: [{ text: "Tell a story" }] }],
      generationConfig: { temperature: 0.8 },
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("requests a JSON response type when asked", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(candidate("{}")));
    const client = new GeminiModelClient(config, mockFetch);

    await client.generate("Plan", { json: true });

    const body = JSON.parse(String(mockFetch.mock.calls[0][1]?.body));
    expect(body.generationConfig).toEqual({ responseMimeType: "application/json" });
  });

  it("fails without calling out when no API key is configured", async () => {
    const client = new GeminiModelClient({ ...config, apiKey: undefined }, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("MODEL_API_KEY is not configured"));
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("maps network errors to UpstreamUnavailableError", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("Model request failed: fetch failed"));
  });

  it("maps timeouts to UpstreamUnavailableError", async () => {
    mockFetch.mockRejectedValueOnce(new DOMException("The operation was aborted due to timeout", "TimeoutError"));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("Model request timed out after 2000ms"));
  });

  it("maps non-2xx responses to UpstreamUnavailableError", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "API key not valid" } }, 403));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("Model API returned status 403"));
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("rejects a body that is not JSON", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>bad gateway</html>", { status: 200 }));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("Model API returned a non-JSON body"));
  });

  it("sends the output cap and thinking budget when given", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(candidate("Short.")));
    const client = new GeminiModelClient(config, mockFetch);

    await client.generate("Story", { maxOutputTokens: 256, thinkingBudget: 0 });

    const body = JSON.parse(String(mockFetch.mock.calls[0][1]?.body));
    expect(body.generationConfig).toEqual({ maxOutputTokens: 256, thinkingConfig: { thinkingBudget: 0 } });
  });

  it("reports a candidate cut off at the token limit", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      candidates: [{ finishReason: "MAX_TOKENS", content: { parts: [{ text: "Every journey begins with" }] } }],
    }));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Story")).rejects.toThrow(
      new UpstreamUnavailableError("Model output was cut off at the token limit"),
    );
  });

  it("reports a token-limited candidate that carries no parts", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ candidates: [{ finishReason: "MAX_TOKENS", content: { role: "model" } }] }));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Story")).rejects.toThrow("Model output was cut off at the token limit");
  });

  it("accepts a candidate that finished normally", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      candidates: [{ finishReason: "STOP", content: { parts: [{ text: "Done." }] } }],
    }));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Story")).resolves.toBe("Done.");
  });

  it("rejects a response without content", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ candidates: [] }));
    const client = new GeminiModelClient(config, mockFetch);

    await expect(client.generate("Plan")).rejects.toThrow(new UpstreamUnavailableError("Model returned no content"));
  });
});
