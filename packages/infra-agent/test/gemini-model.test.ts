import { afterEach, describe, expect, it, vi } from "vitest";
import type { ModelConfig } from "../src/config/types.js";
import { ModelRequestError, ModelUnreachableError } from "../src/errors.js";
import { createGeminiModel, extractText } from "../src/model/GeminiModel.js";

const config: ModelConfig = {
  apiKey: "test-key",
  name: "gemini-test",
  baseUrl: "https://gemini.invalid/v1beta/",
  timeoutMs: 5_000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("GeminiModel", () => {
  it("posts the parts and joins the first candidate's text", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        candidates: [
          { content: { parts: [{ text: "# Report" }, { text: "\n- item" }] } },
          { content: { parts: [{ text: "ignored" }] } },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const text = await createGeminiModel(config).generate([
      { text: "instructions" },
      { text: "evidence" },
    ]);

    expect(text).toBe("# Report\n- item");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://gemini.invalid/v1beta/models/gemini-test:generateContent");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "x-goog-api-key": "test-key",
    });
    expect(init?.body).toBe(
      JSON.stringify({
        contents: [{ role: "user", parts: [{ text: "instructions" }, { text: "evidence" }] }],
      }),
    );
  });

  it("raises ModelRequestError on a non-2xx status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("quota exceeded", { status: 429 })),
    );

    const call = createGeminiModel(config).generate([{ text: "x" }]);
    await expect(call).rejects.toBeInstanceOf(ModelRequestError);
    await expect(call).rejects.toMatchObject({
      status: 429,
      message: "Gemini request failed with 429: quota exceeded",
    });
  });

  it("wraps transport failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(createGeminiModel(config).generate([{ text: "x" }])).rejects.toThrow(
      "Gemini request failed: fetch failed",
    );
  });

  it("refuses to build without an API key", () => {
    expect(() => createGeminiModel({ ...config, apiKey: undefined })).toThrow(
      ModelUnreachableError,
    );
    expect(() => createGeminiModel({ ...config, apiKey: "" })).toThrow(
      "GEMINI_API_KEY is not set",
    );
  });
});

describe("extractText", () => {
  it("returns an empty string for a candidate without text parts", () => {
    expect(extractText({ candidates: [{ finishReason: "SAFETY" }] })).toBe("");
  });

  it("rejects a response without candidates", () => {
    expect(() => extractText({})).toThrow("Gemini returned no candidates");
  });

  it("rejects a response of the wrong shape", () => {
    expect(() => extractText({ candidates: "nope" })).toThrow(ModelRequestError);
  });
});
