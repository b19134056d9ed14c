import { describe, it, expect } from "vitest";
import { CountTokensInputSchema, executeCountTokens } from "./count-tokens.js";
import { Config } from "../config.js";
import { CountingBackendUnavailableError, UnknownEncodingError } from "../errors.js";
import { createFakeBackend, UNAVAILABLE_BACKEND } from "../test-utils.js";

const config: Config = {
  maxContextChars: 12000,
  tokenModel: "known-model",
  fallbackEncodings: ["o200k_base", "cl100k_base"],
};

describe("CountTokensInputSchema", () => {
  it("requires text", () => {
    expect(CountTokensInputSchema.safeParse({ tokenModel: "gpt-4" }).success).toBe(false);
  });
});

describe("executeCountTokens", () => {
  it("counts with the configured model", () => {
    const result = executeCountTokens(
      { text: "hello world" },
      { backend: createFakeBackend(), config }
    );

    expect(result).toEqual({
      tokenCount: 11,
      characterCount: 11,
      modelName: "known-model",
      encodingName: "known-encoding",
    });
  });

  it("counts with an explicit encoding", () => {
    const result = executeCountTokens(
      { text: "hello world", tokenEncoding: "cl100k_base" },
      { backend: createFakeBackend(), config }
    );

    expect(result.tokenCount).toBe(3);
    expect(result.encodingName).toBe("cl100k_base");
  });

  it("falls back for an unknown model", () => {
    const result = executeCountTokens(
      { text: "abc", tokenModel: "future-model" },
      { backend: createFakeBackend(), config }
    );

    expect(result.modelName).toBe("future-model");
    expect(result.encodingName).toBe("o200k_base");
  });

  it("rejects an unknown encoding", () => {
    expect(() =>
      executeCountTokens(
        { text: "abc", tokenEncoding: "mystery_base" },
        { backend: createFakeBackend(), config }
      )
    ).toThrow(UnknownEncodingError);
  });

  it("requires tiktoken", () => {
    expect(() =>
      executeCountTokens({ text: "abc" }, { backend: UNAVAILABLE_BACKEND, config })
    ).toThrow(CountingBackendUnavailableError);
  });
});
