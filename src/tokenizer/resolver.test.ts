import { describe, it, expect } from "vitest";
import { TokenizerResolver } from "./resolver.js";
import {
  CountingBackendUnavailableError,
  EncodingResolutionError,
  UnknownEncodingError,
} from "../errors.js";
import {
  createFakeBackend,
  createFakeRegistry,
  UNAVAILABLE_BACKEND,
} from "../test-utils.js";

const FALLBACKS = ["o200k_base", "cl100k_base"];

function createResolver(registry = createFakeRegistry(), fallbackEncodings = FALLBACKS) {
  return new TokenizerResolver({
    backend: createFakeBackend(registry),
    defaultModel: "known-model",
    fallbackEncodings,
  });
}

describe("TokenizerResolver", () => {
  it("uses an explicit encoding without consulting the model", () => {
    const registry = createFakeRegistry();
    const counter = createResolver(registry).resolve("known-model", "cl100k_base");

    expect(counter.encodingName).toBe("cl100k_base");
    expect(counter.modelName).toBe("known-model");
    expect(counter.count("abcdefgh")).toBe(2);
    expect(registry.lookups).toEqual(["encoding:cl100k_base"]);
  });

  it.each(["known-model", "unknown-model"])(
    "rejects an unknown explicit encoding for %s without falling back",
    (modelName) => {
      const registry = createFakeRegistry();
      const resolve = () => createResolver(registry).resolve(modelName, "mystery_base");

      expect(resolve).toThrow(UnknownEncodingError);
      expect(resolve).toThrow("Unknown token encoding: mystery_base");
      expect(registry.lookups).toEqual(["encoding:mystery_base", "encoding:mystery_base"]);
    }
  );

  it("keeps the backend error as the cause", () => {
    try {
      createResolver().resolve("known-model", "mystery_base");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownEncodingError);
      if (error instanceof UnknownEncodingError) {
        expect(error.encodingName).toBe("mystery_base");
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it("resolves a known model to its encoding", () => {
    const registry = createFakeRegistry();
    const counter = createResolver(registry).resolve("known-model");

    expect(counter.encodingName).toBe("known-encoding");
    expect(registry.lookups).toEqual(["model:known-model"]);
  });

  it("names the encoding after the model when the encoding is unnamed", () => {
    const registry = createFakeRegistry();
    const unnamed = {
      ...registry,
      encoding_for_model: () => ({
        encode_ordinary: (text: string) => new Uint32Array(text.length),
        decode: () => new Uint8Array(),
      }),
    };

    expect(createResolver(unnamed).resolve("custom-model").encodingName).toBe("custom-model");
  });

  it("uses the default model when none is given", () => {
    const registry = createFakeRegistry();
    const counter = createResolver(registry).resolve();

    expect(counter.modelName).toBe("known-model");
    expect(registry.lookups).toEqual(["model:known-model"]);
  });

  it("falls back to the first resolvable encoding for an unknown model", () => {
    const registry = createFakeRegistry();
    const counter = createResolver(registry).resolve("future-model");

    expect(counter.modelName).toBe("future-model");
    expect(counter.encodingName).toBe("o200k_base");
    expect(registry.lookups).toEqual(["model:future-model", "encoding:o200k_base"]);
  });

  it("walks the fallbacks in order", () => {
    const registry = createFakeRegistry();
    const counter = createResolver(registry, ["missing_base", "cl100k_base"]).resolve(
      "future-model"
    );

    expect(counter.encodingName).toBe("cl100k_base");
    expect(registry.lookups).toEqual([
      "model:future-model",
      "encoding:missing_base",
      "encoding:cl100k_base",
    ]);
  });

  it("fails once every fallback is exhausted", () => {
    const resolve = () => createResolver(createFakeRegistry(), ["missing_base"]).resolve("future-model");

    expect(resolve).toThrow(EncodingResolutionError);
    expect(resolve).toThrow(
      "Unable to resolve tokenizer encoding for model 'future-model'. Pass tokenEncoding explicitly."
    );
  });

  it("reports an unavailable backend", () => {
    const resolver = new TokenizerResolver({
      backend: UNAVAILABLE_BACKEND,
      defaultModel: "known-model",
      fallbackEncodings: FALLBACKS,
    });

    expect(resolver.available).toBe(false);
    expect(() => resolver.resolve()).toThrow(CountingBackendUnavailableError);
    expect(() => resolver.resolve()).toThrow(
      "Token counting requires 'tiktoken': Cannot find module 'tiktoken'"
    );
  });

  it("keeps defaults per instance over a shared backend", () => {
    const backend = createFakeBackend();
    const first = new TokenizerResolver({
      backend,
      defaultModel: "known-model",
      fallbackEncodings: FALLBACKS,
    });
    const second = new TokenizerResolver({
      backend,
      defaultModel: "future-model",
      fallbackEncodings: ["cl100k_base"],
    });

    expect(first.resolve().encodingName).toBe("known-encoding");
    expect(second.resolve().encodingName).toBe("cl100k_base");
    expect(first.resolve("future-model").encodingName).toBe("o200k_base");
  });

  it("copies the fallback list it was given", () => {
    const fallbacks = ["o200k_base"];
    const resolver = createResolver(createFakeRegistry(), fallbacks);
    fallbacks.push("cl100k_base");

    expect(resolver.fallbackEncodings).toEqual(["o200k_base"]);
  });
});
