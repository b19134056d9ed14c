import { describe, it, expect } from "vitest";
import { buildCommitContext, buildContext } from "./builder.js";
import { ChangeDescription } from "./change.js";
import { TokenizerResolver } from "../tokenizer/index.js";
import { CountingBackendUnavailableError, InvalidTokenBudgetError } from "../errors.js";
import {
  createChange,
  createFakeBackend,
  createFakeRegistry,
  createNoisyChange,
  UNAVAILABLE_BACKEND,
} from "../test-utils.js";

function fakeResolver(registry = createFakeRegistry()): TokenizerResolver {
  return new TokenizerResolver({
    backend: createFakeBackend(registry),
    defaultModel: "known-model",
    fallbackEncodings: ["o200k_base", "cl100k_base"],
  });
}

const unavailableResolver = new TokenizerResolver({
  backend: UNAVAILABLE_BACKEND,
  defaultModel: "known-model",
  fallbackEncodings: ["o200k_base"],
});

describe("buildCommitContext", () => {
  it("rejects a zero token budget before reading the change or the tokenizer", () => {
    let touches = 0;
    const touched = (value: string): string => {
      touches++;
      return value;
    };
    const change: ChangeDescription = {
      get branch() {
        return touched("main");
      },
      get changedFiles() {
        touches++;
        return [];
      },
      get statusShort() {
        return touched("");
      },
      get stagedDiff() {
        return touched("");
      },
      get unstagedDiff() {
        return touched("");
      },
      get untrackedFiles() {
        return touched("");
      },
      get recentCommits() {
        return touched("");
      },
    };
    const registry = createFakeRegistry();

    expect(() =>
      buildCommitContext(change, { maxChars: 1000, maxTokens: 0, resolver: fakeResolver(registry) })
    ).toThrow(InvalidTokenBudgetError);
    expect(() =>
      buildCommitContext(change, { maxChars: 1000, maxTokens: 0, resolver: fakeResolver(registry) })
    ).toThrow("max_context_tokens must be a positive integer, got: 0");
    expect(touches).toBe(0);
    expect(registry.lookups).toEqual([]);
  });

  it("compresses with the resolved counter", () => {
    const result = buildCommitContext(createNoisyChange(), {
      maxChars: 1_000_000,
      maxTokens: 500,
      resolver: fakeResolver(),
    });

    expect(result.tokenAware).toBe(true);
    if (result.tokenAware) {
      expect(result.counter.encodingName).toBe("known-encoding");
      expect(result.compression.tokensAfter).toBe(391);
      expect(result.context).toBe(result.compression.context);
    }
  });

  it("measures without compressing when no token budget is set", () => {
    const change = createChange({ changedFiles: ["a.ts"] });
    const result = buildCommitContext(change, { maxChars: 1000, resolver: fakeResolver() });

    expect(result.tokenAware).toBe(true);
    if (result.tokenAware) {
      expect(result.compression.stages).toEqual([]);
      expect(result.compression.tokenLimit).toBeNull();
    }
    expect(result.context).toBe(buildContext(change, 1000));
  });

  it("honours an explicit encoding", () => {
    const result = buildCommitContext(createChange(), {
      maxChars: 1000,
      tokenModel: "known-model",
      tokenEncoding: "cl100k_base",
      resolver: fakeResolver(),
    });

    expect(result.tokenAware && result.counter.encodingName).toBe("cl100k_base");
  });

  it("falls back to character budgeting without tiktoken", () => {
    const change = createNoisyChange();
    const result = buildCommitContext(change, { maxChars: 500, resolver: unavailableResolver });

    expect(result).toEqual({ tokenAware: false, context: buildContext(change, 500) });
  });

  it("requires tiktoken once a token budget is set", () => {
    expect(() =>
      buildCommitContext(createNoisyChange(), {
        maxChars: 500,
        maxTokens: 100,
        resolver: unavailableResolver,
      })
    ).toThrow(CountingBackendUnavailableError);
  });
});
