import { loadTokenizerBackend, TokenizerBackend } from "./backend.js";
import { TokenizerResolver } from "./resolver.js";

export * from "./backend.js";
export * from "./counter.js";
export * from "./resolver.js";

export interface TokenCountResult {
  tokenCount: number;
  characterCount: number;
  modelName: string;
  encodingName: string;
}

/**
 * Create a resolver over the installed tiktoken (or the given backend)
 */
export function createTokenizerResolver(options: {
  defaultModel: string;
  fallbackEncodings: readonly string[];
  backend?: TokenizerBackend;
}): TokenizerResolver {
  return new TokenizerResolver({
    backend: options.backend ?? loadTokenizerBackend(),
    defaultModel: options.defaultModel,
    fallbackEncodings: options.fallbackEncodings,
  });
}

/**
 * Count tokens in a piece of text with model-aware encoding resolution
 */
export function countTokens(
  text: string,
  options: {
    resolver: TokenizerResolver;
    modelName?: string;
    encodingName?: string;
  }
): TokenCountResult {
  const counter = options.resolver.resolve(options.modelName, options.encodingName);
  return {
    tokenCount: counter.count(text),
    characterCount: text.length,
    modelName: counter.modelName,
    encodingName: counter.encodingName,
  };
}
