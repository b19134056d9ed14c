import { TokenCounter, TokenizerResolver } from "../tokenizer/index.js";
import { buildSections, ChangeDescription } from "./change.js";
import {
  assertTokenBudget,
  compressSections,
  CompressionResult,
} from "./compression.js";
import { renderSections } from "./render.js";

export interface ContextBuildOptions {
  maxChars: number;
  maxTokens?: number;
  /** Model whose tokenizer measures the context (resolver default if omitted) */
  tokenModel?: string;
  /** Explicit encoding; overrides the model's */
  tokenEncoding?: string;
  resolver: TokenizerResolver;
}

export type ContextBuildResult =
  | { tokenAware: false; context: string }
  | {
      tokenAware: true;
      context: string;
      compression: CompressionResult;
      counter: TokenCounter;
    };

/**
 * Render a change description within the character budget only
 */
export function buildContext(change: ChangeDescription, maxChars: number): string {
  return renderSections(buildSections(change), maxChars);
}

/**
 * Render a change description within the character budget and, when a
 * tokenizer is available, compress it to the token budget.
 *
 * Without tiktoken the character-bounded context is returned as long as no
 * token budget was asked for; with a budget the missing backend is an error.
 */
export function buildCommitContext(
  change: ChangeDescription,
  options: ContextBuildOptions
): ContextBuildResult {
  const { maxChars, maxTokens, resolver } = options;

  if (maxTokens !== undefined) {
    assertTokenBudget(maxTokens);
  }

  if (!resolver.available && maxTokens === undefined) {
    return { tokenAware: false, context: buildContext(change, maxChars) };
  }

  const counter = resolver.resolve(options.tokenModel, options.tokenEncoding);
  const compression = compressSections(buildSections(change), {
    maxChars,
    maxTokens,
    counter,
  });

  return {
    tokenAware: true,
    context: compression.context,
    compression,
    counter,
  };
}
