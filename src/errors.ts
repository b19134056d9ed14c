/**
 * Error types raised by commit-context.
 *
 * Everything extends CommitContextError so the MCP surface can tell expected
 * failures (bad config, unknown encodings) from defects.
 */

export class CommitContextError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigError extends CommitContextError {}

/**
 * A token budget that is not a positive integer
 */
export class InvalidTokenBudgetError extends ConfigError {
  readonly maxTokens: number;

  constructor(maxTokens: number) {
    super(`max_context_tokens must be a positive integer, got: ${maxTokens}`);
    this.maxTokens = maxTokens;
  }
}

export class TokenizerError extends CommitContextError {}

/**
 * An explicitly requested encoding that the tokenizer backend does not know.
 * Explicit requests are never swapped for another encoding.
 */
export class UnknownEncodingError extends TokenizerError {
  readonly encodingName: string;

  constructor(encodingName: string, options?: ErrorOptions) {
    super(`Unknown token encoding: ${encodingName}`, options);
    this.encodingName = encodingName;
  }
}

/**
 * Neither the model nor any fallback encoding could be resolved
 */
export class EncodingResolutionError extends TokenizerError {
  readonly modelName: string;
  readonly triedEncodings: readonly string[];

  constructor(modelName: string, triedEncodings: readonly string[]) {
    super(
      `Unable to resolve tokenizer encoding for model '${modelName}'. ` +
        "Pass tokenEncoding explicitly."
    );
    this.modelName = modelName;
    this.triedEncodings = triedEncodings;
  }
}

/**
 * The tokenizer backend (tiktoken) could not be loaded at all
 */
export class CountingBackendUnavailableError extends TokenizerError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Token counting requires 'tiktoken': ${reason}`);
    this.reason = reason;
  }
}
