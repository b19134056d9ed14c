import {
  CountingBackendUnavailableError,
  EncodingResolutionError,
  UnknownEncodingError,
} from "../errors.js";
import { Encoding, EncodingRegistry, TokenizerBackend } from "./backend.js";
import { TokenCounter } from "./counter.js";

export interface TokenizerResolverOptions {
  backend: TokenizerBackend;
  /** Model used when resolve() is called without one */
  defaultModel: string;
  /** Tried in order when the model has no known encoding */
  fallbackEncodings: readonly string[];
}

type Lookup = { ok: true; encoding: Encoding } | { ok: false; error: unknown };

function lookupEncoding(registry: EncodingRegistry, encodingName: string): Lookup {
  try {
    return { ok: true, encoding: registry.get_encoding(encodingName) };
  } catch (error) {
    return { ok: false, error };
  }
}

function lookupModel(registry: EncodingRegistry, modelName: string): Lookup {
  try {
    return { ok: true, encoding: registry.encoding_for_model(modelName) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Resolves a model name, or an explicit encoding name, to a TokenCounter.
 *
 * Defaults live on the instance, so resolvers configured differently can
 * share one backend.
 */
export class TokenizerResolver {
  readonly defaultModel: string;
  readonly fallbackEncodings: readonly string[];
  private readonly backend: TokenizerBackend;

  constructor(options: TokenizerResolverOptions) {
    this.backend = options.backend;
    this.defaultModel = options.defaultModel;
    this.fallbackEncodings = [...options.fallbackEncodings];
  }

  get available(): boolean {
    return this.backend.kind === "available";
  }

  resolve(modelName: string = this.defaultModel, encodingName?: string): TokenCounter {
    if (this.backend.kind === "unavailable") {
      throw new CountingBackendUnavailableError(this.backend.reason);
    }
    const registry = this.backend.registry;

    if (encodingName) {
      const explicit = lookupEncoding(registry, encodingName);
      if (!explicit.ok) {
        throw new UnknownEncodingError(encodingName, { cause: explicit.error });
      }
      return new TokenCounter(modelName, encodingName, explicit.encoding);
    }

    const forModel = lookupModel(registry, modelName);
    if (forModel.ok) {
      // Encodings built outside tiktoken's tables may be unnamed
      const name = forModel.encoding.name ?? modelName;
      return new TokenCounter(modelName, name, forModel.encoding);
    }

    for (const fallbackName of this.fallbackEncodings) {
      const fallback = lookupEncoding(registry, fallbackName);
      if (fallback.ok) {
        return new TokenCounter(modelName, fallbackName, fallback.encoding);
      }
    }

    throw new EncodingResolutionError(modelName, this.fallbackEncodings);
  }
}
