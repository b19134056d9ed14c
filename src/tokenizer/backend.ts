import { createRequire } from "module";

/**
 * The slice of a tiktoken encoding that commit-context uses
 */
export interface Encoding {
  /** Encoding name, e.g. "o200k_base" (undefined on encodings built by hand) */
  readonly name?: string;
  encode_ordinary(text: string): Uint32Array;
  decode(tokens: Uint32Array): Uint8Array;
}

/**
 * Lookup of encodings by name or by model. Both methods throw when the
 * name is not recognised, which is how tiktoken reports unknown names.
 */
export interface EncodingRegistry {
  get_encoding(encodingName: string): Encoding;
  encoding_for_model(modelName: string): Encoding;
}

/**
 * Whether token counting is possible in this process.
 *
 * Kept as a value rather than an exception so callers can degrade to
 * character-only budgeting without catching anything.
 */
export type TokenizerBackend =
  | { kind: "available"; registry: EncodingRegistry }
  | { kind: "unavailable"; reason: string };

/**
 * Load tiktoken synchronously. A missing install or a WASM load failure
 * yields the "unavailable" variant.
 */
export function loadTokenizerBackend(): TokenizerBackend {
  const requireModule = createRequire(import.meta.url);

  let tiktoken: typeof import("tiktoken");
  try {
    tiktoken = requireModule("tiktoken");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { kind: "unavailable", reason };
  }

  // tiktoken types its lookups with literal unions; at runtime any string is
  // accepted and unknown names throw.
  const registry: EncodingRegistry = tiktoken;
  return { kind: "available", registry: memoizeRegistry(registry) };
}

/**
 * Cache encodings by name and by model. Building an encoding loads its BPE
 * ranks into WASM memory that is never reclaimed, so each one is built once
 * per backend.
 */
export function memoizeRegistry(registry: EncodingRegistry): EncodingRegistry {
  const byEncoding = new Map<string, Encoding>();
  const byModel = new Map<string, Encoding>();

  return {
    get_encoding(encodingName: string): Encoding {
      let encoding = byEncoding.get(encodingName);
      if (!encoding) {
        encoding = registry.get_encoding(encodingName);
        byEncoding.set(encodingName, encoding);
      }
      return encoding;
    },
    encoding_for_model(modelName: string): Encoding {
      let encoding = byModel.get(modelName);
      if (!encoding) {
        encoding = registry.encoding_for_model(modelName);
        byModel.set(modelName, encoding);
      }
      return encoding;
    },
  };
}
