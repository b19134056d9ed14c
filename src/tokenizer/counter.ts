import { TextDecoder } from "util";
import { Encoding } from "./backend.js";

const utf8 = new TextDecoder("utf-8");

/**
 * Counts and truncates text with one resolved encoding.
 * Holds no state beyond the encoding, so calls can be repeated freely.
 */
export class TokenCounter {
  readonly modelName: string;
  readonly encodingName: string;
  private readonly encoding: Encoding;

  constructor(modelName: string, encodingName: string, encoding: Encoding) {
    this.modelName = modelName;
    this.encodingName = encodingName;
    this.encoding = encoding;
  }

  count(text: string): number {
    return this.encoding.encode_ordinary(text).length;
  }

  /**
   * Keep at most `maxTokens` tokens of `text`.
   *
   * Cutting inside a multi-byte character decodes to a replacement character,
   * which can re-encode to more tokens than were kept; in that case fewer
   * tokens are kept until the result counts within the bound.
   */
  truncate(text: string, maxTokens: number): string {
    if (maxTokens <= 0) {
      return "";
    }

    const tokens = this.encoding.encode_ordinary(text);
    if (tokens.length <= maxTokens) {
      return text;
    }

    for (let keep = maxTokens; keep > 0; keep--) {
      const candidate = utf8.decode(
        this.encoding.decode(tokens.subarray(0, keep))
      );
      if (this.count(candidate) <= maxTokens) {
        return candidate;
      }
    }

    return "";
  }
}
