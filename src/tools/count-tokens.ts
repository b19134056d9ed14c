import { z } from "zod";
import { loadConfig } from "../config.js";
import {
  countTokens,
  createTokenizerResolver,
  TokenCountResult,
} from "../tokenizer/index.js";
import { ToolDependencies } from "./build-prompt.js";

export const CountTokensInputSchema = z.object({
  text: z.string().describe("Text to measure"),
  tokenModel: z
    .string()
    .min(1)
    .optional()
    .describe("Model whose tokenizer is used (defaults to config)"),
  tokenEncoding: z
    .string()
    .min(1)
    .optional()
    .describe("Explicit tiktoken encoding, e.g. cl100k_base"),
});

export type CountTokensInput = z.infer<typeof CountTokensInputSchema>;

export function executeCountTokens(
  input: CountTokensInput,
  deps: ToolDependencies
): TokenCountResult {
  const config = deps.config ?? loadConfig();
  const resolver = createTokenizerResolver({
    defaultModel: config.tokenModel,
    fallbackEncodings: config.fallbackEncodings,
    backend: deps.backend,
  });

  return countTokens(input.text, {
    resolver,
    modelName: input.tokenModel,
    encodingName: input.tokenEncoding ?? config.tokenEncoding,
  });
}
