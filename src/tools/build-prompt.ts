import { z } from "zod";
import { Config, loadConfig } from "../config.js";
import { buildPrompt, CompressionOutcome } from "../prompt/builder.js";
import { createTokenizerResolver, TokenizerBackend } from "../tokenizer/index.js";

export const ChangeDescriptionSchema = z.object({
  branch: z.string().default("").describe("Current branch name"),
  changedFiles: z
    .array(z.string())
    .default([])
    .describe("Changed paths in status order (duplicates are removed)"),
  statusShort: z
    .string()
    .default("")
    .describe("Output of `git status --short`"),
  stagedDiff: z.string().default("").describe("Output of `git diff --cached`"),
  unstagedDiff: z.string().default("").describe("Output of `git diff`"),
  untrackedFiles: z
    .string()
    .default("")
    .describe("Output of `git ls-files --others --exclude-standard`"),
  recentCommits: z
    .string()
    .default("")
    .describe("Recent commit subject lines, one per line"),
});

export const BuildCommitPromptInputSchema = z.object({
  change: ChangeDescriptionSchema.describe("Pending repository changes"),
  maxContextChars: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Character budget for the git context (defaults to config)"),
  // Left unconstrained here so a bad budget surfaces as InvalidTokenBudgetError
  maxContextTokens: z
    .number()
    .optional()
    .describe("Token budget for the git context (defaults to config)"),
  tokenModel: z
    .string()
    .min(1)
    .optional()
    .describe("Model whose tokenizer counts the context"),
  tokenEncoding: z
    .string()
    .min(1)
    .optional()
    .describe("Explicit tiktoken encoding, e.g. o200k_base"),
});

export type BuildCommitPromptInput = z.infer<typeof BuildCommitPromptInputSchema>;

export interface BuildCommitPromptOutput {
  system: string;
  user: string;
  context: string;
  maxContextChars: number;
  usage?: CompressionOutcome;
}

export interface ToolDependencies {
  /** Shared by every call so encodings are only built once */
  backend: TokenizerBackend;
  /** Defaults to loadConfig() */
  config?: Config;
}

export function executeBuildPrompt(
  input: BuildCommitPromptInput,
  deps: ToolDependencies
): BuildCommitPromptOutput {
  const config = deps.config ?? loadConfig();
  const resolver = createTokenizerResolver({
    defaultModel: config.tokenModel,
    fallbackEncodings: config.fallbackEncodings,
    backend: deps.backend,
  });

  const maxContextChars = input.maxContextChars ?? config.maxContextChars;
  const payload = buildPrompt(input.change, {
    maxChars: maxContextChars,
    maxTokens: input.maxContextTokens ?? config.maxContextTokens,
    tokenModel: input.tokenModel ?? config.tokenModel,
    tokenEncoding: input.tokenEncoding ?? config.tokenEncoding,
    resolver,
  });

  return {
    system: payload.system,
    user: payload.user,
    context: payload.context,
    maxContextChars,
    usage: payload.usage,
  };
}
