import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

export const DEFAULT_TOKEN_MODEL = "gpt-4.1-mini";
export const DEFAULT_FALLBACK_ENCODINGS = ["o200k_base", "cl100k_base"] as const;

export const ConfigSchema = z.object({
  /** Character budget for the rendered git context */
  maxContextChars: z.number().int().positive().default(12000),
  /** Optional token budget; enables context compression */
  maxContextTokens: z.number().int().positive().optional(),
  /** Model whose tokenizer is used for counting */
  tokenModel: z.string().min(1).default(DEFAULT_TOKEN_MODEL),
  /** Explicit tiktoken encoding, overriding the model's */
  tokenEncoding: z.string().min(1).optional(),
  /** Encodings tried in order when the model is unknown to tiktoken */
  fallbackEncodings: z
    .array(z.string().min(1))
    .default(() => [...DEFAULT_FALLBACK_ENCODINGS]),
});

export type Config = z.infer<typeof ConfigSchema>;

export function getConfigDir(): string {
  return path.join(os.homedir(), ".config", "commit-context");
}

function parseIntEnv(name: string): number | undefined {
  const value = process.env[name];
  return value ? Number(value) : undefined;
}

export function loadConfig(
  configPath: string = path.join(getConfigDir(), "config.json")
): Config {
  let fileConfig: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    try {
      fileConfig = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(
        `Warning: Invalid JSON in config file ${configPath} (${detail}). Using defaults.`
      );
    }
  }

  const config = ConfigSchema.parse({
    maxContextChars:
      parseIntEnv("COMMIT_CONTEXT_MAX_CONTEXT_SIZE") ?? fileConfig.maxContextChars,
    maxContextTokens:
      parseIntEnv("COMMIT_CONTEXT_MAX_CONTEXT_TOKENS") ?? fileConfig.maxContextTokens,
    tokenModel: process.env.COMMIT_CONTEXT_TOKEN_MODEL || fileConfig.tokenModel,
    tokenEncoding:
      process.env.COMMIT_CONTEXT_TOKEN_ENCODING || fileConfig.tokenEncoding,
    fallbackEncodings: fileConfig.fallbackEncodings,
  });

  return config;
}
