import {
  buildCommitContext,
  ChangeDescription,
  CompressionStage,
  ContextBuildOptions,
  StageRecord,
  stageId,
} from "../context/index.js";
import { TokenCounter } from "../tokenizer/index.js";

export const SYSTEM_PROMPT = `You are an expert software engineer writing high-quality Conventional Commit messages.
Analyze the git changes and return ONLY valid JSON with this schema:
{
  "type": "feat|fix|docs|style|refactor|perf|test|build|ci|chore|revert",
  "scope": "optional short scope or empty string",
  "subject": "imperative mood summary, no trailing period",
  "body": ["optional detail line 1", "optional detail line 2"],
  "breaking_change": false
}
Rules:
- Keep header intent specific and factual.
- Prefer "chore" if uncertain.
- subject should be concise and <= 72 chars when combined with type/scope.
- body lines should be short and meaningful.
- Return JSON only; no markdown fences, no commentary.
`;

/**
 * Token accounting for one prompt build
 */
export interface CompressionOutcome {
  modelName: string;
  encodingName: string;
  /** Context after compression */
  context: string;
  contextTokensBefore: number;
  contextTokensAfter: number;
  /** System prompt plus user prompt */
  totalTokensBefore: number;
  totalTokensAfter: number;
  tokenLimit: number | null;
  compressionApplied: boolean;
  stages: readonly CompressionStage[];
  stageIds: readonly string[];
  trail: readonly StageRecord[];
}

export interface PromptPayload {
  readonly system: string;
  readonly user: string;
  readonly context: string;
  readonly usage?: CompressionOutcome;
}

export function buildUserPrompt(context: string): string {
  return (
    "Generate one normalized conventional commit proposal from the git context.\n" +
    "Focus on user-impacting and structural changes, not file-by-file narration.\n\n" +
    `${context}\n`
  );
}

function countPromptTokens(counter: TokenCounter, context: string): number {
  return counter.count(SYSTEM_PROMPT) + counter.count(buildUserPrompt(context));
}

/**
 * Wrap a finished context into the outbound prompt
 */
export function assemblePrompt(
  context: string,
  usage?: CompressionOutcome
): PromptPayload {
  const payload: PromptPayload = {
    system: SYSTEM_PROMPT,
    user: buildUserPrompt(context),
    context,
    ...(usage ? { usage: Object.freeze(usage) } : {}),
  };
  return Object.freeze(payload);
}

/**
 * Build the prompt for a change description, compressing the context to the
 * configured budgets. Usage is attached only when tokens could be counted.
 */
export function buildPrompt(
  change: ChangeDescription,
  options: ContextBuildOptions
): PromptPayload {
  const built = buildCommitContext(change, options);
  if (!built.tokenAware) {
    return assemblePrompt(built.context);
  }

  const { compression, counter } = built;
  const stages = compression.stages;

  return assemblePrompt(built.context, {
    modelName: counter.modelName,
    encodingName: counter.encodingName,
    context: compression.context,
    contextTokensBefore: compression.tokensBefore,
    contextTokensAfter: compression.tokensAfter,
    totalTokensBefore: countPromptTokens(counter, compression.initialContext),
    totalTokensAfter: countPromptTokens(counter, compression.context),
    tokenLimit: compression.tokenLimit,
    compressionApplied: stages.length > 0,
    stages,
    stageIds: stages.map(stageId),
    trail: compression.trail,
  });
}
