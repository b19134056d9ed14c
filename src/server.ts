import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import {
  BuildCommitPromptInputSchema,
  executeBuildPrompt,
} from "./tools/build-prompt.js";
import { CountTokensInputSchema, executeCountTokens } from "./tools/count-tokens.js";
import { loadTokenizerBackend, TokenizerBackend } from "./tokenizer/index.js";

const CHANGE_PROPERTIES = {
  branch: { type: "string", description: "Current branch name" },
  changedFiles: {
    type: "array",
    items: { type: "string" },
    description: "Changed paths in status order",
  },
  statusShort: { type: "string", description: "Output of `git status --short`" },
  stagedDiff: { type: "string", description: "Output of `git diff --cached`" },
  unstagedDiff: { type: "string", description: "Output of `git diff`" },
  untrackedFiles: {
    type: "string",
    description: "Output of `git ls-files --others --exclude-standard`",
  },
  recentCommits: {
    type: "string",
    description: "Recent commit subject lines, one per line",
  },
};

export interface ServerOptions {
  /** Tokenizer backend shared by all requests (defaults to tiktoken) */
  backend?: TokenizerBackend;
}

function toolResult(body: Record<string, unknown>, isError = false) {
  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(body, null, 2),
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

export function createServer(options: ServerOptions = {}): Server {
  const backend = options.backend ?? loadTokenizerBackend();
  if (backend.kind === "unavailable") {
    console.error(
      `[commit-context] tiktoken unavailable (${backend.reason}); token budgets are disabled`
    );
  }

  const server = new Server(
    {
      name: "commit-context",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "build_commit_prompt",
          description: `Build a bounded prompt for generating a Conventional Commit message.

This tool:
1. Renders branch, changed files, status, diffs, untracked files and recent subjects, in that priority order
2. Cuts the context to a character budget
3. When a token budget is set, drops untracked files and recent subjects, windows the diffs, and finally truncates by token
4. Reports which compression stages ran and the token counts before and after

Token counting is ${backend.kind === "available" ? "available" : "unavailable"}.`,
          inputSchema: {
            type: "object",
            properties: {
              change: {
                type: "object",
                properties: CHANGE_PROPERTIES,
                description: "Pending repository changes",
              },
              maxContextChars: {
                type: "number",
                description: "Character budget for the git context",
              },
              maxContextTokens: {
                type: "number",
                description: "Token budget for the git context",
              },
              tokenModel: {
                type: "string",
                description: "Model whose tokenizer counts the context",
              },
              tokenEncoding: {
                type: "string",
                description: "Explicit tiktoken encoding, e.g. o200k_base",
              },
            },
            required: ["change"],
          },
        },
        {
          name: "count_tokens",
          description: "Count tokens in text using a model's tiktoken encoding.",
          inputSchema: {
            type: "object",
            properties: {
              text: { type: "string", description: "Text to measure" },
              tokenModel: {
                type: "string",
                description: "Model whose tokenizer is used",
              },
              tokenEncoding: {
                type: "string",
                description: "Explicit tiktoken encoding",
              },
            },
            required: ["text"],
          },
        },
      ],
    };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    if (name !== "build_commit_prompt" && name !== "count_tokens") {
      throw new Error(`Unknown tool: ${name}`);
    }

    try {
      if (name === "count_tokens") {
        const input = CountTokensInputSchema.parse(request.params.arguments);
        const result = executeCountTokens(input, { backend });
        return toolResult({ success: true, ...result });
      }

      const input = BuildCommitPromptInputSchema.parse(request.params.arguments);
      const result = executeBuildPrompt(input, { backend });

      if (result.usage?.compressionApplied) {
        console.error(
          `[commit-context] context compressed to ${result.usage.contextTokensAfter}/${result.usage.tokenLimit} tokens: ${result.usage.stageIds.join(", ")}`
        );
      }

      return toolResult({ success: true, ...result });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return toolResult({ success: false, error: message }, true);
    }
  });

  return server;
}

export async function runServer(options: ServerOptions = {}): Promise<void> {
  const server = createServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[commit-context] MCP server listening on stdio");
}
