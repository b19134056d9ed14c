import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { TextEncoder } from "util";
import { ChangeDescription } from "./context/change.js";
import { Encoding, EncodingRegistry, TokenizerBackend } from "./tokenizer/backend.js";

/**
 * Create a temporary directory for tests
 */
export function createTempDir(prefix: string = "test"): string {
  const dir = path.join(os.tmpdir(), `commit-context-${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  if (dir.startsWith(os.tmpdir())) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Write files from a path -> content map
 *
 * @example
 * createProjectStructure(tmpDir, {
 *   "config.json": '{"maxContextChars": 4000}',
 * });
 */
export function createProjectStructure(
  baseDir: string,
  files: Record<string, string>
): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(baseDir, relativePath);
    const dir = path.dirname(fullPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    fs.writeFileSync(fullPath, content, "utf-8");
  }
}

/**
 * Encoding that cuts text into fixed-size chunks of UTF-16 code units, so
 * token counts are easy to work out by hand: count = ceil(length / size).
 */
export class ChunkEncoding implements Encoding {
  readonly name: string | undefined;
  private readonly chunkSize: number;
  private readonly ids = new Map<string, number>();
  private readonly pieces: string[] = [];

  constructor(name: string | undefined, chunkSize: number) {
    this.name = name;
    this.chunkSize = chunkSize;
  }

  encode_ordinary(text: string): Uint32Array {
    const tokens: number[] = [];
    for (let i = 0; i < text.length; i += this.chunkSize) {
      const piece = text.slice(i, i + this.chunkSize);
      let id = this.ids.get(piece);
      if (id === undefined) {
        id = this.pieces.length;
        this.pieces.push(piece);
        this.ids.set(piece, id);
      }
      tokens.push(id);
    }
    return Uint32Array.from(tokens);
  }

  decode(tokens: Uint32Array): Uint8Array {
    const text = Array.from(tokens, (id) => this.pieces[id] ?? "").join("");
    return new TextEncoder().encode(text);
  }
}

/**
 * Encoding with one token per UTF-8 byte, for exercising cuts that land
 * inside a multi-byte character
 */
export class ByteEncoding implements Encoding {
  readonly name = "bytes";

  encode_ordinary(text: string): Uint32Array {
    return Uint32Array.from(new TextEncoder().encode(text));
  }

  decode(tokens: Uint32Array): Uint8Array {
    return Uint8Array.from(tokens);
  }
}

export interface FakeRegistry extends EncodingRegistry {
  /** Every lookup in call order, e.g. "model:known-model", "encoding:o200k_base" */
  lookups: string[];
}

/**
 * In-process stand-in for tiktoken.
 *
 * - model "known-model" -> "known-encoding" (1 char per token)
 * - "o200k_base": 1 char per token
 * - "cl100k_base": 4 chars per token
 * - anything else throws, as tiktoken does
 */
export function createFakeRegistry(): FakeRegistry {
  const encodings: Record<string, number> = {
    "known-encoding": 1,
    o200k_base: 1,
    cl100k_base: 4,
  };
  const lookups: string[] = [];

  return {
    lookups,
    get_encoding(encodingName: string): Encoding {
      lookups.push(`encoding:${encodingName}`);
      const chunkSize = encodings[encodingName];
      if (chunkSize === undefined) {
        throw new Error(`Unknown encoding ${encodingName}`);
      }
      return new ChunkEncoding(encodingName, chunkSize);
    },
    encoding_for_model(modelName: string): Encoding {
      lookups.push(`model:${modelName}`);
      if (modelName === "known-model") {
        return new ChunkEncoding("known-encoding", 1);
      }
      throw new Error(`Unknown model ${modelName}`);
    },
  };
}

export function createFakeBackend(registry: EncodingRegistry = createFakeRegistry()): TokenizerBackend {
  return { kind: "available", registry };
}

export const UNAVAILABLE_BACKEND: TokenizerBackend = {
  kind: "unavailable",
  reason: "Cannot find module 'tiktoken'",
};

/**
 * Change description with empty fields, overridden as needed
 */
export function createChange(overrides: Partial<ChangeDescription> = {}): ChangeDescription {
  return {
    branch: "main",
    changedFiles: [],
    statusShort: "",
    stagedDiff: "",
    unstagedDiff: "",
    untrackedFiles: "",
    recentCommits: "",
    ...overrides,
  };
}

/**
 * Numbered lines joined with "\n", e.g. numberedLines(3, "+line") is
 * "+line 1\n+line 2\n+line 3"
 */
export function numberedLines(count: number, prefix: string): string {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`).join("\n");
}

/**
 * A change with an oversized untracked listing and history, and small diffs.
 * Character lengths of its full render (no char limit):
 * all sections 10740, without untracked 4629, without both 391.
 */
export function createNoisyChange(overrides: Partial<ChangeDescription> = {}): ChangeDescription {
  return createChange({
    branch: "feature/context-budget",
    changedFiles: ["src/app.ts", "README.md"],
    statusShort: "M  src/app.ts\n M README.md\n?? assets/",
    stagedDiff: [
      "diff --git a/src/app.ts b/src/app.ts",
      "--- a/src/app.ts",
      "+++ b/src/app.ts",
      "@@ -1,3 +1,4 @@",
      " import { run } from './run';",
      "+import { log } from './log';",
      " run();",
    ].join("\n"),
    unstagedDiff: [
      "diff --git a/README.md b/README.md",
      "@@ -1 +1 @@",
      "-# App",
      "+# App service",
    ].join("\n"),
    untrackedFiles: Array.from(
      { length: 200 },
      (_, i) => `assets/generated/file-${i + 1}.json`
    ).join("\n"),
    recentCommits: numberedLines(120, "chore: routine maintenance pass"),
    ...overrides,
  });
}
