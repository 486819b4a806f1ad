import fs from "node:fs/promises";
import binaryExtensions from "binary-extensions";
import { FileReadError } from "./errors.js";
import { countLines, extnameLower } from "./utils.js";
import type { TokenEstimator } from "./tokenizer.js";
import type {
  AggregateResult,
  CandidateFile,
  IncludedFile,
  Limits,
  SkippedFile,
  StopReason,
  Summary
} from "../types.js";

const binarySet = new Set(binaryExtensions.map((e) => e.toLowerCase()));

function looksBinaryByExt(p: string) {
  return binarySet.has(extnameLower(p));
}

export type ReadText = (absPath: string) => Promise<string>;

const readUtf8: ReadText = (absPath) => fs.readFile(absPath, "utf8");

export interface AggregateOptions {
  limits: Pick<Limits, "maxFiles" | "maxChars" | "maxTokens">;
  estimateTokens: TokenEstimator;
  readText?: ReadText;
}

interface Totals {
  files: number;
  chars: number;
  tokens: number;
}

/**
 * Which limit the next file would break. Checked in the order files, chars,
 * tokens; the first one reported wins.
 */
export function exceededLimit(totals: Totals, next: Omit<Totals, "files">, limits: AggregateOptions["limits"]): StopReason | undefined {
  if (totals.files + 1 > limits.maxFiles) return "files";
  if (totals.chars + next.chars > limits.maxChars) return "chars";
  if (totals.tokens + next.tokens > limits.maxTokens) return "tokens";
  return undefined;
}

/**
 * Read candidates in order until the next one would break a limit. Whole
 * files only: the file that would overflow and everything after it are
 * skipped with reason `limit`. Unreadable and binary files are skipped and
 * the run goes on.
 */
export async function aggregate(candidates: CandidateFile[], options: AggregateOptions): Promise<AggregateResult> {
  const { limits, estimateTokens } = options;
  const readText = options.readText ?? readUtf8;

  const included: IncludedFile[] = [];
  const skipped: SkippedFile[] = [];
  const totals: Totals = { files: 0, chars: 0, tokens: 0 };
  let lines = 0;
  let readErrors = 0;
  let stopReason: StopReason | undefined;

  const skipRest = (from: number) => {
    for (const c of candidates.slice(from)) skipped.push({ relPath: c.relPath, reason: "limit" });
  };

  for (let i = 0; i < candidates.length; i++) {
    const c = candidates[i];

    if (totals.files + 1 > limits.maxFiles) {
      stopReason = "files";
      skipRest(i);
      break;
    }

    if (looksBinaryByExt(c.relPath)) {
      skipped.push({ relPath: c.relPath, reason: "binary-ext" });
      continue;
    }

    let content: string;
    try {
      content = await readText(c.absPath);
    } catch (e) {
      const err = new FileReadError(c.relPath, e);
      skipped.push({ relPath: c.relPath, reason: "read-error", message: err.message });
      readErrors++;
      continue;
    }

    const chars = content.length;
    const tokens = await estimateTokens(content);
    const exceeded = exceededLimit(totals, { chars, tokens }, limits);
    if (exceeded) {
      stopReason = exceeded;
      skipRest(i);
      break;
    }

    const fileLines = countLines(content);
    included.push({ ...c, content, chars, lines: fileLines, tokens, ext: extnameLower(c.relPath) });
    totals.files++;
    totals.chars += chars;
    totals.tokens += tokens;
    lines += fileLines;
  }

  const summary: Summary = {
    filesIncluded: included.length,
    filesSkipped: skipped.length,
    charsCopied: totals.chars,
    tokensEstimated: totals.tokens,
    linesCopied: lines,
    readErrors,
    stopReason,
    skipped
  };
  return { included, summary };
}
