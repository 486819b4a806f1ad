import { aggregate } from "./aggregate.js";
import { render } from "./format.js";
import { loadIgnoreFilter } from "./ignore.js";
import { selectCandidates } from "./select.js";
import { estimatorForModel, type TokenEstimator } from "./tokenizer.js";
import type { ClipboardSink, ClipboardWriteResult } from "./clipboard.js";
import type { AggregateResult, CandidateFile, CopyOptions, PatternConfig } from "../types.js";

export interface CopyDeps {
  // null skips the clipboard (--no-clip)
  clipboard: ClipboardSink | null;
  estimateTokens?: TokenEstimator;
}

export interface CopyReport extends AggregateResult {
  candidates: CandidateFile[];
  text: string;
  // false when the model fell back to the chars/4 estimate
  modelKnown: boolean;
  // undefined when nothing was written to the clipboard
  clipboard?: ClipboardWriteResult;
}

/**
 * Select, read and render the configured files and hand the text to the
 * clipboard. Nothing is written when no file fits the limits.
 */
export async function runCopy(config: PatternConfig, options: CopyOptions, deps: CopyDeps): Promise<CopyReport> {
  const ignoreFilter = await loadIgnoreFilter(options.cwd, {
    useGitignore: options.useGitignore,
    exclude: options.exclude
  });
  const candidates = await selectCandidates(options.cwd, config, ignoreFilter, { gitignore: options.useGitignore });

  const { estimator, known } = estimatorForModel(options.model);
  const { included, summary } = await aggregate(candidates, {
    limits: options,
    estimateTokens: deps.estimateTokens ?? estimator
  });

  const text = included.length ? render(included, options) : "";
  const clipboard = included.length && deps.clipboard ? await deps.clipboard.write(text) : undefined;

  return { candidates, included, summary, text, modelKnown: known, clipboard };
}

/** Why a finished copy should exit non-zero, if it should. */
export function copyFailure(report: CopyReport): string | undefined {
  if (report.clipboard && !report.clipboard.ok) return report.clipboard.error.message;
  const total = report.candidates.length;
  const unusable = report.summary.skipped.filter((s) => s.reason === "read-error" || s.reason === "binary-ext").length;
  if (total > 0 && unusable === total) {
    return report.summary.readErrors === total
      ? `All ${total} candidate file(s) failed to read.`
      : `All ${total} candidate file(s) were unreadable or binary.`;
  }
  return undefined;
}
