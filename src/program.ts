import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import path from "node:path";
import fs from "node:fs/promises";
import { DEFAULT_LIMITS } from "./lib/config.js";
import { copyFailure, runCopy, type CopyReport } from "./lib/copy.js";
import { createClipboardSink, type ClipboardSink } from "./lib/clipboard.js";
import { describeError } from "./lib/errors.js";
import { PatternStore } from "./lib/store.js";
import { formatCount, padPlain } from "./lib/utils.js";
import type { ClassifiedEntry, CopyOptions, OutputFormat, StopReason, Summary } from "./types.js";

export interface ProgramDeps {
  clipboard?: ClipboardSink;
}

type CwdFlags = { cwd: string };

type CopyFlags = CwdFlags & {
  maxFiles: number;
  maxChars: number;
  maxTokens: number;
  model: string;
  exclude: string[];
  gitignore: boolean;
  format: OutputFormat;
  codeFences: boolean;
  header?: string;
  out?: string;
  stdout: boolean;
  clip: boolean;
  json: boolean;
};

const RULE = "=".repeat(50);

const STOP_MESSAGES: Record<StopReason, string> = {
  files: "file limit reached",
  chars: "character limit reached",
  tokens: "token limit reached"
};

function limitValue(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a non-negative integer.");
  return Number.parseInt(value, 10);
}

function outputFormat(value: string): OutputFormat {
  if (value === "markdown" || value === "tags") return value;
  throw new InvalidArgumentError("Expected markdown or tags.");
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(",").map((s) => s.trim()).filter(Boolean)];
}

function resolveCwd(opts: CwdFlags): string {
  return path.resolve(process.cwd(), opts.cwd);
}

function fail(message: string) {
  console.error(chalk.red(message));
  process.exitCode = 1;
}

function describeEntry(entry: ClassifiedEntry): string {
  return entry.kind === "pattern" ? `Glob pattern '${entry.value}'` : `File '${entry.value}'`;
}

function printList(title: string, items: string[]) {
  if (!items.length) return;
  console.log("\n" + chalk.bold(title));
  for (const item of items) console.log(` - ${item}`);
}

function printSummary(summary: Summary, limits: Pick<CopyOptions, "maxFiles" | "maxChars" | "maxTokens">) {
  const row = (label: string, value: string) => console.error(`${padPlain(label, 19)}: ${value}`);
  console.error("\n" + RULE);
  console.error(chalk.bold(padPlain("", 21) + "Summary"));
  console.error(RULE);
  row("Files Copied", `${summary.filesIncluded}/${formatCount(limits.maxFiles)}`);
  row("Total Characters", `${formatCount(summary.charsCopied)}/${formatCount(limits.maxChars)}`);
  row("Total Tokens", `${formatCount(summary.tokensEstimated)}/${formatCount(limits.maxTokens)}`);
  row("Total Lines Added", formatCount(summary.linesCopied));

  if (summary.filesSkipped > 0) {
    console.error("\n" + chalk.yellow("Warnings:"));
    console.error("-".repeat(50));
    row("Files Skipped", String(summary.filesSkipped));
    if (summary.stopReason) row("Stopped", STOP_MESSAGES[summary.stopReason]);
    console.error("\nSkipped Files:");
    for (const s of summary.skipped) {
      console.error(chalk.yellow(` - ${s.relPath} (${s.message ?? s.reason})`));
    }
  } else {
    console.error(chalk.gray("\nNo files were skipped."));
  }

  if (summary.stopReason === "tokens") {
    console.error(chalk.yellow("Warning: Maximum token limit reached. Some files were skipped to stay within the limit."));
  } else if (summary.tokensEstimated > 0) {
    console.error(`Estimated tokens remaining for LLM: ${formatCount(limits.maxTokens - summary.tokensEstimated)}`);
  }
  console.error(RULE + "\n");
}

function summaryJson(report: CopyReport) {
  const { summary } = report;
  return {
    filesIncluded: summary.filesIncluded,
    filesSkipped: summary.filesSkipped,
    charsCopied: summary.charsCopied,
    tokensEstimated: summary.tokensEstimated,
    linesCopied: summary.linesCopied,
    stopReason: summary.stopReason ?? null,
    included: report.included.map((f) => ({ path: f.relPath, chars: f.chars, tokens: f.tokens, explicit: f.isExplicit })),
    skipped: summary.skipped
  };
}

async function withStore(opts: CwdFlags, fn: (store: PatternStore) => Promise<void>) {
  let store: PatternStore;
  try {
    store = await PatternStore.load(resolveCwd(opts));
  } catch (e) {
    fail(`Error loading config: ${describeError(e)}`);
    return;
  }
  await fn(store);
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  // Friendlier error UX
  program.showHelpAfterError();
  program.configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

  program
    .name("ctc")
    .description(
      "Select project files with glob patterns and explicit paths, then copy them to the clipboard for an LLM.\n\n" +
        "Examples:\n" +
        '  ctc add "**/*.py"              all Python files\n' +
        '  ctc add "src/**/*.js" "**/*.md"\n' +
        "  ctc add path/to/ignored.file   explicit file, even if .gitignore excludes it\n" +
        "  ctc copy --max-tokens 32000"
    )
    .version("0.1.0");

  program
    .command("add")
    .description("Add glob patterns or explicit file paths")
    .argument("<entries...>", 'glob patterns or file paths, e.g. "**/*.py" "src/**/*.js" path/to/file.txt')
    .option("-C, --cwd <dir>", "project root", ".")
    .action(async (entries: string[], opts: CwdFlags) => {
      await withStore(opts, async (store) => {
        const res = await store.add(entries);
        for (const d of res.duplicates) console.log(chalk.gray(`Info: ${describeEntry(d)} is already in the list.`));
        for (const e of res.rejected) fail(e.message);
        printList("Added glob patterns:", res.addedPatterns);
        printList("Added explicit files:", res.addedFiles);
        if (!res.addedPatterns.length && !res.addedFiles.length) {
          console.log(chalk.yellow("\nNo new patterns or files were added."));
        } else {
          console.log(chalk.green(`\nSaved ${store.configPath}`));
        }
      });
    });

  program
    .command("remove")
    .description("Remove glob patterns or explicit file paths")
    .argument("<entries...>", "glob patterns or file paths to remove")
    .option("-C, --cwd <dir>", "project root", ".")
    .action(async (entries: string[], opts: CwdFlags) => {
      await withStore(opts, async (store) => {
        const res = await store.remove(entries);
        for (const m of res.missing) console.log(chalk.gray(`Info: ${describeEntry(m)} is not in the list.`));
        printList("Removed glob patterns:", res.removedPatterns);
        printList("Removed explicit files:", res.removedFiles);
        if (!res.removedPatterns.length && !res.removedFiles.length) {
          console.log(chalk.yellow("\nNo patterns or files were removed."));
        }
      });
    });

  program
    .command("list")
    .description("List the include patterns and explicit files")
    .option("-C, --cwd <dir>", "project root", ".")
    .option("--json", "output JSON", false)
    .action(async (opts: CwdFlags & { json: boolean }) => {
      await withStore(opts, async (store) => {
        const cfg = store.list();
        if (opts.json) {
          console.log(JSON.stringify(cfg, null, 2));
          return;
        }
        if (store.isEmpty()) {
          console.log(chalk.yellow("\nNo include patterns or explicit files found."));
          return;
        }
        printList("Current include patterns (glob):", cfg.include_patterns);
        printList("Current explicit files:", cfg.explicit_files);
      });
    });

  program
    .command("clear-all")
    .description("Remove every include pattern and explicit file")
    .option("-C, --cwd <dir>", "project root", ".")
    .action(async (opts: CwdFlags) => {
      await withStore(opts, async (store) => {
        if (await store.clearAll()) console.log(chalk.green("\nAll include patterns and explicit files have been cleared."));
        else console.log(chalk.yellow("\nNo include patterns or explicit files to clear."));
      });
    });

  program
    .command("copy")
    .description("Copy the selected files to the clipboard within file, character and token limits")
    .option("-C, --cwd <dir>", "project root", ".")
    .option("--max-files <n>", "maximum number of files", limitValue, DEFAULT_LIMITS.maxFiles)
    .option("--max-chars <n>", "maximum number of characters", limitValue, DEFAULT_LIMITS.maxChars)
    .option("--max-tokens <n>", "maximum number of tokens", limitValue, DEFAULT_LIMITS.maxTokens)
    .option("--model <name>", "model to estimate tokens for", DEFAULT_LIMITS.model)
    .option("--exclude <globs>", "exclude globs for pattern matches (repeatable, comma separated)", collect, [])
    .option("--no-gitignore", "do not respect .gitignore")
    .option("-f, --format <fmt>", "markdown | tags", outputFormat, "markdown")
    .option("--no-code-fences", "omit ``` fences in markdown")
    .option("--header <text>", "prepend a header")
    .option("-o, --out <file>", "also write to a file")
    .option("--stdout", "also write to stdout", false)
    .option("--no-clip", "do not copy to clipboard")
    .option("--json", "print the summary as JSON on stdout", false)
    .action(async (opts: CopyFlags) => {
      await withStore(opts, async (store) => {
        if (store.isEmpty()) {
          fail(
            "Error: No include patterns or explicit files found. Add patterns or files with the 'add' command before copying."
          );
          return;
        }

        const cfg: CopyOptions = {
          cwd: store.root,
          useGitignore: opts.gitignore !== false,
          exclude: opts.exclude,
          maxFiles: opts.maxFiles,
          maxChars: opts.maxChars,
          maxTokens: opts.maxTokens,
          model: opts.model,
          format: opts.format,
          codeFences: opts.codeFences !== false,
          header: opts.header || undefined
        };

        const report = await runCopy(store.list(), cfg, {
          clipboard: opts.clip === false ? null : deps.clipboard ?? createClipboardSink()
        });

        if (!report.modelKnown) {
          console.error(
            chalk.yellow(`Warning: Model '${cfg.model}' is not in the token table; estimating ~4 characters per token.`)
          );
        }

        if (report.included.length) {
          // Write to file if requested
          if (opts.out) {
            await fs.writeFile(path.resolve(process.cwd(), opts.out), report.text, "utf8");
            console.error(chalk.green(`Wrote ${opts.out}`));
          }
          if (opts.stdout) {
            process.stdout.write(report.text);
            if (!report.text.endsWith("\n")) process.stdout.write("\n");
          }
          if (report.clipboard?.ok) {
            console.error(
              chalk.green(report.clipboard.method === "osc52" ? "Files copied to clipboard via OSC52." : "Files copied to clipboard.")
            );
          }
        } else {
          console.error(
            chalk.yellow("\nNo files to copy after applying limits and .gitignore rules. Adjust your patterns or limits.")
          );
        }

        if (opts.json) console.log(JSON.stringify(summaryJson(report), null, 2));
        else printSummary(report.summary, cfg);

        const failure = copyFailure(report);
        if (failure) fail(failure);
      });
    });

  return program;
}
