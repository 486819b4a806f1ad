import path from "node:path";
import { globby } from "globby";
import { CONFIG_FILENAME } from "./config.js";
import { compilePatterns } from "./patterns.js";
import { relativeToRoot, toPosix } from "./utils.js";
import type { IgnoreFilter } from "./ignore.js";
import type { CandidateFile, PatternConfig } from "../types.js";

export const VCS_DIRS = [".git", ".hg", ".svn", ".bzr", "_darcs", "CVS"];

// Never pattern matches; listing them explicitly still works.
const NEVER_MATCHED = new Set([".gitignore", CONFIG_FILENAME]);

export interface WalkOptions {
  // skip whatever the project's .gitignore files exclude
  gitignore?: boolean;
}

/** Every file under `cwd` as a root-relative POSIX path, in walk order. */
export async function walkProject(cwd: string, options: WalkOptions = {}): Promise<string[]> {
  const paths = await globby("**/*", {
    cwd,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    gitignore: options.gitignore ?? false,
    ignore: VCS_DIRS.map((d) => `**/${d}/**`)
  });
  return paths.map(toPosix);
}

/**
 * Candidates for a copy: explicit files first in the order they were added,
 * then pattern matches that the ignore filter lets through, in walk order.
 * Explicit files are never filtered and need not exist (a missing one fails
 * when read).
 */
export async function selectCandidates(
  cwd: string,
  config: PatternConfig,
  ignoreFilter: IgnoreFilter,
  walk: WalkOptions = {}
): Promise<CandidateFile[]> {
  const root = path.resolve(cwd);
  const seen = new Set<string>();
  const candidates: CandidateFile[] = [];

  for (const entry of config.explicit_files) {
    // hand-edited configs may hold ./ or absolute paths
    const rel = relativeToRoot(root, entry);
    if (seen.has(rel)) continue;
    seen.add(rel);
    candidates.push({ absPath: path.resolve(root, rel), relPath: rel, isExplicit: true });
  }

  if (!config.include_patterns.length) return candidates;

  const matches = compilePatterns(config.include_patterns);
  for (const rel of await walkProject(root, walk)) {
    if (seen.has(rel)) continue;
    if (NEVER_MATCHED.has(path.posix.basename(rel))) continue;
    if (!matches(rel) || ignoreFilter.ignores(rel)) continue;
    seen.add(rel);
    candidates.push({ absPath: path.join(root, rel), relPath: rel, isExplicit: false });
  }

  return candidates;
}
