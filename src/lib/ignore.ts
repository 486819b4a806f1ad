import { isGitIgnored } from "globby";
import { compilePatterns } from "./patterns.js";

export interface IgnoreFilter {
  /** `relPath` is a POSIX path relative to the project root. */
  ignores(relPath: string): boolean;
}

export interface IgnoreFilterOptions {
  useGitignore: boolean;
  exclude: string[];
}

/**
 * Exclusion rules for pattern matches: every `.gitignore` under the root
 * (nested files apply to their own subtree) plus the `--exclude` globs.
 */
export async function loadIgnoreFilter(cwd: string, options: IgnoreFilterOptions): Promise<IgnoreFilter> {
  const gitIgnored = options.useGitignore ? await isGitIgnored({ cwd }) : undefined;
  const excluded = compilePatterns(options.exclude);
  return {
    ignores(relPath) {
      if (excluded(relPath)) return true;
      return gitIgnored ? gitIgnored(relPath) : false;
    }
  };
}
