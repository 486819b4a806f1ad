export type OutputFormat = 'markdown' | 'tags';

/** Persisted selection. Key names match the on-disk JSON. */
export interface PatternConfig {
  include_patterns: string[];
  explicit_files: string[];
}

export interface ConfigLocation {
  path: string;
  // false until the first write creates the file
  exists: boolean;
}

export type ClassifiedEntry =
  | { kind: 'pattern'; value: string }
  | { kind: 'explicit'; value: string };

export interface Limits {
  maxFiles: number;
  maxChars: number;
  maxTokens: number;
  model: string;
}

export interface SelectOptions {
  cwd: string;
  useGitignore: boolean;
  // extra exclusion globs; like .gitignore they never apply to explicit files
  exclude: string[];
}

export interface CopyOptions extends SelectOptions, Limits {
  format: OutputFormat;
  codeFences: boolean;
  header?: string;
}

export interface CandidateFile {
  absPath: string;
  relPath: string;
  isExplicit: boolean;
}

export interface IncludedFile extends CandidateFile {
  content: string;
  chars: number;
  lines: number;
  tokens: number;
  ext: string;
}

export type SkipReason = 'read-error' | 'binary-ext' | 'limit';

export interface SkippedFile {
  relPath: string;
  reason: SkipReason;
  message?: string;
}

export type StopReason = 'files' | 'chars' | 'tokens';

export interface Summary {
  filesIncluded: number;
  filesSkipped: number;
  charsCopied: number;
  tokensEstimated: number;
  linesCopied: number;
  readErrors: number;
  stopReason?: StopReason;
  skipped: SkippedFile[];
}

export interface AggregateResult {
  included: IncludedFile[];
  summary: Summary;
}
