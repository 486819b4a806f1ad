import { Minimatch, type MinimatchOptions } from "minimatch";
import { InvalidPatternError } from "./errors.js";
import type { ClassifiedEntry } from "../types.js";

const WILDCARD_CHARS = ["*", "?", "[", "]"];

// Case-sensitive, dotfiles included, always matched against the whole root-relative path.
const MATCH_OPTIONS: MinimatchOptions = { dot: true, nocase: false, matchBase: false };

export function isGlobPattern(entry: string): boolean {
  return WILDCARD_CHARS.some((ch) => entry.includes(ch));
}

/**
 * Decide whether a user entry is an include pattern or a literal path.
 * Anything containing a wildcard character is a pattern.
 */
export function classifyEntry(entry: string): ClassifiedEntry {
  const value = entry.trim();
  return isGlobPattern(value) ? { kind: "pattern", value: normalizePattern(value) } : { kind: "explicit", value };
}

/** Patterns match root-relative paths, so a leading `./` is dropped. */
export function normalizePattern(pattern: string): string {
  let p = pattern;
  while (p.startsWith("./")) p = p.slice(2);
  return p;
}

function hasUnclosedClass(pattern: string): boolean {
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch !== "[") continue;
    let j = i + 1;
    if (pattern[j] === "!" || pattern[j] === "^") j++;
    // a ']' right after the opening bracket is a literal member
    if (pattern[j] === "]") j++;
    const close = pattern.indexOf("]", j);
    if (close === -1) return true;
    i = close;
  }
  return false;
}

function hasUnbalancedBraces(pattern: string): boolean {
  let depth = 0;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\") {
      i++;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth < 0) return true;
    }
  }
  return depth !== 0;
}

/** Returns the reason a pattern is rejected, or undefined when it is usable. */
export function validatePattern(pattern: string): InvalidPatternError | undefined {
  if (!pattern) return new InvalidPatternError(pattern, "empty pattern");
  if (pattern.startsWith("/")) return new InvalidPatternError(pattern, "patterns are relative to the project root");
  if (hasUnclosedClass(pattern)) return new InvalidPatternError(pattern, "unclosed character class '['");
  if (hasUnbalancedBraces(pattern)) return new InvalidPatternError(pattern, "unbalanced braces");
  try {
    if (new Minimatch(pattern, MATCH_OPTIONS).makeRe() === false) {
      return new InvalidPatternError(pattern, "pattern cannot be compiled");
    }
  } catch (e) {
    return new InvalidPatternError(pattern, e instanceof Error ? e.message : String(e));
  }
  return undefined;
}

export type PathMatcher = (relPath: string) => boolean;

export function compilePatterns(patterns: string[]): PathMatcher {
  const matchers = patterns.map((p) => new Minimatch(normalizePattern(p), MATCH_OPTIONS));
  return (relPath) => matchers.some((m) => m.match(relPath));
}
