import path from 'node:path';
import { loadPatternConfig, savePatternConfig, toPatternConfig, type StoredConfig } from './config.js';
import { InvalidPatternError } from './errors.js';
import { classifyEntry, validatePattern } from './patterns.js';
import { relativeToRoot } from './utils.js';
import type { ClassifiedEntry, ConfigLocation, PatternConfig } from '../types.js';

export interface AddResult {
  addedPatterns: string[];
  addedFiles: string[];
  duplicates: ClassifiedEntry[];
  rejected: InvalidPatternError[];
}

export interface RemoveResult {
  removedPatterns: string[];
  removedFiles: string[];
  missing: ClassifiedEntry[];
}

/**
 * Include patterns and explicit files, backed by the config file it was
 * loaded from. Every mutating call writes the file before returning, and only
 * when something changed.
 */
export class PatternStore {
  private constructor(
    private config: StoredConfig,
    private location: ConfigLocation,
    readonly root: string
  ) {}

  static async load(cwd: string): Promise<PatternStore> {
    const root = path.resolve(cwd);
    const { config, location } = await loadPatternConfig(root);
    return new PatternStore(config, location, root);
  }

  get configPath(): string {
    return this.location.path;
  }

  list(): PatternConfig {
    return toPatternConfig(this.config);
  }

  isEmpty(): boolean {
    return this.config.include_patterns.length === 0 && this.config.explicit_files.length === 0;
  }

  /** Classifies and normalises an entry the same way for `add` and `remove`. */
  private normalize(entry: string): ClassifiedEntry {
    const classified = classifyEntry(entry);
    if (classified.kind === 'pattern') return classified;
    return { kind: 'explicit', value: relativeToRoot(this.root, classified.value) };
  }

  async add(entries: string[]): Promise<AddResult> {
    const result: AddResult = { addedPatterns: [], addedFiles: [], duplicates: [], rejected: [] };
    for (const raw of entries) {
      if (!raw.trim()) {
        result.rejected.push(new InvalidPatternError(raw, 'empty entry'));
        continue;
      }
      const entry = this.normalize(raw);
      if (entry.kind === 'pattern') {
        const invalid = validatePattern(entry.value);
        if (invalid) {
          result.rejected.push(invalid);
          continue;
        }
        if (this.config.include_patterns.includes(entry.value)) {
          result.duplicates.push(entry);
          continue;
        }
        this.config.include_patterns.push(entry.value);
        result.addedPatterns.push(entry.value);
      } else {
        if (this.config.explicit_files.includes(entry.value)) {
          result.duplicates.push(entry);
          continue;
        }
        this.config.explicit_files.push(entry.value);
        result.addedFiles.push(entry.value);
      }
    }
    if (result.addedPatterns.length || result.addedFiles.length) await this.persist();
    return result;
  }

  async remove(entries: string[]): Promise<RemoveResult> {
    const result: RemoveResult = { removedPatterns: [], removedFiles: [], missing: [] };
    for (const raw of entries) {
      if (!raw.trim()) continue;
      const entry = this.normalize(raw);
      const list = entry.kind === 'pattern' ? this.config.include_patterns : this.config.explicit_files;
      const idx = list.indexOf(entry.value);
      if (idx === -1) {
        result.missing.push(entry);
        continue;
      }
      list.splice(idx, 1);
      (entry.kind === 'pattern' ? result.removedPatterns : result.removedFiles).push(entry.value);
    }
    if (result.removedPatterns.length || result.removedFiles.length) await this.persist();
    return result;
  }

  /** Empties both lists. Resolves to false when there was nothing to clear. */
  async clearAll(): Promise<boolean> {
    if (this.isEmpty()) return false;
    this.config.include_patterns = [];
    this.config.explicit_files = [];
    await this.persist();
    return true;
  }

  private async persist(): Promise<void> {
    this.location = await savePatternConfig(this.location, this.config);
  }
}
