import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import os from 'node:os';
import { PatternStore } from './store.js';
import { CONFIG_FILENAME } from './config.js';
import { ConfigParseError } from './errors.js';

const TMP_ROOT = path.join(process.cwd(), '.tmp-tests', 'store');

async function readConfig(dir: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(dir, CONFIG_FILENAME), 'utf8'));
}

describe('PatternStore', () => {
  let proj: string;
  let n = 0;

  beforeEach(async () => {
    proj = path.join(TMP_ROOT, `proj-${++n}`);
    await fs.mkdir(proj, { recursive: true });
    const fakeHome = path.join(TMP_ROOT, `home-${n}`);
    await fs.mkdir(fakeHome, { recursive: true });
    vi.spyOn(os, 'homedir').mockReturnValue(fakeHome);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    await fs.rm(TMP_ROOT, { recursive: true, force: true });
  });

  it('splits entries into include patterns and explicit files and persists them', async () => {
    const store = await PatternStore.load(proj);
    const res = await store.add(['**/*.py', './docs/guide.md', 'src/*.js']);

    expect(res.addedPatterns).toEqual(['**/*.py', 'src/*.js']);
    expect(res.addedFiles).toEqual(['docs/guide.md']);
    expect(store.list()).toEqual({
      include_patterns: ['**/*.py', 'src/*.js'],
      explicit_files: ['docs/guide.md'],
    });
    expect(await readConfig(proj)).toEqual({
      include_patterns: ['**/*.py', 'src/*.js'],
      explicit_files: ['docs/guide.md'],
    });
  });

  it('add is idempotent', async () => {
    const store = await PatternStore.load(proj);
    await store.add(['**/*.py', 'a.txt']);
    const again = await store.add(['**/*.py', 'a.txt', path.join(proj, 'a.txt')]);

    expect(again.addedPatterns).toEqual([]);
    expect(again.addedFiles).toEqual([]);
    expect(again.duplicates).toEqual([
      { kind: 'pattern', value: '**/*.py' },
      { kind: 'explicit', value: 'a.txt' },
      { kind: 'explicit', value: 'a.txt' },
    ]);
    expect(store.list()).toEqual({ include_patterns: ['**/*.py'], explicit_files: ['a.txt'] });
  });

  it('add then remove of the same entries restores the original state', async () => {
    const store = await PatternStore.load(proj);
    await store.add(['keep/**', 'keep.txt']);
    const before = store.list();

    await store.add(['**/*.md', 'x/y.txt', '*.json']);
    await store.remove(['**/*.md', 'x/y.txt', '*.json']);

    expect(store.list()).toEqual(before);
    const reloaded = await PatternStore.load(proj);
    expect(reloaded.list()).toEqual(before);
  });

  it('remove ignores absent entries', async () => {
    const store = await PatternStore.load(proj);
    await store.add(['**/*.ts']);
    const res = await store.remove(['**/*.rs', 'missing.txt', '**/*.ts']);

    expect(res.removedPatterns).toEqual(['**/*.ts']);
    expect(res.removedFiles).toEqual([]);
    expect(res.missing).toEqual([
      { kind: 'pattern', value: '**/*.rs' },
      { kind: 'explicit', value: 'missing.txt' },
    ]);
    expect(store.list()).toEqual({ include_patterns: [], explicit_files: [] });
  });

  it('rejects invalid patterns but still adds the other entries', async () => {
    const store = await PatternStore.load(proj);
    const res = await store.add(['src/[oops.ts', '**/*.go', '   ', 'README.md']);

    expect(res.rejected.map((e) => e.pattern)).toEqual(['src/[oops.ts', '   ']);
    expect(res.rejected.map((e) => e.reason)).toEqual(["unclosed character class '['", 'empty entry']);
    expect(store.list()).toEqual({ include_patterns: ['**/*.go'], explicit_files: ['README.md'] });
  });

  it('stores patterns relative to the root and rejects absolute ones', async () => {
    const store = await PatternStore.load(proj);
    const res = await store.add(['./src/*.py', 'src/*.py', '/abs/*.py']);

    expect(res.addedPatterns).toEqual(['src/*.py']);
    expect(res.duplicates).toEqual([{ kind: 'pattern', value: 'src/*.py' }]);
    expect(res.rejected.map((e) => e.reason)).toEqual(['patterns are relative to the project root']);

    const removed = await store.remove(['./src/*.py']);
    expect(removed.removedPatterns).toEqual(['src/*.py']);
    expect(store.list()).toEqual({ include_patterns: [], explicit_files: [] });
  });

  it('clear-all followed by list returns two empty lists', async () => {
    const store = await PatternStore.load(proj);
    await store.add(['**/*.py', 'a.txt']);

    expect(await store.clearAll()).toBe(true);
    expect(store.list()).toEqual({ include_patterns: [], explicit_files: [] });
    expect(await readConfig(proj)).toEqual({ include_patterns: [], explicit_files: [] });
    expect(await store.clearAll()).toBe(false);
  });

  it('writes back to the home config it was loaded from', async () => {
    const fakeHome = os.homedir();
    await fs.writeFile(
      path.join(fakeHome, CONFIG_FILENAME),
      JSON.stringify({ include_patterns: ['**/*.py'], explicit_files: [] })
    );

    const store = await PatternStore.load(proj);
    expect(store.configPath).toBe(path.join(fakeHome, CONFIG_FILENAME));
    await store.add(['**/*.md']);

    expect(await readConfig(fakeHome)).toEqual({ include_patterns: ['**/*.py', '**/*.md'], explicit_files: [] });
    await expect(fs.stat(path.join(proj, CONFIG_FILENAME))).rejects.toThrow();
  });

  it('does not load a malformed config', async () => {
    const cfgPath = path.join(proj, CONFIG_FILENAME);
    await fs.writeFile(cfgPath, '{ not json');

    await expect(PatternStore.load(proj)).rejects.toBeInstanceOf(ConfigParseError);
    expect(await fs.readFile(cfgPath, 'utf8')).toBe('{ not json');
  });
});
