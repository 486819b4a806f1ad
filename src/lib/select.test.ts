import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import { selectCandidates, walkProject } from './select.js';
import { loadIgnoreFilter } from './ignore.js';
import { CONFIG_FILENAME } from './config.js';

const TMP_ROOT = path.join(process.cwd(), '.tmp-tests', 'select');

async function writeFile(rel: string, content = 'x') {
  const p = path.join(TMP_ROOT, rel);
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content);
}

describe('file selection', () => {
  beforeAll(async () => {
    await writeFile('.gitignore', 'secrets.env\nbuild/\n');
    await writeFile(CONFIG_FILENAME, '{}');
    await writeFile('a.py');
    await writeFile('pkg/b.py');
    await writeFile('pkg/C.PY');
    await writeFile('build/gen.py');
    await writeFile('secrets.env');
    await writeFile('notes.md');
    await writeFile('.git/config');
    await writeFile('.git/hooks/x.py');
  });

  afterAll(async () => {
    await fs.rm(TMP_ROOT, { recursive: true, force: true });
  });

  it('walks every file except VCS metadata', async () => {
    const paths = await walkProject(TMP_ROOT);
    expect([...paths].sort()).toEqual(
      ['.gitignore', CONFIG_FILENAME, 'a.py', 'build/gen.py', 'notes.md', 'pkg/C.PY', 'pkg/b.py', 'secrets.env'].sort()
    );
  });

  it('selects pattern matches that are not ignored, case-sensitively', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(
      TMP_ROOT,
      { include_patterns: ['**/*.py'], explicit_files: [] },
      filter
    );

    expect(candidates.map((c) => c.relPath).sort()).toEqual(['a.py', 'pkg/b.py']);
    expect(candidates.every((c) => !c.isExplicit)).toBe(true);
    expect(candidates.find((c) => c.relPath === 'a.py')?.absPath).toBe(path.join(TMP_ROOT, 'a.py'));
  });

  it('always selects explicit files, first and in the order they were added', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(
      TMP_ROOT,
      { include_patterns: ['**/*.py'], explicit_files: ['secrets.env', 'build/gen.py', 'a.py'] },
      filter
    );

    expect(candidates.slice(0, 3)).toEqual([
      { relPath: 'secrets.env', absPath: path.join(TMP_ROOT, 'secrets.env'), isExplicit: true },
      { relPath: 'build/gen.py', absPath: path.join(TMP_ROOT, 'build/gen.py'), isExplicit: true },
      { relPath: 'a.py', absPath: path.join(TMP_ROOT, 'a.py'), isExplicit: true },
    ]);
    // a.py is not listed again as a pattern match
    expect(candidates.map((c) => c.relPath)).toEqual(['secrets.env', 'build/gen.py', 'a.py', 'pkg/b.py']);
  });

  it('lists a file once however its explicit entry is written', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(
      TMP_ROOT,
      { include_patterns: ['*.py'], explicit_files: ['./a.py', path.join(TMP_ROOT, 'a.py')] },
      filter
    );

    expect(candidates).toEqual([{ relPath: 'a.py', absPath: path.join(TMP_ROOT, 'a.py'), isExplicit: true }]);
  });

  it('skips gitignored files during the walk when asked', async () => {
    const paths = await walkProject(TMP_ROOT, { gitignore: true });
    expect(paths).not.toContain('build/gen.py');
    expect(paths).not.toContain('secrets.env');
    expect(paths).toContain('pkg/b.py');
  });

  it('still selects explicit files inside ignored folders when the walk skips them', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(
      TMP_ROOT,
      { include_patterns: ['**/*.py'], explicit_files: ['build/gen.py'] },
      filter,
      { gitignore: true }
    );
    expect(candidates.map((c) => c.relPath)).toEqual(['build/gen.py', 'a.py', 'pkg/b.py']);
  });

  it('keeps missing explicit files as candidates', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(TMP_ROOT, { include_patterns: [], explicit_files: ['nope.txt'] }, filter);
    expect(candidates.map((c) => c.relPath)).toEqual(['nope.txt']);
  });

  it('never matches .gitignore or the config file by pattern', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: true, exclude: [] });
    const candidates = await selectCandidates(TMP_ROOT, { include_patterns: ['**/*'], explicit_files: [] }, filter);
    expect(candidates.map((c) => c.relPath).sort()).toEqual(['a.py', 'notes.md', 'pkg/C.PY', 'pkg/b.py']);
  });

  it('applies exclude globs to pattern matches only', async () => {
    const filter = await loadIgnoreFilter(TMP_ROOT, { useGitignore: false, exclude: ['pkg/**'] });
    const candidates = await selectCandidates(
      TMP_ROOT,
      { include_patterns: ['**/*.py'], explicit_files: ['pkg/C.PY'] },
      filter
    );
    expect(candidates.map((c) => c.relPath).sort()).toEqual(['a.py', 'build/gen.py', 'pkg/C.PY']);
  });
});
