import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigParseError } from './errors.js';
import type { ConfigLocation, Limits, PatternConfig } from '../types.js';

export const CONFIG_FILENAME = '.copytoclipboard_config.json';

export const DEFAULT_LIMITS: Limits = {
  maxFiles: 50,
  maxChars: 1_000_000,
  maxTokens: 128_000,
  model: 'gpt-3.5-turbo',
};

// Unknown keys are kept so a hand-edited file survives a rewrite.
export const PatternConfigSchema = z
  .object({
    include_patterns: z.array(z.string()).optional().default([]),
    explicit_files: z.array(z.string()).optional().default([]),
  })
  .passthrough();

export type StoredConfig = z.infer<typeof PatternConfigSchema>;

export function emptyConfig(): StoredConfig {
  return { include_patterns: [], explicit_files: [] };
}

function homeDir(): string {
  return os.homedir?.() || process.env.HOME || process.env.USERPROFILE || '';
}

async function fileExists(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the config file: `<cwd>/.copytoclipboard_config.json` first, then the
 * one in the home directory. When neither exists, the cwd location is returned
 * so the first write creates it there.
 */
export async function resolveConfigLocation(cwd: string): Promise<ConfigLocation> {
  const local = path.join(cwd, CONFIG_FILENAME);
  if (await fileExists(local)) return { path: local, exists: true };
  const home = homeDir();
  if (home) {
    const global = path.join(home, CONFIG_FILENAME);
    if (await fileExists(global)) return { path: global, exists: true };
  }
  return { path: local, exists: false };
}

export function parseConfig(raw: string, filePath: string): StoredConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigParseError(e instanceof Error ? e.message : 'invalid JSON', filePath);
  }
  const parsed = PatternConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ConfigParseError(`${where}${issue?.message ?? 'invalid config'}`, filePath);
  }
  return parsed.data;
}

export async function loadPatternConfig(
  cwd: string
): Promise<{ config: StoredConfig; location: ConfigLocation }> {
  const location = await resolveConfigLocation(cwd);
  if (!location.exists) return { config: emptyConfig(), location };
  const raw = await fs.readFile(location.path, 'utf8');
  return { config: parseConfig(raw, location.path), location };
}

export async function savePatternConfig(location: ConfigLocation, config: StoredConfig): Promise<ConfigLocation> {
  const content = JSON.stringify(config, null, 4) + '\n';
  await fs.writeFile(location.path, content, 'utf8');
  return { path: location.path, exists: true };
}

export function toPatternConfig(config: StoredConfig): PatternConfig {
  return { include_patterns: [...config.include_patterns], explicit_files: [...config.explicit_files] };
}
