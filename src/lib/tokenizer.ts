// Model-keyed token estimation on top of @dqbd/tiktoken.
import type { Tiktoken, TiktokenEncoding } from "@dqbd/tiktoken";

export type TokenEstimator = (text: string) => Promise<number>;

type TiktokenModule = typeof import("@dqbd/tiktoken");

let modPromise: Promise<TiktokenModule> | null = null;
async function loadModule(): Promise<TiktokenModule> {
  if (!modPromise) modPromise = import("@dqbd/tiktoken");
  return modPromise;
}

const encoders = new Map<TiktokenEncoding, Tiktoken>();
let freeOnExit = false;

async function getEncoder(name: TiktokenEncoding): Promise<Tiktoken> {
  const cached = encoders.get(name);
  if (cached) return cached;
  const t = await loadModule();
  const enc = t.get_encoding(name);
  encoders.set(name, enc);

  // Free on exit to reduce leaks for long-lived shells.
  if (!freeOnExit) {
    freeOnExit = true;
    process.on("exit", () => {
      for (const e of encoders.values()) e.free();
      encoders.clear();
    });
  }
  return enc;
}

function tiktokenEstimator(encoding: TiktokenEncoding): TokenEstimator {
  return async (text) => {
    const enc = await getEncoder(encoding);
    // Special-token text inside source files is counted, not rejected.
    return enc.encode(text, "all").length;
  };
}

/** Roughly four characters per token. */
export const approximateEstimator: TokenEstimator = async (text) => Math.ceil(text.length / 4);

const cl100k = tiktokenEstimator("cl100k_base");
const o200k = tiktokenEstimator("o200k_base");

/**
 * Model identifiers and their estimators. A model also matches a key it
 * extends with `-` (dated snapshots), preferring the longest key.
 */
export const MODEL_ESTIMATORS: Readonly<Record<string, TokenEstimator>> = {
  "gpt-4o": o200k,
  "gpt-4o-mini": o200k,
  "gpt-4.1": o200k,
  "gpt-4.1-mini": o200k,
  "gpt-4.1-nano": o200k,
  "chatgpt-4o-latest": o200k,
  "o1": o200k,
  "o1-mini": o200k,
  "o3": o200k,
  "o3-mini": o200k,
  "o4-mini": o200k,
  "gpt-4": cl100k,
  "gpt-4-turbo": cl100k,
  "gpt-4-32k": cl100k,
  "gpt-3.5-turbo": cl100k,
  "gpt-3.5-turbo-16k": cl100k,
  "text-embedding-ada-002": cl100k,
  "text-embedding-3-small": cl100k,
  "text-embedding-3-large": cl100k
};

export const DEFAULT_ESTIMATOR: TokenEstimator = approximateEstimator;

export function resolveModelKey(model: string): string | undefined {
  const m = model.trim().toLowerCase();
  if (Object.hasOwn(MODEL_ESTIMATORS, m)) return m;
  let best: string | undefined;
  for (const key of Object.keys(MODEL_ESTIMATORS)) {
    if (m.startsWith(`${key}-`) && (!best || key.length > best.length)) best = key;
  }
  return best;
}

export function estimatorForModel(model: string): { estimator: TokenEstimator; known: boolean } {
  const key = resolveModelKey(model);
  if (key === undefined) return { estimator: DEFAULT_ESTIMATOR, known: false };
  return { estimator: MODEL_ESTIMATORS[key], known: true };
}
