import path from "node:path";

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

export function extnameLower(p: string): string {
  return path.extname(p).toLowerCase().replace(/^\./, "");
}

/** Root-relative POSIX path; entries outside the root keep their `../` prefix. */
export function relativeToRoot(root: string, p: string): string {
  const rel = toPosix(path.relative(root, path.resolve(root, p)));
  return rel === "" ? "." : rel;
}

export function countLines(text: string): number {
  if (text === "") return 0;
  return text.split(/\r?\n/).length;
}

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

// Minimal ANSI escape stripper for width calculations
const ANSI_PATTERN = /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g;

export function stripAnsi(s: string): string {
  return s.replace(ANSI_PATTERN, "");
}

export function padPlain(s: string, w: number): string {
  const plain = stripAnsi(s);
  if (plain.length > w) return plain.slice(0, Math.max(1, w - 1)) + "…";
  return plain.padEnd(w);
}
