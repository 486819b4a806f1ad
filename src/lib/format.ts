import path from "node:path";
import type { IncludedFile, OutputFormat } from "../types.js";

export interface RenderOptions {
  cwd: string;
  format: OutputFormat;
  codeFences: boolean;
  header?: string;
}

const EXT_TO_LANG: Record<string, string> = {
  ts: "ts",
  tsx: "tsx",
  js: "js",
  cjs: "js",
  mjs: "js",
  jsx: "jsx",
  json: "json",
  md: "md",
  sh: "bash",
  bash: "bash",
  zsh: "bash",
  ps1: "powershell",
  py: "python",
  rb: "ruby",
  go: "go",
  rs: "rust",
  java: "java",
  kt: "kotlin",
  swift: "swift",
  php: "php",
  scala: "scala",
  sql: "sql",
  yml: "yaml",
  yaml: "yaml",
  toml: "toml",
  ini: "ini",
  c: "c",
  h: "c",
  cc: "cpp",
  cpp: "cpp",
  cxx: "cpp",
  cs: "csharp",
  css: "css",
  scss: "scss",
  less: "less",
  html: "html",
  txt: "text",
  env: "dotenv"
};

export function langForFile(relPath: string, ext: string): string {
  const byExt = EXT_TO_LANG[ext];
  if (byExt) return byExt;
  const base = path.posix.basename(relPath).toLowerCase();
  if (base === "dockerfile") return "dockerfile";
  if (base === "makefile") return "makefile";
  if (base === ".env" || base.startsWith(".env.")) return "dotenv";
  return "";
}

/** Longer fence than any backtick run inside the content. */
function fenceFor(content: string): string {
  let longest = 0;
  for (const m of content.matchAll(/`+/g)) longest = Math.max(longest, m[0].length);
  return "`".repeat(Math.max(3, longest + 1));
}

/** `### path` header line per file, content in a language-tagged code fence. */
export function formatMarkdown(files: IncludedFile[], opts: Pick<RenderOptions, "codeFences" | "header">): string {
  const lines: string[] = [];

  if (opts.header) lines.push(opts.header.trim(), "");

  for (const f of files) {
    lines.push(`### ${f.relPath}`);
    if (opts.codeFences) {
      const fence = fenceFor(f.content);
      lines.push(fence + langForFile(f.relPath, f.ext));
      lines.push(f.content.replace(/\s+$/u, "")); // trim trailing blank space
      lines.push(fence, "");
    } else {
      lines.push(f.content, "");
    }
  }

  return lines.join("\n");
}

type DirNode = { name: string; dirs: Map<string, DirNode>; files: string[] };

function buildTree(paths: string[], rootName: string = "."): DirNode {
  const root: DirNode = { name: rootName, dirs: new Map(), files: [] };
  for (const p of paths) {
    const parts = p.split("/");
    let node = root;
    for (let i = 0; i < parts.length; i++) {
      const part = parts[i];
      const isLast = i === parts.length - 1;
      if (isLast) {
        node.files.push(part);
      } else {
        let next = node.dirs.get(part);
        if (!next) {
          next = { name: part, dirs: new Map(), files: [] };
          node.dirs.set(part, next);
        }
        node = next;
      }
    }
  }
  return root;
}

function renderTreeAscii(node: DirNode, prefix = ""): string[] {
  const lines: string[] = [];
  const dirNames = [...node.dirs.keys()].sort();
  const fileNames = [...node.files].sort();
  const entries: { name: string; child?: DirNode }[] = [
    ...dirNames.map((n) => ({ name: n, child: node.dirs.get(n) })),
    ...fileNames.map((n) => ({ name: n }))
  ];

  entries.forEach((e, idx) => {
    const last = idx === entries.length - 1;
    const branch = last ? "└─ " : "├─ ";
    if (!e.child) {
      lines.push(prefix + branch + e.name);
    } else {
      lines.push(prefix + branch + e.name + "/");
      const nextPrefix = prefix + (last ? "   " : "│  ");
      lines.push(...renderTreeAscii(e.child, nextPrefix));
    }
  });
  return lines;
}

export function renderTree(relPaths: string[], cwd: string): string {
  const rootName = path.basename(cwd || ".");
  return [rootName + "/", ...renderTreeAscii(buildTree(relPaths, rootName))].join("\n");
}

/** Tree of the included paths, then `<FILE_n path="...">` blocks. */
export function formatTags(files: IncludedFile[], opts: Pick<RenderOptions, "cwd" | "header">): string {
  const lines: string[] = [];
  lines.push("<TREE>");
  lines.push(renderTree(files.map((f) => f.relPath), opts.cwd));
  lines.push("</TREE>", "");
  if (opts.header) lines.push(`<HEADER>${opts.header}</HEADER>`, "");
  files.forEach((f, idx) => {
    const n = idx + 1;
    lines.push(`<FILE_${n} path="${f.relPath}">`);
    lines.push(f.content.replace(/\s+$/u, ""));
    lines.push(`</FILE_${n}>`, "");
  });
  return lines.join("\n");
}

export function render(files: IncludedFile[], opts: RenderOptions): string {
  return opts.format === "tags" ? formatTags(files, opts) : formatMarkdown(files, opts);
}
