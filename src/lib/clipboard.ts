import clipboard from "clipboardy";
import { ClipboardError } from "./errors.js";

export type ClipboardWriteResult =
  | { ok: true; method: "system" | "osc52" }
  | { ok: false; error: ClipboardError };

export interface ClipboardSink {
  write(text: string): Promise<ClipboardWriteResult>;
}

export type TerminalOut = { isTTY?: boolean; write(chunk: string): boolean };

export function osc52Copy(text: string, out: TerminalOut = process.stdout): boolean {
  // Only emit OSC52 when stdout is a TTY to avoid corrupting piped output
  if (!out.isTTY) return false;
  const b64 = Buffer.from(text, "utf8").toString("base64");
  out.write(`\u001b]52;c;${b64}\u0007`);
  return true;
}

/** System clipboard through clipboardy, with the terminal's OSC 52 as a fallback. */
export function createClipboardSink(out: TerminalOut = process.stdout): ClipboardSink {
  return {
    async write(text) {
      try {
        await clipboard.write(text);
        return { ok: true, method: "system" };
      } catch (e) {
        if (osc52Copy(text, out)) return { ok: true, method: "osc52" };
        return { ok: false, error: new ClipboardError(e) };
      }
    }
  };
}
