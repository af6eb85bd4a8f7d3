import { PayloadParseError } from "../errors.js";
import type { PayloadSource } from "../types.js";

const FENCE = "```";

/** Unwrap a payload pasted as a fenced code block (```json ... ```) */
export function stripCodeFences(input: string): string {
  const s = input.trim();
  if (s.startsWith(FENCE)) {
    const lines = s.split(/\r?\n/);
    if (lines.length >= 3 && lines[lines.length - 1].trim() === FENCE) {
      return lines.slice(1, -1).join("\n").trim();
    }
  }
  return s;
}

const SOURCE_LABEL: Record<PayloadSource, string> = {
  paste: "Paste",
  upload: "Upload",
};

export function parsePayloadText(raw: string, source: PayloadSource = "paste"): unknown {
  try {
    return JSON.parse(stripCodeFences(raw));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new PayloadParseError(`${SOURCE_LABEL[source]} JSON parse failed: ${msg}`);
  }
}
