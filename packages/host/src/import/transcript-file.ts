// ─── Transcript File ───────────────────────────────────────────────
// Reads a transcript from disk. Plain .txt files are read as UTF-8;
// .txt.gz files are decompressed with pako first.

import { readFile } from "node:fs/promises";
import pako from "pako";

/** Result of reading a transcript file. Discriminated union. */
export type TranscriptFileResult =
  | { readonly ok: true; readonly lines: readonly string[] }
  | { readonly ok: false; readonly error: string };

const PLAIN_EXTENSION = ".txt";
const GZIP_EXTENSION = ".txt.gz";

/**
 * Splits transcript text into lines on "\n" only. A trailing newline
 * does not produce a final empty line; a "\r" stays on its line.
 */
export function splitTranscript(text: string): readonly string[] {
  if (text === "") return [];
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Reads a .txt or .txt.gz transcript and splits it into lines.
 *
 * @param filePath - Path to the transcript file.
 */
export async function readTranscriptFile(filePath: string): Promise<TranscriptFileResult> {
  const gzipped = filePath.endsWith(GZIP_EXTENSION);
  if (!gzipped && !filePath.endsWith(PLAIN_EXTENSION)) {
    return { ok: false, error: "Transcript must have a .txt or .txt.gz extension." };
  }

  // ── Read file contents ───────────────────────────────────────────
  let bytes: Uint8Array;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error("[TranscriptLoader] Read failed:", filePath, message);
    return { ok: false, error: `Failed to read file: ${message}` };
  }

  // ── Decode ───────────────────────────────────────────────────────
  let text: string;
  if (gzipped) {
    try {
      text = pako.ungzip(bytes, { to: "string" });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("[TranscriptLoader] Decompression failed:", filePath, message);
      return { ok: false, error: `File is not valid gzip: ${message}` };
    }
  } else {
    text = new TextDecoder("utf-8").decode(bytes);
  }

  const lines = splitTranscript(text);
  console.log("[TranscriptLoader] Loaded:", filePath, `(${lines.length} lines)`);
  return { ok: true, lines };
}
