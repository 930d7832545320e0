// ─── Transcript Audit ──────────────────────────────────────────────
// One classification pass and one validation pass over a transcript.
// The passes share the config but not their instances.

import {
  LineClassifier,
  validateTranscript,
  type LineRecord,
  type TranscriptVerdict,
  type ValidatorConfig,
} from "@war-audit/shared";

/** How a single line fared in the classification pass. */
export type LineStatus = "ok" | "bad" | "skip";

export interface ClassifiedLine {
  /** 1-based line number. */
  readonly lineNumber: number;
  readonly text: string;
  readonly record: LineRecord;
  readonly status: LineStatus;
}

export interface TranscriptAudit {
  readonly lines: readonly ClassifiedLine[];
  /** Line numbers of malformed lines, ascending. */
  readonly erroneousLines: readonly number[];
  readonly verdict: TranscriptVerdict;
}

function statusOf(record: LineRecord): LineStatus {
  switch (record.kind) {
    case "malformed":
      return "bad";
    case "empty":
      return "skip";
    default:
      return "ok";
  }
}

export function auditTranscript(
  lines: readonly string[],
  config: ValidatorConfig
): TranscriptAudit {
  const classifier = new LineClassifier(config);

  const classified = lines.map((text, index): ClassifiedLine => {
    const record = classifier.classify(text);
    return { lineNumber: index + 1, text, record, status: statusOf(record) };
  });

  const erroneousLines = classified
    .filter((line) => line.status === "bad")
    .map((line) => line.lineNumber);

  const verdict = validateTranscript(lines, { classifier: config });

  return { lines: classified, erroneousLines, verdict };
}
