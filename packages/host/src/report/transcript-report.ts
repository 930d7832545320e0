// ─── Transcript Report ─────────────────────────────────────────────
// Plain-text rendering of a TranscriptAudit.

import type { TranscriptAudit } from "../audit/audit-transcript.js";

export function renderReport(audit: TranscriptAudit): string {
  const header =
    audit.erroneousLines.length === 0
      ? "All lines are correctly formatted"
      : `Erroneous lines: ${audit.erroneousLines.join(", ")}`;

  const body = audit.lines.map((line) => `${line.lineNumber}: [${line.status}] ${line.text}`);

  const { verdict } = audit;
  const footer = verdict.valid
    ? `Transcript is valid (${verdict.lastLineNumber} lines)`
    : `Transcript is invalid at line ${verdict.lastLineNumber} (${verdict.errorKind}): ${verdict.error}`;

  return [header, ...body, footer].join("\n");
}
