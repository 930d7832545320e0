// ─── @war-audit/host ───────────────────────────────────────────────
// Node host: loads transcripts and config from disk, audits them and
// renders plain-text reports.

export * from "./import/index";
export { auditTranscript } from "./audit/audit-transcript";
export type { ClassifiedLine, LineStatus, TranscriptAudit } from "./audit/audit-transcript";
export { renderReport } from "./report/transcript-report";
