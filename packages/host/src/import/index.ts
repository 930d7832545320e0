export { readTranscriptFile, splitTranscript } from "./transcript-file";
export type { TranscriptFileResult } from "./transcript-file";
export { loadValidatorConfig } from "./config-file";
export type { ConfigFileResult } from "./config-file";
export { formatZodIssues } from "./format-zod-issues";
