#!/usr/bin/env -S npx tsx
// ─── Validate Transcripts ──────────────────────────────────────────
// CLI script that audits War transcripts (.txt or .txt.gz).
// Usage: validate-transcripts [--config validator.json] [--report] [files...]
// With no files, audits every transcript in transcripts/.
// Exits 0 if all pass, 1 if any fail.

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import {
  auditTranscript,
  loadValidatorConfig,
  readTranscriptFile,
  renderReport,
} from "../packages/host/src/index";
import { parseValidatorConfig, type ValidatorConfig } from "../packages/shared/src/index";

const TRANSCRIPTS_DIR = fileURLToPath(new URL("../transcripts/", import.meta.url));

function isTranscript(file: string): boolean {
  return file.endsWith(".txt") || file.endsWith(".txt.gz");
}

async function defaultTranscripts(): Promise<string[]> {
  const entries = await readdir(TRANSCRIPTS_DIR);
  return entries
    .filter(isTranscript)
    .sort()
    .map((file) => join(TRANSCRIPTS_DIR, file));
}

async function resolveConfig(path: string | undefined): Promise<ValidatorConfig | null> {
  if (path === undefined) {
    return parseValidatorConfig({});
  }
  const loaded = await loadValidatorConfig(path);
  if (!loaded.ok) {
    console.error(`  ❌ ${path}`);
    console.error(`     ${loaded.error}`);
    return null;
  }
  return loaded.config;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: "string", short: "c" },
      report: { type: "boolean", short: "r", default: false },
    },
    allowPositionals: true,
  });

  const config = await resolveConfig(values.config);
  if (!config) {
    process.exit(1);
  }

  const files = positionals.length > 0 ? positionals : await defaultTranscripts();
  if (files.length === 0) {
    console.error("No .txt or .txt.gz files found in transcripts/");
    process.exit(1);
  }

  console.log(`\nValidating ${files.length} transcript(s)...\n`);

  let failed = 0;

  for (const file of files) {
    const read = await readTranscriptFile(file);
    if (!read.ok) {
      console.error(`  ❌ ${file} — ${read.error}`);
      failed++;
      continue;
    }

    const audit = auditTranscript(read.lines, config);

    if (audit.verdict.valid) {
      console.log(`  ✅ ${file}`);
    } else {
      console.error(`  ❌ ${file}`);
      console.error(`     line ${audit.verdict.lastLineNumber}: ${audit.verdict.error}`);
      failed++;
    }

    if (values.report) {
      console.log(renderReport(audit));
      console.log();
    }
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${files.length} transcript(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${files.length} transcript(s) passed validation.`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
