#!/usr/bin/env tsx
/**
 * Pre-flight check: provider keys, ffmpeg/ffprobe on PATH, writable dirs.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { spawnSync } from 'child_process';
import { accessSync, constants, mkdirSync } from 'fs';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, note: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${note})`);

let anyRequiredFailed = false;

const value = (name: string): string | undefined => {
  const v = process.env[name]?.trim();
  return v ? v : undefined;
};

function checkRequired(label: string, hint: string): void {
  const v = value(label);
  if (v) {
    pass(label, v.length > 10 ? `${v.slice(0, 6)}…` : '(set)');
  } else {
    fail(label, hint);
    anyRequiredFailed = true;
  }
}

// ── [ 1 ] Provider keys ───────────────────────────────────────────────────────

console.log(`\n${BOLD}=== scenecast pre-flight check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Provider keys${RESET}`);

const provider = value('SCRIPT_PROVIDER') ?? 'groq';
if (provider === 'anthropic') {
  checkRequired('ANTHROPIC_API_KEY', 'Get from https://console.anthropic.com');
} else {
  checkRequired('GROQ_API_KEY', 'Get from https://console.groq.com/keys');
}
checkRequired('OPENAI_API_KEY', 'Needed for narration; get from https://platform.openai.com/api-keys');

if (value('TMDB_API_KEY') || value('TMDB_API_TOKEN')) {
  pass('TMDB credentials', 'poster lookup enabled for category "movie"');
} else {
  skip('TMDB credentials', 'not set, movie scenes fall back to placeholders');
}

// ── [ 2 ] Media tools ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Media tools${RESET}`);

for (const [label, bin] of [
  ['ffmpeg',  value('FFMPEG_PATH') ?? 'ffmpeg'],
  ['ffprobe', value('FFPROBE_PATH') ?? 'ffprobe'],
] as const) {
  const probe = spawnSync(bin, ['-version'], { encoding: 'utf8' });
  if (probe.status === 0) {
    pass(label, probe.stdout.split('\n')[0] ?? bin);
  } else {
    fail(label, `Install ${label} or set ${label.toUpperCase()}_PATH`);
    anyRequiredFailed = true;
  }
}

// ── [ 3 ] Directories ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Directories${RESET}`);

for (const [label, dir] of [
  ['TEMP_DIR',   value('TEMP_DIR')],
  ['OUTPUT_DIR', value('OUTPUT_DIR') ?? 'output'],
] as const) {
  if (!dir) {
    skip(label, 'default under the OS temp directory');
    continue;
  }
  const abs = resolve(dir);
  try {
    mkdirSync(abs, { recursive: true });
    accessSync(abs, constants.W_OK);
    pass(label, abs);
  } catch (err) {
    fail(label, `${abs} is not writable: ${err instanceof Error ? err.message : String(err)}`);
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start${RESET}\n`);
}
