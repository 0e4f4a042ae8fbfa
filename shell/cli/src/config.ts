import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { FetchResult } from '@skycut/contracts';
import type { Logger } from '@skycut/pipeline';
import { emitError, emitOk } from './output/program';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'normal' | 'json' | 'quiet';
let currentOutputMode: OutputMode = 'normal';

export function setOutputMode(mode: OutputMode): void {
  currentOutputMode = mode;
}

export function getOutputMode(): OutputMode {
  return currentOutputMode;
}

/**
 * Output data respecting the current output mode.
 *
 *   --json  → JSON envelope
 *   --quiet → quietLines(), one per line
 *   default → humanFormat()
 */
export function output(data: unknown, humanFormat: () => void, quietLines?: () => string[]): void {
  const mode = getOutputMode();
  if (mode === 'json') {
    emitOk(data);
  } else if (mode === 'quiet') {
    for (const line of quietLines?.() ?? []) console.log(line);
  } else {
    humanFormat();
  }
}

/** Report a failure: JSON envelope in --json mode, "Error: ..." on stderr otherwise. */
export function reportError(message: string): void {
  if (getOutputMode() === 'json') {
    emitError(message);
  } else {
    console.error(`Error: ${message}`);
  }
}

/**
 * Pipeline logger for the CLI. Writes to stderr only, so stdout stays
 * parseable. --quiet drops everything, --json keeps warnings.
 */
export function cliLogger(): Logger {
  return {
    info: (message) => {
      if (getOutputMode() === 'normal') process.stderr.write(`${message}\n`);
    },
    warn: (message) => {
      if (getOutputMode() !== 'quiet') process.stderr.write(`${message}\n`);
    },
  };
}

// ─── Environment ─────────────────────────────────────────────────────────────

/** Path to the ~/.skycut directory. */
export const SKYCUT_DIR = join(homedir(), '.skycut');

/**
 * Load a KEY=VALUE env file into process.env (lowest priority: existing vars win).
 * Blank lines and lines starting with # are ignored. No shell expansion.
 */
export function loadEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!existsSync(filePath)) return;
  const content = readFileSync(filePath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip optional quotes
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

/**
 * Client config from the environment. Values are passed through as-is and
 * validated by the client, so a bad SKYCUT_WORKERS fails with exit code 2.
 *
 *   SKYCUT_SURVEY           default survey ("auto")
 *   SKYCUT_FOV              field of view, arcmin
 *   SKYCUT_WORKERS          batch concurrency
 *   SKYCUT_CACHE_CAPACITY   name cache size
 *   SKYCUT_BLANK_THRESHOLD  pixel std below which a tile is blank
 */
export function clientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  if (env.SKYCUT_SURVEY) config.survey = env.SKYCUT_SURVEY;
  if (env.SKYCUT_FOV) config.fov = Number(env.SKYCUT_FOV);
  if (env.SKYCUT_WORKERS) config.workerCount = Number(env.SKYCUT_WORKERS);
  if (env.SKYCUT_CACHE_CAPACITY) config.cacheCapacity = Number(env.SKYCUT_CACHE_CAPACITY);
  if (env.SKYCUT_BLANK_THRESHOLD) config.blankThreshold = Number(env.SKYCUT_BLANK_THRESHOLD);
  return config;
}

// ─── Formatting ──────────────────────────────────────────────────────────────

/** Print a table with padded columns. */
export function printTable(headers: string[], rows: string[][], widths: number[]): void {
  const fmt = (row: string[]) => row.map((v, i) => v.padEnd(widths[i] ?? 0)).join('  ').trimEnd();
  console.log(fmt(headers));
  console.log(widths.map(w => '-'.repeat(w)).join('  '));
  for (const row of rows) {
    console.log(fmt(row));
  }
}

/** Serializable view of a result: image metadata only, never the pixels. */
export function summarizeResult(result: FetchResult): Record<string, unknown> {
  return {
    target: result.target.raw,
    label: result.label,
    status: result.status,
    survey: result.surveyUsed ?? null,
    ra: result.coordinate?.ra ?? null,
    dec: result.coordinate?.dec ?? null,
    image: result.image
      ? { width: result.image.width, height: result.image.height, channels: result.image.channels }
      : null,
    attempts: result.attempts,
    error: result.error ?? null,
  };
}
