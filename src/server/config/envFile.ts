/**
 * Filename: src/server/config/envFile.ts
 * Purpose: Read `.env` files and apply their entries underneath the real process environment.
 * License: MIT
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export type EnvIssue = {
  key: string;
  message: string;
};

const TRUE_FLAG_VALUES = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_FLAG_VALUES = new Set(['0', 'false', 'no', 'n', 'off']);

export function looksLikeEmail(value: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(value);
}

export function parseBooleanFlagValue(value: string): boolean | null {
  const normalised = value.trim().toLowerCase();

  if (normalised.length === 0) {
    return null;
  }

  if (TRUE_FLAG_VALUES.has(normalised)) {
    return true;
  }

  if (FALSE_FLAG_VALUES.has(normalised)) {
    return false;
  }

  return null;
}

export async function loadEnvFile(envPath = '.env'): Promise<Map<string, string>> {
  const absolutePath = resolve(envPath);

  if (!existsSync(absolutePath)) {
    return new Map();
  }

  const content = await readFile(absolutePath, 'utf8');
  return parseEnvFile(content);
}

export function parseEnvFile(content: string): Map<string, string> {
  const map = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  for (const rawLine of lines) {
    const line = rawLine.trim();

    if (line.length === 0) {
      continue;
    }

    if (line.startsWith('#')) {
      continue;
    }

    const parsed = parseEnvKeyValue(line.startsWith('export ') ? line.slice(7).trim() : line);
    if (!parsed) {
      continue;
    }

    if (!map.has(parsed.key)) {
      map.set(parsed.key, stripWrappingQuotes(parsed.value.trim()));
    }
  }

  return map;
}

export function parseEnvKeyValue(line: string): { key: string; value: string } | null {
  const match = line.match(/^([A-Za-z_][A-Za-z0-9_\.-]*)\s*=\s*(.*)$/);
  if (!match) {
    return null;
  }

  return { key: match[1], value: match[2] ?? '' };
}

export function stripWrappingQuotes(value: string): string {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Copies entries into `env` without overwriting keys that are already set. Returns the keys
 * that were applied.
 */
export function applyEnvFile(
  env: Record<string, string | undefined>,
  entries: Map<string, string>,
): string[] {
  const applied: string[] = [];

  for (const [key, value] of entries) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }

  return applied;
}
