/**
 * Filename: tools/check-connectivity.ts
 * Purpose: Resolve and TCP-probe the broker and SMTP relay configured in the environment.
 * License: MIT
 */

import { lookup } from 'node:dns/promises';
import { createConnection } from 'node:net';
import { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';

const DEFAULT_TIMEOUT_MS = 5_000;

const COLORS = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  green: '\u001B[32m',
};

export type ConnectivityTarget = {
  name: string;
  host: string;
  port: number;
};

export type ConnectivityResult = ConnectivityTarget & {
  resolvedAddress: string | null;
  reachable: boolean;
  error?: string;
};

type RunConnectivityCheckOptions = {
  env?: Record<string, string | undefined>;
  targets?: ConnectivityTarget[];
  timeoutMs?: number;
  json?: boolean;
  output?: Writable;
};

type ConnectivityRunResult = {
  results: ConnectivityResult[];
  exitCode: number;
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return 'code' in error && typeof error.code === 'string'
      ? `${error.code}: ${error.message}`
      : error.message;
  }

  return String(error);
};

const parsePort = (raw: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export function targetsFromEnvironment(
  env: Record<string, string | undefined>,
): ConnectivityTarget[] {
  return [
    {
      name: 'Broker',
      host: env.RABBITMQ_HOST?.trim() || 'localhost',
      port: parsePort(env.RABBITMQ_PORT, 5672),
    },
    {
      name: 'SMTP relay',
      host: env.SMTP_SERVER?.trim() || 'localhost',
      port: parsePort(env.SMTP_PORT, 587),
    },
  ];
}

const probeTcp = (host: string, port: number, timeoutMs: number): Promise<void> =>
  new Promise((resolvePromise, reject) => {
    const socket = createConnection({ host, port });

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.end();
      resolvePromise();
    });
    socket.once('timeout', () => {
      socket.destroy();
      reject(new Error(`Timed out after ${timeoutMs} ms.`));
    });
    socket.once('error', (error) => {
      socket.destroy();
      reject(error);
    });
  });

export async function checkConnection(
  target: ConnectivityTarget,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): Promise<ConnectivityResult> {
  let resolvedAddress: string;
  try {
    resolvedAddress = (await lookup(target.host)).address;
  } catch (error) {
    return {
      ...target,
      resolvedAddress: null,
      reachable: false,
      error: `DNS resolution failed (${describeError(error)})`,
    };
  }

  try {
    await probeTcp(target.host, target.port, timeoutMs);
    return { ...target, resolvedAddress, reachable: true };
  } catch (error) {
    return {
      ...target,
      resolvedAddress,
      reachable: false,
      error: `TCP connection failed (${describeError(error)})`,
    };
  }
}

export function formatResult(result: ConnectivityResult): string {
  const endpoint = `${result.host}:${result.port}`;
  const address = result.resolvedAddress ? ` -> ${result.resolvedAddress}` : '';

  if (result.reachable) {
    return `${COLORS.green}ok${COLORS.reset}    ${result.name} ${endpoint}${address}`;
  }

  return `${COLORS.red}fail${COLORS.reset}  ${result.name} ${endpoint}${address}: ${result.error ?? 'unreachable'}`;
}

export async function runConnectivityCheck(
  options: RunConnectivityCheckOptions = {},
): Promise<ConnectivityRunResult> {
  const targets = options.targets ?? targetsFromEnvironment(options.env ?? process.env);
  const output = options.output ?? process.stdout;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const results: ConnectivityResult[] = [];
  for (const target of targets) {
    results.push(await checkConnection(target, timeoutMs));
  }

  if (options.json) {
    output.write(`${JSON.stringify({ results })}\n`);
  } else {
    output.write(`${results.map(formatResult).join('\n')}\n`);
  }

  return { results, exitCode: results.every((result) => result.reachable) ? 0 : 1 };
}

function isCliEntry() {
  const current = fileURLToPath(import.meta.url);
  const calledWith = process.argv[1];
  if (!calledWith) {
    return false;
  }
  return current === resolve(calledWith);
}

async function main() {
  const json = process.argv.slice(2).includes('--json');
  const result = await runConnectivityCheck({ json });
  process.exitCode = result.exitCode;
}

if (isCliEntry()) {
  main().catch((error: unknown) => {
    console.error('check-connectivity failed:', error);
    process.exitCode = 1;
  });
}
