import { appendFile } from 'node:fs/promises';
import net from 'node:net';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import IORedis from 'ioredis';
import { Client } from 'pg';
import type { Logger } from '@flowbench/shared';
import { DependencyTimeoutError, describeError } from './errors';

export const PORT_POLL_INTERVAL_MS = 250;
export const PROTOCOL_RETRY_INTERVAL_MS = 300;
export const STORE_QUERY_TIMEOUT_MS = 5_000;
const CONNECT_ATTEMPT_TIMEOUT_MS = 2_000;

/** Appends one state-transition line to a dependency's probe log. Never rejects. */
export type ProbeLog = (message: string) => Promise<void>;

export type ReadinessCheck = () => Promise<void>;

export type ProbeLogOptions = {
  logger: Logger;
  now?: () => number;
};

export function createProbeLog(logsDir: string, dependency: string, options: ProbeLogOptions): ProbeLog {
  const file = path.join(logsDir, `probe-${dependency}.log`);
  const now = options.now ?? Date.now;
  return async (message) => {
    try {
      await appendFile(file, `[${now()}] ${message}\n`, 'utf8');
    } catch (err) {
      options.logger.warn({ err, dependency, file, message }, 'failed to write probe log');
    }
  };
}

function tryConnect(host: string, port: number, timeoutMs: number): Promise<Error | null> {
  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const cleanup = () => {
      socket.removeAllListeners();
      socket.destroy();
    };
    socket.once('connect', () => {
      cleanup();
      resolve(null);
    });
    socket.once('error', (error) => {
      cleanup();
      resolve(error);
    });
    socket.setTimeout(timeoutMs, () => {
      cleanup();
      resolve(new Error(`connect to ${host}:${port} timed out after ${timeoutMs}ms`));
    });
  });
}

export type WaitForPortOptions = {
  dependency: string;
  host?: string;
  port: number;
  timeoutMs: number;
  pollIntervalMs?: number;
  probeLog?: ProbeLog;
};

export async function waitForPort(options: WaitForPortOptions): Promise<void> {
  const host = options.host ?? '127.0.0.1';
  const pollInterval = options.pollIntervalMs ?? PORT_POLL_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;
  let lastError: string | null = null;

  while (true) {
    const remaining = deadline - Date.now();
    const failure = await tryConnect(host, options.port, Math.max(1, Math.min(CONNECT_ATTEMPT_TIMEOUT_MS, remaining)));
    if (!failure) {
      await options.probeLog?.('port open');
      return;
    }
    lastError = `${host}:${options.port} did not accept a connection: ${failure.message}`;

    if (Date.now() + pollInterval > deadline) {
      await options.probeLog?.(`timed out: ${lastError}`);
      throw new DependencyTimeoutError(options.dependency, lastError);
    }
    await sleep(pollInterval);
  }
}

export type WaitUntilReadyOptions = {
  dependency: string;
  check: ReadinessCheck;
  timeoutMs: number;
  retryIntervalMs?: number;
  probeLog?: ProbeLog;
};

async function attemptWithin(check: ReadinessCheck, timeoutMs: number): Promise<void> {
  const abort = new AbortController();
  try {
    await Promise.race([
      check(),
      sleep(timeoutMs, undefined, { signal: abort.signal }).then(() => {
        throw new Error(`check did not finish within ${timeoutMs}ms`);
      })
    ]);
  } finally {
    abort.abort();
  }
}

/**
 * Retries `check` at a fixed interval until it resolves or the deadline passes.
 * Each attempt is bounded by the time left.
 */
export async function waitUntilReady(options: WaitUntilReadyOptions): Promise<void> {
  const retryInterval = options.retryIntervalMs ?? PROTOCOL_RETRY_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;
  let lastError: string | null = null;

  while (true) {
    try {
      await attemptWithin(options.check, Math.max(1, deadline - Date.now()));
      await options.probeLog?.('ready');
      return;
    } catch (error) {
      lastError = describeError(error);
    }

    if (Date.now() + retryInterval > deadline) {
      await options.probeLog?.(`timed out: ${lastError}`);
      throw new DependencyTimeoutError(options.dependency, lastError);
    }
    await sleep(retryInterval);
  }
}

export function redisReadinessCheck(url: string): ReadinessCheck {
  return async () => {
    const client = new IORedis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      connectTimeout: CONNECT_ATTEMPT_TIMEOUT_MS,
      retryStrategy: () => null
    });
    // Connection errors surface through connect(); the listener keeps them off the process.
    client.on('error', () => undefined);
    try {
      await client.connect();
      await client.ping();
    } finally {
      client.disconnect();
    }
  };
}

export function postgresReadinessCheck(url: string, queryTimeoutMs = STORE_QUERY_TIMEOUT_MS): ReadinessCheck {
  return async () => {
    const client = new Client({
      connectionString: url,
      connectionTimeoutMillis: queryTimeoutMs,
      query_timeout: queryTimeoutMs
    });
    client.on('error', () => undefined);
    try {
      await client.connect();
      await client.query('SELECT 1');
    } finally {
      await client.end().catch(() => undefined);
    }
  };
}
