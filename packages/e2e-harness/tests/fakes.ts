import net from 'node:net';
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { CommandRunner, RunCommandOptions, RunCommandResult } from '../src';

export type RecordedCommand = {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv | undefined;
  sync: boolean;
};

export type FakeRunner = CommandRunner & {
  calls: RecordedCommand[];
  composeVerbs: () => string[];
};

type Responder = (command: string, args: string[]) => RunCommandResult | undefined;

const OK: RunCommandResult = { stdout: '', stderr: '', exitCode: 0 };

export function createFakeRunner(respond: Responder = () => undefined): FakeRunner {
  const calls: RecordedCommand[] = [];
  const handle = (command: string, args: string[], options: RunCommandOptions | undefined, sync: boolean) => {
    calls.push({ command, args, env: options?.env, sync });
    return respond(command, args) ?? OK;
  };
  return {
    calls,
    // `docker compose -f <file> <verb> ...` -> verb
    composeVerbs: () => calls.map((call) => call.args[3] ?? ''),
    run: async (command, args, options) => handle(command, args, options, false),
    runSync: (command, args, options) => handle(command, args, options, true)
  };
}

export const silentLogger = pino({ level: 'silent' });

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function listen(): Promise<{ port: number; close: () => Promise<void> }> {
  const server = net.createServer((socket) => socket.destroy());
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return {
    port: address.port,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  };
}

/** A port that nothing listens on: bind an ephemeral port, then release it. */
export async function closedPort(): Promise<number> {
  const { port, close } = await listen();
  await close();
  return port;
}
