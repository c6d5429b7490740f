import { spawn, spawnSync } from 'node:child_process';
import process from 'node:process';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Subprocess capability. The harness never resolves binaries itself; callers
 * inject a runner (the real one below, or a fake in tests).
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunCommandOptions): Promise<RunCommandResult>;
  /** Blocking variant used from process exit hooks, where nothing async completes. */
  runSync(command: string, args: string[], options?: RunCommandOptions): RunCommandResult;
}

function mergeEnv(env: NodeJS.ProcessEnv | undefined): NodeJS.ProcessEnv {
  return {
    ...process.env,
    ...(env ?? {})
  };
}

export async function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<RunCommandResult> {
  const child = spawn(command, args, {
    cwd: options.cwd ?? process.cwd(),
    env: mergeEnv(options.env),
    stdio: ['ignore', 'pipe', 'pipe']
  });

  let stdout = '';
  let stderr = '';

  child.stdout.on('data', (chunk: Buffer) => {
    stdout += chunk.toString();
  });
  child.stderr.on('data', (chunk: Buffer) => {
    stderr += chunk.toString();
  });

  const exitCode: number = await new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? 1));
  });

  return { stdout, stderr, exitCode };
}

export function runCommandSync(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): RunCommandResult {
  const result = spawnSync(command, args, {
    cwd: options.cwd ?? process.cwd(),
    env: mergeEnv(options.env),
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe']
  });
  if (result.error) {
    return { stdout: '', stderr: result.error.message, exitCode: 1 };
  }
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.status ?? 1
  };
}

export const processCommandRunner: CommandRunner = {
  run: runCommand,
  runSync: runCommandSync
};
