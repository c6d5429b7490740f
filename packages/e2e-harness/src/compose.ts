import { CommandFailedError } from './errors';
import type { CommandRunner, RunCommandResult } from './process';

export type ComposeProjectOptions = {
  runner: CommandRunner;
  composeFile: string;
  projectName: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Thin driver around `docker compose -f <file> ...` with the project pinned via
 * COMPOSE_PROJECT_NAME.
 */
export class ComposeProject {
  readonly composeFile: string;
  readonly projectName: string;
  private readonly runner: CommandRunner;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ComposeProjectOptions) {
    this.runner = options.runner;
    this.composeFile = options.composeFile;
    this.projectName = options.projectName;
    this.cwd = options.cwd;
    this.env = { ...(options.env ?? {}), COMPOSE_PROJECT_NAME: options.projectName };
  }

  async up(): Promise<void> {
    this.ensureSuccess(['up', '-d', '--remove-orphans'], await this.exec(['up', '-d', '--remove-orphans']));
  }

  async down(): Promise<void> {
    this.ensureSuccess(['down', '-v'], await this.exec(['down', '-v']));
  }

  downSync(): void {
    this.ensureSuccess(['down', '-v'], this.execSync(['down', '-v']));
  }

  logs(): Promise<RunCommandResult> {
    return this.exec(['logs', '--no-color']);
  }

  logsSync(): RunCommandResult {
    return this.execSync(['logs', '--no-color']);
  }

  private composeArgs(args: string[]): string[] {
    return ['compose', '-f', this.composeFile, ...args];
  }

  private exec(args: string[]): Promise<RunCommandResult> {
    return this.runner.run('docker', this.composeArgs(args), { cwd: this.cwd, env: this.env });
  }

  private execSync(args: string[]): RunCommandResult {
    return this.runner.runSync('docker', this.composeArgs(args), { cwd: this.cwd, env: this.env });
  }

  private ensureSuccess(args: string[], result: RunCommandResult): void {
    if (result.exitCode !== 0) {
      throw new CommandFailedError(`docker compose ${args.join(' ')}`, result.exitCode, result.stderr);
    }
  }
}

export async function dockerAvailable(runner: CommandRunner): Promise<boolean> {
  try {
    const result = await runner.run('docker', ['info']);
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
