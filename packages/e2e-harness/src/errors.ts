import type { JsonValue } from '@flowbench/shared';

export class HarnessIoError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarnessIoError';
    this.path = path;
  }
}

export class DependencyTimeoutError extends Error {
  readonly dependency: string;
  readonly lastError: string | null;

  constructor(dependency: string, lastError: string | null) {
    super(`${dependency} was not ready before its deadline${lastError ? `: ${lastError}` : ''}`);
    this.name = 'DependencyTimeoutError';
    this.dependency = dependency;
    this.lastError = lastError;
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Command failed (${command}), exit ${exitCode}${stderr ? `\n${stderr}` : ''}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class AwaitTimeoutError extends Error {
  readonly subject: string;
  readonly timeoutMs: number;

  constructor(subject: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms awaiting a message on ${subject}`);
    this.name = 'AwaitTimeoutError';
    this.subject = subject;
    this.timeoutMs = timeoutMs;
  }
}

export class PayloadMismatchError extends Error {
  readonly subject: string;
  readonly expected: JsonValue;
  readonly actual: JsonValue;

  constructor(subject: string, expected: JsonValue, actual: JsonValue) {
    super(
      `Payload on ${subject} did not match: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`
    );
    this.name = 'PayloadMismatchError';
    this.subject = subject;
    this.expected = expected;
    this.actual = actual;
  }
}

export class AssertionMismatchError extends Error {
  readonly actual: JsonValue;
  readonly expected: JsonValue;

  constructor(actual: JsonValue, expected: JsonValue) {
    super(`assert json mismatch: actual ${JSON.stringify(actual)} expected ${JSON.stringify(expected)}`);
    this.name = 'AssertionMismatchError';
    this.actual = actual;
    this.expected = expected;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
