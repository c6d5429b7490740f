import path from 'node:path';
import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path: issuePath, message }: EnvIssueTarget): string {
  const location = issuePath.length > 0 ? issuePath.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'flowbench';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

export type BooleanVarOptions = RequiredOption & DefaultOption<boolean> & DescriptionOption;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = String(value).trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
    max?: number;
  };

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === null || value === undefined || isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption &
  DefaultOption<string> &
  DescriptionOption & {
    lowercase?: boolean;
  };

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    const normalized = value === undefined ? '' : value.trim();
    if (normalized.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    return options?.lowercase ? normalized.toLowerCase() : normalized;
  });
}

export type EnumVarOptions<T extends string> = DefaultOption<T> & DescriptionOption;

export function enumVar<T extends string>(values: readonly [T, ...T[]], options?: EnumVarOptions<T>) {
  const allowed = new Set<string>(values);
  const isAllowed = (candidate: string): candidate is T => allowed.has(candidate);

  return z.string().optional().transform((value, ctx): T | undefined => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    const normalized = value?.trim().toLowerCase() ?? '';
    if (normalized.length === 0) {
      return options?.defaultValue;
    }
    if (!isAllowed(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Expected one of: ${values.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export function pathVar(options?: StringVarOptions & { baseDir?: string }) {
  return stringVar(options).transform((value) =>
    value === undefined ? undefined : path.resolve(options?.baseDir ?? process.cwd(), value)
  );
}

export type HostPortOptions = {
  defaultHost?: string;
  defaultPort?: number;
};

export const hostVar = (options?: HostPortOptions) =>
  stringVar({
    defaultValue: options?.defaultHost ?? '127.0.0.1',
    description: 'host'
  });

export const portVar = (options?: HostPortOptions) =>
  integerVar({
    defaultValue: options?.defaultPort ?? 3000,
    min: 1,
    max: 65535,
    description: 'port'
  });

export const envParsers = {
  boolean: booleanVar,
  integer: integerVar,
  string: stringVar,
  enum: enumVar,
  path: pathVar,
  host: hostVar,
  port: portVar
};
