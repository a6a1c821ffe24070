import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(path: PropertyKey[], message: string): string {
  const location = path.length > 0 ? path.map(String).join('.') : '<root>';
  return `${location}: ${message}`;
}

export function loadEnvConfig<S extends z.ZodTypeAny>(schema: S, options?: LoadEnvConfigOptions): z.output<S> {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'heartstore';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

/** Options under which a variable always resolves to a value. */
type Resolved<T> = { defaultValue: T } | { required: true };

export type EnvVar<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function describeTarget(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Resolves an unset variable to its default, flags it when required, or
 * leaves it undefined. Returns `z.NEVER` after recording an issue.
 */
function resolveBlank<T>(ctx: z.RefinementCtx, options: CommonOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describeTarget(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options: BooleanVarOptions & Resolved<boolean>): EnvVar<boolean>;
export function booleanVar(options?: BooleanVarOptions): EnvVar<boolean | undefined>;
export function booleanVar(options?: BooleanVarOptions): EnvVar<boolean | undefined> {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describeTarget(ctx, options?.description)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options: IntegerVarOptions & Resolved<number>): EnvVar<number>;
export function integerVar(options?: IntegerVarOptions): EnvVar<number | undefined>;
export function integerVar(options?: IntegerVarOptions): EnvVar<number | undefined> {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const description = describeTarget(ctx, options?.description);
    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
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

export type StringVarOptions = CommonOptions<string> & {
  allowed?: readonly string[];
  lowercase?: boolean;
};

export function stringVar(options: StringVarOptions & Resolved<string>): EnvVar<string>;
export function stringVar(options?: StringVarOptions): EnvVar<string | undefined>;
export function stringVar(options?: StringVarOptions): EnvVar<string | undefined> {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeTarget(ctx, options.description)} must be one of: ${options.allowed.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export type StringListVarOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
};

export function stringListVar(options?: StringListVarOptions): EnvVar<string[]> {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options) ?? [];
    }
    const entries = value
      .split(options?.separator ?? /[,\s]+/)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
    return Array.from(new Set(entries));
  });
}

/**
 * Calendar date in `YYYY-MM-DD` form. Anything after the first whitespace is
 * dropped, so `2025-06-01 00:00:00+00` is accepted as `2025-06-01`.
 */
export function dateVar(options: CommonOptions<string> & Resolved<string>): EnvVar<string>;
export function dateVar(options?: CommonOptions<string>): EnvVar<string | undefined>;
export function dateVar(options?: CommonOptions<string>): EnvVar<string | undefined> {
  return z.string().nullable().optional().transform((value, ctx) => {
    if (isBlank(value)) {
      return resolveBlank(ctx, options);
    }
    const candidate = value.trim().split(/\s+/)[0] ?? '';
    const parsed = new Date(`${candidate}T00:00:00Z`);
    if (!CALENDAR_DATE_PATTERN.test(candidate) || Number.isNaN(parsed.getTime())
      || parsed.toISOString().slice(0, 10) !== candidate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeTarget(ctx, options?.description)} must be a calendar date (YYYY-MM-DD)`
      });
      return z.NEVER;
    }
    return candidate;
  });
}
