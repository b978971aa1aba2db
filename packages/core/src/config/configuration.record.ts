import { z } from 'zod';
import { ValidationError, type FieldIssue } from '../common/errors';

export type RawParams = Readonly<Record<string, unknown>>;

export type ParseResult<T> = { success: true; data: T } | { success: false; issues: FieldIssue[] };

export type ParamsParser<T> = (raw: RawParams) => ParseResult<T>;

/**
 * Validated parameters for one `provider.kind` block.
 *
 * `params` is frozen; `clientKwargs()` renders the constructor arguments from it and has no
 * side effects, so repeated calls return equal values.
 */
export class ConfigurationRecord<TParams extends object = object, TKwargs = unknown> {
  readonly params: Readonly<TParams>;

  constructor(
    readonly provider: string,
    readonly kind: string,
    params: TParams,
    private readonly render: (params: Readonly<TParams>, kind: string) => TKwargs,
  ) {
    this.params = Object.freeze({ ...params });
  }

  get selection(): string {
    return `${this.provider}.${this.kind}`;
  }

  clientKwargs(): TKwargs {
    return this.render(this.params, this.kind);
  }
}

export function toFieldIssues(issues: ReadonlyArray<z.core.$ZodIssue>): FieldIssue[] {
  const out: FieldIssue[] = [];
  for (const issue of issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) out.push({ field: key, reason: 'is not a known field' });
      continue;
    }
    const field = issue.path.map((p) => String(p)).join('.');
    out.push({ field: field || '(root)', reason: issue.message });
  }
  return out;
}

// Adapts a zod schema to the parser shape the registry stores.
export function zodParams<T extends object>(schema: z.ZodType<T>): ParamsParser<T> {
  return (raw) => {
    const result = schema.safeParse(raw);
    if (result.success) return { success: true, data: result.data };
    return { success: false, issues: toFieldIssues(result.error.issues) };
  };
}

export type RecordTarget = {
  domain: string;
  provider: string;
  kind: string;
};

export function validateRecord<TParams extends object, TKwargs>(
  definition: {
    parse: ParamsParser<TParams>;
    render(params: Readonly<TParams>, kind: string): TKwargs;
  },
  raw: RawParams,
  target: RecordTarget,
): ConfigurationRecord<TParams, TKwargs> {
  const result = definition.parse(raw);
  if (!result.success) {
    throw new ValidationError(`${target.provider}.${target.kind}`, result.issues, target);
  }
  return new ConfigurationRecord(target.provider, target.kind, result.data, (params, kind) =>
    definition.render(params, kind),
  );
}
