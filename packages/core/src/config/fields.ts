import { z } from 'zod';

// Shared field builders for provider parameter schemas. Values coming from YAML keep their
// types; values coming from environment overrides arrive as strings and are coerced here.

const requiredOr = (fallback: string) => (issue: { input?: unknown }) =>
  issue.input === undefined ? 'is required' : fallback;

function toNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') return Number(value.trim());
  return value;
}

function toBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

export function text() {
  return z.string({ error: requiredOr('must be a string') }).trim().min(1, 'must not be empty');
}

export function secret() {
  return z.string({ error: requiredOr('must be a string') }).min(1, 'must not be empty');
}

export function url() {
  return text()
    .regex(/^https?:\/\//, 'must be an http(s) URL')
    .transform((v) => v.replace(/\/+$/, ''));
}

export function number(opts: { min?: number; max?: number; int?: boolean; positive?: boolean } = {}) {
  let schema = z.number({ error: requiredOr('must be a number') });
  if (opts.int) schema = schema.int('must be an integer');
  if (opts.positive) schema = schema.positive('must be greater than 0');
  if (opts.min !== undefined) schema = schema.min(opts.min, `must be >= ${opts.min}`);
  if (opts.max !== undefined) schema = schema.max(opts.max, `must be <= ${opts.max}`);
  return z.preprocess(toNumber, schema);
}

export function integer(opts: { min?: number; max?: number; positive?: boolean } = {}) {
  return number({ ...opts, int: true });
}

export function port() {
  return integer({ min: 0, max: 65535 });
}

export function flag() {
  return z.preprocess(toBoolean, z.boolean({ error: requiredOr('must be a boolean') }));
}

export function oneOf<const T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values, { error: requiredOr(`must be one of ${values.join(', ')}`) });
}

// Like secret(), but an empty string is a legitimate value (e.g. a passwordless database user).
export function credential() {
  return z.string({ error: requiredOr('must be a string') });
}
