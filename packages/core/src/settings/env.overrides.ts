import type { RawParams } from '../config/configuration.record';

export type EnvSource = Readonly<Record<string, string | undefined>>;

// Optional DI token; resolvers read `process.env` when nothing is bound to it.
export const SETTINGS_ENV = Symbol('SETTINGS_ENV');

/**
 * Replaces each field whose mapped variable is set in `env`. A set variable wins even when empty;
 * fields without a set variable keep their file value. Only scalar fields are overridden.
 */
export function applyEnvOverrides(
  raw: RawParams,
  overrides: Readonly<Record<string, string>>,
  env: EnvSource,
): { params: Record<string, unknown>; applied: string[] } {
  const params: Record<string, unknown> = { ...raw };
  const applied: string[] = [];
  for (const [field, variable] of Object.entries(overrides)) {
    const value = env[variable];
    if (value === undefined) continue;
    params[field] = value;
    applied.push(field);
  }
  return { params, applied };
}

// YAML `key: ~` / `key: null` means "not set".
export function dropNulls(raw: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    out[key] = value;
  }
  return out;
}
