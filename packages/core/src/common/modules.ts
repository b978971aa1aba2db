import { createRequire } from 'node:module';

const requireFromHere = createRequire(import.meta.url);

export type ModuleProbe = (specifier: string) => boolean;

// Resolves without loading, so probing a driver never opens a connection or pulls native bindings.
export const isModuleInstalled: ModuleProbe = (specifier) => {
  try {
    requireFromHere.resolve(specifier);
    return true;
  } catch (err) {
    if (isModuleNotFound(err)) return false;
    throw err;
  }
};

export function isModuleNotFound(err: unknown, specifier?: string): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  if (code !== 'MODULE_NOT_FOUND' && code !== 'ERR_MODULE_NOT_FOUND') return false;
  return specifier === undefined || err.message.includes(specifier);
}
