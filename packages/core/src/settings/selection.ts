import { InvalidSelectionError } from '../common/errors';
import { isKindOf, type DomainSpec } from './domain';

export type Selection<TKind extends string = string> = {
  provider: string;
  kind: TKind;
};

const SEGMENT_RE = /^[A-Za-z0-9_-]+$/;

export function formatSelection(selection: Selection): string {
  return `${selection.provider}.${selection.kind}`;
}

/** Parses `provider.kind`; the kind must belong to the domain. */
export function parseSelection<TKind extends string>(spec: DomainSpec<TKind>, text: unknown): Selection<TKind> {
  if (typeof text !== 'string') {
    throw new InvalidSelectionError(String(text), 'selection must be a string of the form provider.kind', {
      domain: spec.name,
    });
  }
  const value = text.trim();
  const parts = value.split('.');
  if (parts.length !== 2) {
    throw new InvalidSelectionError(value, 'expected exactly one "." separating provider and kind', {
      domain: spec.name,
    });
  }
  const [provider = '', kind = ''] = parts;
  if (!SEGMENT_RE.test(provider)) {
    throw new InvalidSelectionError(value, 'provider segment is empty or malformed', { domain: spec.name });
  }
  if (!SEGMENT_RE.test(kind)) {
    throw new InvalidSelectionError(value, 'kind segment is empty or malformed', { domain: spec.name });
  }
  if (!isKindOf(spec, kind)) {
    throw new InvalidSelectionError(value, `unknown kind '${kind}' (expected one of ${spec.kinds.join(', ')})`, {
      domain: spec.name,
      provider,
    });
  }
  return { provider, kind };
}
