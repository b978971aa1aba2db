import type { Domain } from '../registry/provider.definition';

export type DomainSpec<TKind extends string = string> = {
  // top-level namespace in the configuration document
  name: Domain;
  kinds: ReadonlyArray<TKind>;
};

export function isKindOf<TKind extends string>(spec: DomainSpec<TKind>, value: string): value is TKind {
  return spec.kinds.some((kind) => kind === value);
}
