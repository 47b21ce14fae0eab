import { AccessLevel, DeclarationKind } from '../../models';

const ACCESS_SYMBOLS: Record<AccessLevel, string> = {
  [AccessLevel.PRIVATE]: '-',
  [AccessLevel.FILEPRIVATE]: '~',
  [AccessLevel.INTERNAL]: '#',
  [AccessLevel.PUBLIC]: '+',
  [AccessLevel.OPEN]: '+',
};

export function accessSymbol(level: AccessLevel): string {
  return ACCESS_SYMBOLS[level];
}

export function stereotype(kind: DeclarationKind): string {
  return `«${kind}»`;
}

export function isHiddenAccess(level: AccessLevel, includePrivate: boolean): boolean {
  return !includePrivate && level === AccessLevel.PRIVATE;
}
