import { Declaration, DeclarationKind } from '../../models';
import { compareNames } from '../relationship-graph/types';
import { accessSymbol } from './formatting';

export type TypeFilter = 'all' | DeclarationKind;

export interface ListTypesOptions {
  type?: TypeFilter;
  verbose?: boolean;
}

/**
 * One line per matching declaration, `<access> <kind> <name>`, sorted by name.
 * Verbose mode adds the file, the inheritance clause and the conformances.
 */
export function listTypes(declarations: Declaration[], options: ListTypesOptions = {}): string[] {
  const filter = options.type ?? 'all';
  const matching = declarations
    .filter(declaration => filter === 'all' || declaration.kind === filter)
    .sort((a, b) => compareNames(a.name, b.name));

  const lines: string[] = [];
  for (const declaration of matching) {
    lines.push(`${accessSymbol(declaration.accessLevel)} ${declaration.kind} ${declaration.name}`);

    if (options.verbose) {
      lines.push(`  File: ${declaration.location.file}`);
      if (declaration.inheritedTypes.length > 0) {
        lines.push(`  Inherits: ${declaration.inheritedTypes.join(', ')}`);
      }
      if (declaration.conformedProtocols.length > 0) {
        lines.push(`  Conforms to: ${declaration.conformedProtocols.join(', ')}`);
      }
    }
  }
  return lines;
}
