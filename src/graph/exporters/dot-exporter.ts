import { Declaration, DeclarationKind, MethodSpec, PropertySpec } from '../../models';
import { config } from '../../utils/config';
import { RelationshipGraph } from '../relationship-graph/graph-store';
import { GraphNode, Relationship, RelationshipKind, compareNames, compareRelationships } from '../relationship-graph/types';
import { related } from '../traversal/related-nodes';
import { TraversalMode } from '../traversal/types';
import { accessSymbol, isHiddenAccess, stereotype } from './formatting';

export interface DotExportOptions {
  includePrivate?: boolean;
  includeProperties?: boolean;
  includeMethods?: boolean;
  // Restrict the output to the neighborhood of one type
  focus?: string;
  depth?: number;
  mode?: TraversalMode;
  includeDescendants?: boolean;
}

const KIND_COLORS: Record<DeclarationKind, string> = {
  [DeclarationKind.CLASS]: '#E8F4FD',
  [DeclarationKind.STRUCT]: '#FFF4E6',
  [DeclarationKind.PROTOCOL]: '#F3E5F5',
  [DeclarationKind.ENUM]: '#E8F5E9',
  [DeclarationKind.ACTOR]: '#FCE4EC',
  [DeclarationKind.EXTENSION]: '#F0F0F0',
};

const EDGE_STYLES: Record<RelationshipKind, { arrowhead: string; style: string }> = {
  [RelationshipKind.INHERITS]: { arrowhead: 'empty', style: 'solid' },
  [RelationshipKind.CONFORMS]: { arrowhead: 'empty', style: 'dashed' },
  [RelationshipKind.COMPOSES]: { arrowhead: 'diamond', style: 'solid' },
  [RelationshipKind.AGGREGATES]: { arrowhead: 'odiamond', style: 'solid' },
  [RelationshipKind.DEPENDS_ON]: { arrowhead: 'open', style: 'dashed' },
  [RelationshipKind.IMPLEMENTS]: { arrowhead: 'empty', style: 'dashed' },
  [RelationshipKind.PROTOCOL_INHERITS]: { arrowhead: 'empty', style: 'solid' },
  [RelationshipKind.INJECTED_VIA]: { arrowhead: 'open', style: 'dotted' },
  [RelationshipKind.FULFILLS_REQUIREMENT]: { arrowhead: 'empty', style: 'dotted' },
  [RelationshipKind.GENERIC_PARAMETER]: { arrowhead: 'vee', style: 'dotted' },
  [RelationshipKind.GENERIC_CONSTRAINT]: { arrowhead: 'vee', style: 'dashed' },
  [RelationshipKind.WRAPPED_BY]: { arrowhead: 'odot', style: 'dotted' },
  [RelationshipKind.ELEMENT_TYPE]: { arrowhead: 'vee', style: 'dotted' },
  [RelationshipKind.ASSOCIATED_TYPE]: { arrowhead: 'normal', style: 'dotted' },
  [RelationshipKind.TYPE_CONSTRAINT]: { arrowhead: 'normal', style: 'dashed' },
  [RelationshipKind.REQUIRES_METHOD]: { arrowhead: 'normal', style: 'dotted' },
  [RelationshipKind.REQUIRES_PROPERTY]: { arrowhead: 'normal', style: 'dotted' },
  [RelationshipKind.RESOLVES_ASSOCIATED_TYPE]: { arrowhead: 'onormal', style: 'dotted' },
};

/**
 * Escape text for a record-shaped node label.
 */
export function escapeDotLabel(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/([{}|<>])/g, '\\$1');
}

function formatProperty(property: PropertySpec): string {
  const staticPrefix = property.isStatic ? 'static ' : '';
  const binding = property.isLet ? 'let ' : 'var ';
  return `${accessSymbol(property.accessLevel)} ${staticPrefix}${binding}${escapeDotLabel(property.name)}: ${escapeDotLabel(property.typeName)}`;
}

function formatMethod(method: MethodSpec): string {
  const prefixes = [method.isStatic ? 'static ' : '', method.isAsync ? 'async ' : '', method.throws ? 'throws ' : ''].join('');
  const parameters = method.parameters
    .map(parameter => {
      const typeName = escapeDotLabel(parameter.typeName);
      return parameter.label ? `${escapeDotLabel(parameter.label)}: ${typeName}` : typeName;
    })
    .join(', ');
  const returns = method.returnType ? ` → ${escapeDotLabel(method.returnType)}` : '';
  return `${accessSymbol(method.accessLevel)} ${prefixes}${escapeDotLabel(method.name)}(${parameters})${returns}`;
}

function formatNode(declaration: Declaration, options: Required<Pick<DotExportOptions, 'includePrivate' | 'includeProperties' | 'includeMethods'>>): string {
  const sections = [`${escapeDotLabel(stereotype(declaration.kind))}\\n${escapeDotLabel(declaration.name)}`];

  if (options.includeProperties) {
    const properties = declaration.properties.filter(p => !isHiddenAccess(p.accessLevel, options.includePrivate));
    if (properties.length > 0) {
      sections.push(properties.map(formatProperty).join('\\n'));
    }
  }

  if (options.includeMethods) {
    const methods = declaration.methods.filter(m => !isHiddenAccess(m.accessLevel, options.includePrivate));
    if (methods.length > 0) {
      sections.push(methods.map(formatMethod).join('\\n'));
    }
  }

  const style = declaration.isPhantom ? 'filled,dashed' : 'filled';
  const name = escapeDotLabel(declaration.name);
  return `    "${name}" [label="{${sections.join('|')}}", style="${style}", fillcolor="${KIND_COLORS[declaration.kind]}"];\n`;
}

function formatEdge(relationship: Relationship): string {
  const { arrowhead, style } = EDGE_STYLES[relationship.kind];
  const attributes = [`arrowhead=${arrowhead}`, `style=${style}`];
  if (relationship.details) {
    attributes.push(`label="${escapeDotLabel(relationship.details)}"`);
  }
  return `    "${escapeDotLabel(relationship.from)}" -> "${escapeDotLabel(relationship.to)}" [${attributes.join(', ')}];\n`;
}

/**
 * Render the graph, or the neighborhood of `focus`, as a Graphviz digraph.
 * Edges are drawn only between visible nodes.
 */
export function exportDot(graph: RelationshipGraph, options: DotExportOptions = {}): string {
  const resolved = {
    includePrivate: options.includePrivate ?? false,
    includeProperties: options.includeProperties ?? true,
    includeMethods: options.includeMethods ?? true,
  };

  const candidates: GraphNode[] = options.focus
    ? related(graph, options.focus, {
        maxDepth: options.depth ?? config.traversal.defaultMaxDepth,
        mode: options.mode,
        includeDescendants: options.includeDescendants,
      })
    : graph.allNodes();

  const visible = candidates
    .filter(node => !isHiddenAccess(node.declaration.accessLevel, resolved.includePrivate))
    .sort((a, b) => compareNames(a.declaration.name, b.declaration.name));
  const visibleNames = new Set(visible.map(node => node.declaration.name));

  let output = 'digraph TypeGraph {\n';
  output += '    rankdir=TB;\n';
  output += '    node [shape=record, fontname="Helvetica", fontsize=10];\n';
  output += '    edge [fontname="Helvetica", fontsize=9];\n\n';

  for (const node of visible) {
    output += formatNode(node.declaration, resolved);
  }

  if (visible.length > 0) {
    output += '\n';
  }

  for (const node of visible) {
    const edges = node.relationships
      .filter(relationship => visibleNames.has(relationship.to))
      .sort(compareRelationships);
    for (const relationship of edges) {
      output += formatEdge(relationship);
    }
  }

  output += '}\n';
  return output;
}
