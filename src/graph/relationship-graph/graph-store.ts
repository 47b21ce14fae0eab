import { Declaration, DeclarationKind, EXTENDABLE_KINDS } from '../../models';
import { createComponentLogger } from '../../utils/logger';
import { ExternalTypeClassifier, getDefaultClassifier } from '../../utils/external-type-classifier';
import { isExtensionMerge, mergeExtension } from './declaration-merge';
import { PhantomHost, ensureTarget } from './phantom-node-handler';
import { RelationshipSink, addStructuralRelationships } from './structural-analysis';
import {
  GraphNode,
  GraphStats,
  IntegrityWarning,
  Relationship,
  RelationshipKind,
  relationshipKey,
} from './types';

const logger = createComponentLogger('relationship-graph');

interface StoredNode {
  declaration: Declaration;
  outgoing: Map<string, Relationship>;
  // Extensions folded into this node, by fingerprint. Re-ingesting one is a
  // no-op, and a replacing primary gets them folded in again.
  extensions: Map<string, Declaration>;
}

function copyRelationship(relationship: Relationship): Relationship {
  return { ...relationship };
}

/**
 * Name-keyed store of declarations and the deduplicated relationships between them.
 *
 * Every edge source must have been ingested; every edge target is created on
 * demand as a phantom node. Reads hand out copies.
 */
export class RelationshipGraph implements PhantomHost, RelationshipSink {
  readonly classifier: ExternalTypeClassifier;

  private readonly nodes = new Map<string, StoredNode>();
  private readonly relationships = new Map<string, Relationship>();
  private readonly incoming = new Map<string, Map<string, Relationship>>();
  private readonly integrityWarnings: IntegrityWarning[] = [];
  private analyzed = false;

  constructor(classifier?: ExternalTypeClassifier) {
    this.classifier = classifier ?? getDefaultClassifier();
  }

  /**
   * Insert, merge or replace a declaration, then record its structural edges.
   */
  addDeclaration(declaration: Declaration): void {
    if (this.analyzed) {
      logger.warn('Declaration ingested after relationship analysis ran', {
        name: declaration.name,
      });
    }

    const incoming = structuredClone(declaration);
    const existing = this.nodes.get(incoming.name);
    let stored: Declaration;

    if (!existing) {
      stored = incoming;
      this.nodes.set(incoming.name, {
        declaration: stored,
        outgoing: new Map(),
        extensions: new Map(),
      });
    } else if (isExtensionMerge(existing.declaration, incoming)) {
      const extension =
        incoming.kind === DeclarationKind.EXTENSION ? incoming : existing.declaration;
      const fingerprint = JSON.stringify(extension);

      if (existing.extensions.has(fingerprint)) {
        stored = existing.declaration;
      } else {
        stored = mergeExtension(existing.declaration, incoming);
        existing.declaration = stored;
        existing.extensions.set(fingerprint, extension);
        logger.debug('Merged extension into declaration', {
          name: stored.name,
          kind: stored.kind,
        });
      }
    } else {
      if (!existing.declaration.isPhantom) {
        logger.debug('Replacing declaration with a later one of the same name', {
          name: incoming.name,
          previousKind: existing.declaration.kind,
          kind: incoming.kind,
        });
      }
      if (EXTENDABLE_KINDS.has(incoming.kind)) {
        stored = Array.from(existing.extensions.values()).reduce(mergeExtension, incoming);
      } else {
        stored = incoming;
        existing.extensions.clear();
      }
      existing.declaration = stored;
    }

    addStructuralRelationships(this, stored);
  }

  /**
   * Record an edge. Returns false for a duplicate or for a source that was
   * never ingested (the latter is kept as an integrity warning).
   */
  addRelationship(from: string, to: string, kind: RelationshipKind, details?: string): boolean {
    const relationship: Relationship = details === undefined ? { from, to, kind } : { from, to, kind, details };

    const source = this.nodes.get(from);
    if (!source) {
      const message = `Relationship source "${from}" was never ingested`;
      this.integrityWarnings.push({ relationship, message });
      logger.warn(message, { to, kind, details });
      return false;
    }

    const key = relationshipKey(relationship);
    if (this.relationships.has(key)) {
      return false;
    }

    if (!this.nodes.has(to)) {
      ensureTarget(this, to);
    }

    this.relationships.set(key, relationship);
    source.outgoing.set(key, relationship);

    let targetIncoming = this.incoming.get(to);
    if (!targetIncoming) {
      targetIncoming = new Map();
      this.incoming.set(to, targetIncoming);
    }
    targetIncoming.set(key, relationship);

    return true;
  }

  /**
   * Used by phantom synthesis only; a name that already exists is left alone.
   */
  insertPhantom(declaration: Declaration): void {
    if (this.nodes.has(declaration.name)) {
      return;
    }
    this.nodes.set(declaration.name, {
      declaration: { ...declaration, isPhantom: true },
      outgoing: new Map(),
      extensions: new Map(),
    });
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  getNode(name: string): GraphNode | undefined {
    const node = this.nodes.get(name);
    if (!node) {
      return undefined;
    }
    return {
      declaration: structuredClone(node.declaration),
      relationships: Array.from(node.outgoing.values(), copyRelationship),
    };
  }

  allNodes(): GraphNode[] {
    const result: GraphNode[] = [];
    for (const name of this.nodes.keys()) {
      const node = this.getNode(name);
      if (node) result.push(node);
    }
    return result;
  }

  nodeNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Live view of a declaration for the analysis passes. Not a copy.
   */
  peekDeclaration(name: string): Declaration | undefined {
    return this.nodes.get(name)?.declaration;
  }

  allRelationships(): Relationship[] {
    return Array.from(this.relationships.values(), copyRelationship);
  }

  getOutgoing(name: string): Relationship[] {
    const node = this.nodes.get(name);
    return node ? Array.from(node.outgoing.values(), copyRelationship) : [];
  }

  getIncoming(name: string): Relationship[] {
    const edges = this.incoming.get(name);
    return edges ? Array.from(edges.values(), copyRelationship) : [];
  }

  getIntegrityWarnings(): IntegrityWarning[] {
    return this.integrityWarnings.map(warning => ({
      relationship: copyRelationship(warning.relationship),
      message: warning.message,
    }));
  }

  markAnalyzed(): void {
    this.analyzed = true;
  }

  isAnalyzed(): boolean {
    return this.analyzed;
  }

  getStats(): GraphStats {
    const relationshipsByKind: Partial<Record<RelationshipKind, number>> = {};
    for (const relationship of this.relationships.values()) {
      relationshipsByKind[relationship.kind] = (relationshipsByKind[relationship.kind] ?? 0) + 1;
    }

    let phantomCount = 0;
    for (const node of this.nodes.values()) {
      if (node.declaration.isPhantom) phantomCount++;
    }

    return {
      nodeCount: this.nodes.size,
      phantomCount,
      relationshipCount: this.relationships.size,
      relationshipsByKind,
      integrityWarningCount: this.integrityWarnings.length,
    };
  }
}
