import {
  PROTOCOL_INTERNAL_KINDS,
  RelationshipGraph,
  RelationshipKind,
  analyzeProtocolInternalStructure,
  providedMemberNames,
  requirementNames,
} from '../../src/graph/relationship-graph';
import { AccessLevel, Declaration, RequirementKind } from '../../src/models';
import {
  edgeTuples,
  initializer,
  method,
  parameter,
  property,
  protocolDecl,
  structDecl,
} from '../helpers/declarations';

const container = (): Declaration =>
  protocolDecl('Container', {
    associatedTypes: [{ name: 'Item', inheritedType: 'Equatable & Identifiable', defaultType: 'Record' }],
    properties: [property('items', '[Item]'), property('owner', 'Account?')],
    methods: [method('append(_:)', [parameter('item', 'Item')]), method('export', [], 'Exporter')],
    protocolRequirements: [
      { kind: RequirementKind.INITIALIZER, name: 'init', signature: 'init()', isOptional: false },
    ],
  });

const inbox = (): Declaration =>
  structDecl('Inbox', {
    conformedProtocols: ['Container'],
    typeAliases: [{ name: 'Item', aliasedType: 'Message', accessLevel: AccessLevel.INTERNAL }],
    properties: [property('items', '[Message]')],
    methods: [method('append', [parameter('item', 'Message')])],
    initializers: [initializer([])],
  });

function analyze(declarations: Declaration[]): RelationshipGraph {
  const graph = new RelationshipGraph();
  declarations.forEach(declaration => graph.addDeclaration(declaration));
  analyzeProtocolInternalStructure(graph);
  return graph;
}

function protocolStructureEdges(graph: RelationshipGraph): string[] {
  return edgeTuples(
    graph
      .allRelationships()
      .filter(
        relationship =>
          PROTOCOL_INTERNAL_KINDS.has(relationship.kind) ||
          relationship.kind === RelationshipKind.FULFILLS_REQUIREMENT
      )
  );
}

describe('analyzeProtocolInternalStructure', () => {
  it('should describe associated types, requirements and how a conformer meets them', () => {
    const graph = analyze([container(), inbox()]);

    expect(protocolStructureEdges(graph)).toEqual([
      'Container -associated_type-> Item',
      'Container -requires_method-> Exporter (export)',
      'Container -requires_method-> Item (append)',
      'Container -requires_property-> Account (owner)',
      'Container -requires_property-> Item (items)',
      'Inbox -fulfills_requirement-> Container (append)',
      'Inbox -fulfills_requirement-> Container (init)',
      'Inbox -fulfills_requirement-> Container (items)',
      'Inbox -resolves_associated_type-> Message (Item)',
      'Item -resolves_associated_type-> Record',
      'Item -type_constraint-> Equatable',
      'Item -type_constraint-> Identifiable',
    ]);
  });

  it('should only claim requirements the conformer actually provides', () => {
    const graph = analyze([container(), inbox()]);
    const protocol = graph.peekDeclaration('Container');
    const conformer = graph.peekDeclaration('Inbox');
    if (!protocol || !conformer) {
      throw new Error('fixture declarations missing');
    }

    const required = requirementNames(protocol);
    const provided = providedMemberNames(conformer);
    const fulfillments = graph
      .getOutgoing('Inbox')
      .filter(relationship => relationship.kind === RelationshipKind.FULFILLS_REQUIREMENT);

    expect(fulfillments).toHaveLength(3);
    for (const fulfillment of fulfillments) {
      expect(fulfillment.details && required.has(fulfillment.details)).toBe(true);
      expect(fulfillment.details && provided.has(fulfillment.details)).toBe(true);
    }
  });

  it('should make associated types nodes of their own', () => {
    const graph = analyze([container()]);

    expect(graph.getNode('Item')?.declaration.isPhantom).toBe(true);
    expect(graph.getIntegrityWarnings()).toEqual([]);
  });

  it('should ignore typealiases that resolve no associated type', () => {
    const graph = analyze([
      container(),
      structDecl('Outbox', {
        conformedProtocols: ['Container'],
        typeAliases: [{ name: 'Payload', aliasedType: 'Envelope', accessLevel: AccessLevel.INTERNAL }],
      }),
    ]);

    expect(
      graph.getOutgoing('Outbox').filter(relationship => relationship.kind === RelationshipKind.RESOLVES_ASSOCIATED_TYPE)
    ).toEqual([]);
  });
});

describe('requirementNames', () => {
  it('should collect members and explicit requirements without associated types', () => {
    const protocol = protocolDecl('Renderer', {
      methods: [method('render(into:)', [parameter('context', 'Context')])],
      subscripts: [{ parameters: [parameter('index', 'Int')], returnType: 'Frame', accessLevel: AccessLevel.INTERNAL, isStatic: false }],
      protocolRequirements: [
        { kind: RequirementKind.PROPERTY, name: 'frameRate', signature: 'var frameRate: Int { get }', isOptional: false },
        { kind: RequirementKind.ASSOCIATED_TYPE, name: 'Output', signature: 'associatedtype Output', isOptional: false },
        { kind: RequirementKind.METHOD, name: 'flush()', signature: 'func flush()', isOptional: true },
      ],
    });

    expect(Array.from(requirementNames(protocol)).sort()).toEqual(['flush', 'frameRate', 'render', 'subscript']);
  });
});
