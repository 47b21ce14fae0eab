import {
  DEEP_TYPE_KINDS,
  RelationshipGraph,
  RelationshipKind,
  analyzeDeepTypeRelationships,
} from '../../src/graph/relationship-graph';
import { AccessLevel, Declaration } from '../../src/models';
import { edgeTuples, method, parameter, property, structDecl } from '../helpers/declarations';

function analyze(declarations: Declaration[]): RelationshipGraph {
  const graph = new RelationshipGraph();
  declarations.forEach(declaration => graph.addDeclaration(declaration));
  analyzeDeepTypeRelationships(graph);
  return graph;
}

function deepEdges(graph: RelationshipGraph, from: string): string[] {
  return edgeTuples(graph.getOutgoing(from).filter(relationship => DEEP_TYPE_KINDS.has(relationship.kind)));
}

describe('analyzeDeepTypeRelationships', () => {
  it('should record collection elements, generic arguments and wrappers', () => {
    const graph = analyze([
      structDecl('Library', {
        properties: [
          property('books', '[Book]'),
          property('index', '[String: Author]'),
          property('pending', 'Future<Book, LoadError>'),
          property('shelf', 'Shelf', { attributes: [{ name: 'Published', arguments: [] }] }),
        ],
        methods: [method('search', [parameter('query', 'String')], '[Book]')],
        typeAliases: [{ name: 'Lookup', aliasedType: '[String: Book]', accessLevel: AccessLevel.INTERNAL }],
      }),
    ]);

    expect(deepEdges(graph, 'Library')).toEqual([
      'Library -element_type-> Author (property: index)',
      'Library -element_type-> Book (property: books)',
      'Library -element_type-> Book (returns from: search)',
      'Library -element_type-> Book (typealias: Lookup)',
      'Library -generic_parameter-> Book (property: pending)',
      'Library -generic_parameter-> LoadError (property: pending)',
      'Library -wrapped_by-> Published (property: shelf)',
    ]);
  });

  it('should recurse into nested generic arguments', () => {
    const graph = analyze([structDecl('Checkout', { properties: [property('result', 'Result<[Order], APIError>')] })]);

    expect(deepEdges(graph, 'Checkout')).toEqual([
      'Checkout -element_type-> Order (property: result)',
      'Checkout -generic_parameter-> APIError (property: result)',
      'Checkout -generic_parameter-> Order (property: result)',
    ]);
  });

  it('should split closures into parameter and return dependencies', () => {
    const graph = analyze([
      structDecl('Picker', { properties: [property('onSelect', '((Book) -> Review)?')] }),
    ]);

    expect(edgeTuples(graph.getOutgoing('Picker'))).toEqual([
      'Picker -depends_on-> Book (closure parameter in: onSelect)',
      'Picker -depends_on-> Review (closure returns in: onSelect)',
    ]);
  });

  it('should strip the attribute marker from wrapper names', () => {
    const graph = analyze([
      structDecl('SettingsView', {
        properties: [property('model', 'SettingsModel', { attributes: [{ name: '@StateObject', arguments: [] }] })],
      }),
    ]);

    expect(deepEdges(graph, 'SettingsView')).toEqual(['SettingsView -wrapped_by-> StateObject (property: model)']);
  });

  it('should ignore attributes that are not property wrappers', () => {
    const graph = analyze([
      structDecl('Widget', {
        properties: [property('title', 'String', { attributes: [{ name: 'objc', arguments: [] }] })],
      }),
    ]);

    expect(graph.getOutgoing('Widget')).toEqual([]);
  });

  it('should record generic parameter and where-clause constraints', () => {
    const graph = analyze([
      structDecl('Cache', {
        genericParameters: [
          { name: 'Key', inheritedType: 'Hashable' },
          { name: 'Value', inheritedType: 'Entity & Codable' },
        ],
        genericConstraints: [{ type: 'Value', requirement: 'Persistable' }],
        properties: [property('storage', '[Key: Value]')],
      }),
    ]);

    expect(deepEdges(graph, 'Cache')).toEqual([
      'Cache -generic_constraint-> Codable (generic parameter: Value)',
      'Cache -generic_constraint-> Entity (generic parameter: Value)',
      'Cache -generic_constraint-> Hashable (generic parameter: Key)',
      'Cache -generic_constraint-> Persistable (where: Value)',
    ]);
  });

  it('should record custom tuple components as elements', () => {
    const graph = analyze([structDecl('Session', { properties: [property('pair', '(User, Token, Int)')] })]);

    expect(edgeTuples(graph.getOutgoing('Session'))).toEqual([
      'Session -element_type-> Token (property: pair)',
      'Session -element_type-> User (property: pair)',
    ]);
  });

  it('should add each edge once across repeated runs', () => {
    const graph = analyze([structDecl('Feed', { properties: [property('items', '[Post]')] })]);
    analyzeDeepTypeRelationships(graph);

    expect(graph.getOutgoing('Feed').filter(relationship => relationship.kind === RelationshipKind.ELEMENT_TYPE)).toEqual([
      { from: 'Feed', to: 'Post', kind: RelationshipKind.ELEMENT_TYPE, details: 'property: items' },
    ]);
  });
});
