import { GraphBuilder, flattenDeclarations } from '../../src/graph/builder';
import { RelationshipKind } from '../../src/graph/relationship-graph';
import { ExternalTypeClassifier } from '../../src/utils/external-type-classifier';
import { classDecl, edgeTuples, initializer, parameter, property, protocolDecl, structDecl } from '../helpers/declarations';

describe('flattenDeclarations', () => {
  it('should put parents before their nested types', () => {
    const declarations = [
      structDecl('Outer', {
        nestedTypes: [structDecl('Inner', { nestedTypes: [structDecl('Deepest')] }), structDecl('Sibling')],
      }),
      classDecl('Other'),
    ];

    expect(flattenDeclarations(declarations).map(declaration => declaration.name)).toEqual([
      'Outer',
      'Other',
      'Inner',
      'Sibling',
      'Deepest',
    ]);
  });
});

describe('GraphBuilder', () => {
  it('should ingest nested types as nodes of their own', () => {
    const result = new GraphBuilder().build([
      structDecl('Outer', { nestedTypes: [structDecl('Inner', { properties: [property('owner', 'Outer')] })] }),
    ]);

    expect(result.declarationsIngested).toBe(2);
    expect(result.graph.getOutgoing('Inner')).toEqual([
      { from: 'Inner', to: 'Outer', kind: RelationshipKind.COMPOSES, details: 'property: owner' },
    ]);
  });

  it('should run every pass and mark the graph as analyzed', () => {
    const result = new GraphBuilder().build([
      protocolDecl('Notifier', { properties: [property('channel', 'Channel')] }),
      classDecl('EmailNotifier', {
        conformedProtocols: ['Notifier'],
        properties: [property('channel', 'Channel'), property('queue', '[Message]')],
      }),
      classDecl('SignupService', {
        initializers: [initializer([parameter('notifier', 'Notifier')])],
      }),
    ]);

    expect(result.graph.isAnalyzed()).toBe(true);
    expect(result.integrityWarnings).toEqual([]);
    expect(edgeTuples(result.graph.allRelationships())).toEqual([
      'EmailNotifier -composes-> Channel (property: channel)',
      'EmailNotifier -composes-> Message (property: queue)',
      'EmailNotifier -conforms-> Notifier',
      'EmailNotifier -element_type-> Message (property: queue)',
      'EmailNotifier -fulfills_requirement-> Notifier (channel)',
      'EmailNotifier -implements-> Notifier',
      'Notifier -composes-> Channel (property: channel)',
      'Notifier -requires_property-> Channel (channel)',
      'SignupService -depends_on-> Notifier (parameter in: init)',
      'SignupService -injected_via-> EmailNotifier (notifier)',
    ]);
    expect(result.stats.nodeCount).toBe(5);
    expect(result.stats.phantomCount).toBe(2);
  });

  it('should build with an explicit classifier', () => {
    const classifier = new ExternalTypeClassifier();
    const result = new GraphBuilder({ classifier }).build([
      classDecl('Settings', { inheritedTypes: ['NSObject'] }),
    ]);

    expect(result.graph.classifier).toBe(classifier);
    expect(result.graph.getNode('NSObject')?.declaration.moduleName).toBe('Foundation');
  });

  it('should report an empty graph for no input', () => {
    const result = new GraphBuilder().build([]);

    expect(result.stats).toEqual({
      nodeCount: 0,
      phantomCount: 0,
      relationshipCount: 0,
      relationshipsByKind: {},
      integrityWarningCount: 0,
    });
    expect(result.declarationsIngested).toBe(0);
  });
});
