import { RelationshipGraph, RelationshipKind } from '../../../src/graph/relationship-graph';
import { exportJsonGraph } from '../../../src/graph/exporters';
import { classDecl, property, structDecl } from '../../helpers/declarations';

describe('exportJsonGraph', () => {
  let graph: RelationshipGraph;

  beforeEach(() => {
    graph = new RelationshipGraph();
    graph.addDeclaration(classDecl('A', { properties: [property('d', 'D')], inheritedTypes: ['B'] }));
    graph.addDeclaration(classDecl('B'));
    graph.addDeclaration(structDecl('D'));
  });

  it('should list every node by name with sorted edges', () => {
    const document = exportJsonGraph(graph);

    expect(document.nodes.map(node => node.type.name)).toEqual(['A', 'B', 'D']);
    expect(document.nodes[0].relationships).toEqual([
      { from: 'A', to: 'B', kind: RelationshipKind.INHERITS },
      { from: 'A', to: 'D', kind: RelationshipKind.COMPOSES, details: 'property: d' },
    ]);
    expect(document.nodes[1].relationships).toEqual([]);
  });

  it('should carry the full declaration', () => {
    const [first] = exportJsonGraph(graph).nodes;

    expect(first.type.kind).toBe('class');
    expect(first.type.properties[0].typeName).toBe('D');
    expect(first.type.isPhantom).toBe(false);
  });

  it('should keep only edges inside the focus neighborhood', () => {
    const document = exportJsonGraph(graph, { focus: 'A', depth: 1 });

    expect(document.nodes.map(node => node.type.name)).toEqual(['A', 'B']);
    expect(document.nodes[0].relationships).toEqual([{ from: 'A', to: 'B', kind: RelationshipKind.INHERITS }]);
  });

  it('should produce an empty document for an unknown focus', () => {
    expect(exportJsonGraph(graph, { focus: 'Nowhere' })).toEqual({ nodes: [] });
  });

  it('should survive a JSON round trip', () => {
    const document = exportJsonGraph(graph);

    expect(JSON.parse(JSON.stringify(document))).toEqual(document);
  });
});
