import { RelationshipGraph } from '../../../src/graph/relationship-graph';
import { escapeDotLabel, exportDot } from '../../../src/graph/exporters';
import { AccessLevel } from '../../../src/models';
import { classDecl, method, property, structDecl } from '../../helpers/declarations';

const HEADER = [
  'digraph TypeGraph {',
  '    rankdir=TB;',
  '    node [shape=record, fontname="Helvetica", fontsize=10];',
  '    edge [fontname="Helvetica", fontsize=9];',
  '',
];

describe('exportDot', () => {
  it('should render records, styles and labelled edges', () => {
    const graph = new RelationshipGraph();
    graph.addDeclaration(
      structDecl('Line', {
        properties: [property('start', 'Point')],
        methods: [method('length', [], 'Double')],
      })
    );
    graph.addDeclaration(structDecl('Point', { accessLevel: AccessLevel.PUBLIC }));

    expect(exportDot(graph).split('\n')).toEqual([
      ...HEADER,
      '    "Line" [label="{«struct»\\nLine|# var start: Point|# length() → Double}", style="filled", fillcolor="#FFF4E6"];',
      '    "Point" [label="{«struct»\\nPoint}", style="filled", fillcolor="#FFF4E6"];',
      '',
      '    "Line" -> "Point" [arrowhead=diamond, style=solid, label="property: start"];',
      '}',
      '',
    ]);
  });

  it('should render an empty graph', () => {
    expect(exportDot(new RelationshipGraph())).toBe(`${HEADER.join('\n')}\n}\n`);
  });

  it('should dash phantom nodes', () => {
    const graph = new RelationshipGraph();
    graph.addDeclaration(classDecl('Polygon', { properties: [property('origin', 'Vertex', { isLet: true })] }));

    const lines = exportDot(graph, { includeProperties: false, includeMethods: false }).split('\n');
    expect(lines).toContain('    "Vertex" [label="{«class»\\nVertex}", style="filled,dashed", fillcolor="#E8F4FD"];');
    expect(lines).toContain('    "Polygon" -> "Vertex" [arrowhead=odiamond, style=solid, label="property: origin"];');
  });

  it('should hide private types and members unless asked', () => {
    const graph = new RelationshipGraph();
    graph.addDeclaration(
      classDecl('Vault', {
        properties: [
          property('secret', 'Secret'),
          property('pin', 'String', { accessLevel: AccessLevel.PRIVATE }),
        ],
      })
    );
    graph.addDeclaration(structDecl('Secret', { accessLevel: AccessLevel.PRIVATE }));

    const hidden = exportDot(graph, { includeMethods: false }).split('\n');
    expect(hidden).toContain('    "Vault" [label="{«class»\\nVault|# var secret: Secret}", style="filled", fillcolor="#E8F4FD"];');
    expect(hidden.filter(line => line.includes('"Secret"'))).toEqual([]);

    const shown = exportDot(graph, { includeMethods: false, includePrivate: true }).split('\n');
    expect(shown).toContain(
      '    "Vault" [label="{«class»\\nVault|# var secret: Secret\\n- var pin: String}", style="filled", fillcolor="#E8F4FD"];'
    );
    expect(shown).toContain('    "Vault" -> "Secret" [arrowhead=diamond, style=solid, label="property: secret"];');
  });

  it('should restrict the output to the focus neighborhood', () => {
    const graph = new RelationshipGraph();
    graph.addDeclaration(classDecl('A', { inheritedTypes: ['B'], properties: [property('d', 'D')] }));
    graph.addDeclaration(classDecl('B'));
    graph.addDeclaration(structDecl('D'));

    const lines = exportDot(graph, { focus: 'A', depth: 1, includeProperties: false }).split('\n');
    expect(lines.filter(line => line.includes(' [label='))).toEqual([
      '    "A" [label="{«class»\\nA}", style="filled", fillcolor="#E8F4FD"];',
      '    "B" [label="{«class»\\nB}", style="filled", fillcolor="#E8F4FD"];',
    ]);
    expect(lines.filter(line => line.includes(' -> '))).toEqual(['    "A" -> "B" [arrowhead=empty, style=solid];']);
  });
});

describe('escapeDotLabel', () => {
  it('should escape record syntax and quotes', () => {
    expect(escapeDotLabel('A<B> | "x"')).toBe('A\\<B\\> \\| \\"x\\"');
    expect(escapeDotLabel('{x}')).toBe('\\{x\\}');
  });

  it('should escape backslashes before anything else', () => {
    expect(escapeDotLabel('a\\b')).toBe('a\\\\b');
    expect(escapeDotLabel('line\nnext\tcell')).toBe('line\\nnext\\tcell');
  });
});
