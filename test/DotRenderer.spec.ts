import { DotRenderer } from '../src/render/DotRenderer';
import { Value } from '../src/Value';

describe('DotRenderer', () => {
  it('renders values, operations and edges', () => {
    const x = new Value(2, 'x');
    const y = new Value(3, 'y');
    const z = x.mul(y);
    z.backward();

    expect(new DotRenderer().render(z).split('\n')).toEqual([
      'digraph G {',
      '  bgcolor="white";',
      '  node [shape=record, style=filled, fontname="Helvetica", fontsize=12];',
      '  n0 [label="<v> x|<g> grad=3", fillcolor="#d9ed92"];',
      '  n1 [label="<v> y|<g> grad=2", fillcolor="#d9ed92"];',
      '  n2 [label="<v> value=6|<g> grad=1", fillcolor="#8ecae6"];',
      '  op_n2 [label="*", shape=circle, fillcolor="#ffb703", fontsize=16, fontcolor="black"];',
      '  op_n2 -> n2 [color="#ffb703", penwidth=2];',
      '  n0 -> op_n2 [color="#219ebc", penwidth=2];',
      '  n1 -> op_n2 [color="#219ebc", penwidth=2];',
      '}',
    ]);
  });

  it('draws one edge per operand slot for a repeated operand', () => {
    const x = new Value(3, 'x');
    const dot = new DotRenderer().render(x.mul(x));
    const operandEdges = dot.split('\n').filter(line => line.includes('-> op_n1'));
    expect(operandEdges).toEqual([
      '  n0 -> op_n1 [color="#219ebc", penwidth=2];',
      '  n0 -> op_n1 [color="#219ebc", penwidth=2];',
    ]);
  });

  it('escapes record metacharacters in labels', () => {
    const v = new Value(1, 'a|b<c>');
    expect(new DotRenderer().render(v)).toContain('  n0 [label="<v> a\\|b\\<c\\>|<g> grad=0", fillcolor="#d9ed92"];');
  });

  it('honours precision and graph name', () => {
    const third = new Value(1).div(3);
    const lines = new DotRenderer({ precision: 2, graphName: 'Third' }).render(third).split('\n');
    expect(lines[0]).toBe('digraph Third {');
    expect(lines).toContain('  n2 [label="<v> value=0.33|<g> grad=0", fillcolor="#8ecae6"];');
  });

  it('quotes graph names that are not plain identifiers', () => {
    const v = new Value(1);
    expect(new DotRenderer({ graphName: 'my graph-1' }).render(v).split('\n')[0]).toBe('digraph "my graph-1" {');
    expect(new DotRenderer({ graphName: 'say "hi"' }).render(v).split('\n')[0]).toBe('digraph "say \\"hi\\"" {');
  });
});
