import { CliError, EXIT_EVALUATION, EXIT_USAGE, exitCodeFor } from '../src/cli/cli-error';
import { evalArgsSchema, formatOps, formatReport, parseBindings, runEval } from '../src/cli/run';
import { DomainError, ParseError } from '../src/Errors';

describe('parseBindings', () => {
  it('reads repeated and comma-separated pairs in order', () => {
    expect([...parseBindings(['x=2', 'y=3'])]).toEqual([['x', 2], ['y', 3]]);
    expect([...parseBindings(['b=-1.5, a=1e2'])]).toEqual([['b', -1.5], ['a', 100]]);
    expect(parseBindings([]).size).toBe(0);
  });

  it('rejects malformed bindings', () => {
    expect(() => parseBindings(['x'])).toThrow('Expected name=value, got \'x\'');
    expect(() => parseBindings(['=3'])).toThrow(CliError);
    expect(() => parseBindings(['x=abc'])).toThrow(/^Invalid binding 'x=abc'/);
    expect(() => parseBindings(['x='])).toThrow('Invalid binding \'x=\': value is empty');
    expect(() => parseBindings(['1x=2'])).toThrow('Invalid binding \'1x=2\': name must be an identifier');
    expect(() => parseBindings(['x=1', 'x=2'])).toThrow('Duplicate binding for \'x\'');
  });
});

describe('runEval', () => {
  it('reports the value and the gradient of every binding', () => {
    const report = runEval(evalArgsSchema.parse({ expression: 'x*y + x', at: ['x=2,y=3'] }));

    expect(report.value).toBe(8);
    expect(report.gradients).toEqual([
      { name: 'x', value: 2, grad: 4 },
      { name: 'y', value: 3, grad: 2 },
    ]);
    expect(report.nodeCount).toBe(4);
    expect(report.check).toBeUndefined();
    expect(report.dot).toBeUndefined();

    expect(formatReport(report)).toEqual([
      'x*y + x = 8',
      '  d/dx = 4',
      '  d/dy = 2',
      '[graph] 4 nodes',
    ]);
  });

  it('reports zero for bindings the expression does not use', () => {
    const report = runEval(evalArgsSchema.parse({ expression: 'x * 3', at: ['x=1', 'unused=5'] }));
    expect(report.gradients[1]).toEqual({ name: 'unused', value: 5, grad: 0 });
  });

  it('runs a gradient check and renders DOT on request', () => {
    const report = runEval(evalArgsSchema.parse({
      expression: 'z = x*y; w = z + x; tanh(w / 10) ** 2',
      at: ['x=0.5', 'y=-1.25'],
      check: true,
      dot: 'graph.dot',
    }));

    expect(report.check?.passed).toBe(true);
    expect(report.check?.entries.map(e => e.label)).toEqual(['x', 'y']);
    expect(report.dot?.split('\n')[0]).toBe('digraph G {');
    expect(report.dot).toContain('<v> z|<g> grad=');
    expect(formatReport(report)[4]).toMatch(/^\[check\] ✓ gradients: 2 gradients verified \(max error: /);
  });

  it('keeps the report when a check point falls outside the domain', () => {
    const report = runEval(evalArgsSchema.parse({ expression: 'log(x)', at: ['x=5e-7'], check: true }));

    expect(report.value).toBe(Math.log(5e-7));
    expect(report.gradients[0].grad).toBeCloseTo(2e6, 3);
    expect(report.check?.passed).toBe(true);
    expect(report.check?.entries[0].notComputable).toMatch(/^Logarithm undefined/);
    expect(formatReport(report)[3]).toMatch(
      /^\[check\] ✓ gradients: 0 gradients verified \(max error: 0\.00e\+0\)\n  x: not computable \(/
    );
  });

  it('rejects an empty expression', () => {
    expect(() => evalArgsSchema.parse({ expression: '   ' })).toThrow('expression is required');
  });

  it('surfaces parse and domain errors', () => {
    expect(() => runEval(evalArgsSchema.parse({ expression: 'log(x)', at: ['x=-1'] }))).toThrow(DomainError);
    expect(() => runEval(evalArgsSchema.parse({ expression: 'x +' }))).toThrow(ParseError);
  });
});

describe('exitCodeFor', () => {
  it('maps errors to process exit codes', () => {
    expect(exitCodeFor(new CliError('bad flag'))).toBe(EXIT_USAGE);
    expect(exitCodeFor(new CliError('custom', 7))).toBe(7);
    expect(exitCodeFor(new DomainError('log of -1', 'log', [-1]))).toBe(EXIT_EVALUATION);
    expect(exitCodeFor(new Error('other'))).toBe(EXIT_USAGE);
  });
});

describe('formatOps', () => {
  it('lists every operation with symbol and arity', () => {
    const lines = formatOps();
    expect(lines).toHaveLength(16);
    expect(lines[0]).toBe('add   +     arity 2');
    expect(lines).toContain('coth  coth  arity 1');
  });
});
