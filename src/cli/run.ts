import { z } from 'zod';
import { checkGradients, formatGradCheckResult } from '../GradCheck';
import type { GradCheckResult } from '../GradCheck';
import { topologicalOrder } from '../Graph';
import { OP_KINDS, opArity, opSymbol } from '../Operations';
import { DotRenderer } from '../render/DotRenderer';
import { Value } from '../Value';
import { evaluate } from '../expr/Evaluate';
import { parse } from '../expr/Parser';
import { assert, CliError } from './cli-error';

export const evalArgsSchema = z.object({
  expression: z.string().trim().min(1, 'expression is required'),
  at: z.array(z.string()).default([]),
  check: z.boolean().default(false),
  dot: z.string().min(1, '--dot needs a file name').optional(),
  json: z.boolean().default(false),
});

export type EvalArgs = z.infer<typeof evalArgsSchema>;

const bindingSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'name must be an identifier'),
  value: z.string().trim().min(1, 'value is empty').pipe(z.coerce.number()),
});

export interface GradientLine {
  name: string;
  value: number;
  grad: number;
}

export interface EvalReport {
  expression: string;
  value: number;
  gradients: GradientLine[];
  nodeCount: number;
  check?: GradCheckResult;
  dot?: string;
}

/**
 * Parses `--at` entries (`name=value`, repeated or comma-separated), keeping
 * the order they were given in.
 */
export function parseBindings(entries: readonly string[]): Map<string, number> {
  const bindings = new Map<string, number>();
  for (const entry of entries.flatMap(e => e.split(','))) {
    if (entry.trim() === '') continue;
    const eq = entry.indexOf('=');
    assert(eq > 0, `Expected name=value, got '${entry}'`);

    const parsed = bindingSchema.safeParse({ name: entry.slice(0, eq).trim(), value: entry.slice(eq + 1) });
    if (!parsed.success) {
      throw new CliError(`Invalid binding '${entry}': ${parsed.error.issues[0].message}`);
    }
    assert(!bindings.has(parsed.data.name), `Duplicate binding for '${parsed.data.name}'`);
    bindings.set(parsed.data.name, parsed.data.value);
  }
  return bindings;
}

/**
 * Evaluates the expression at the given bindings, backpropagates from its
 * result and collects the gradient of every binding.
 */
export function runEval(args: EvalArgs): EvalReport {
  const bindings = parseBindings(args.at);
  const program = parse(args.expression);

  const names = [...bindings.keys()];
  const leaves = [...bindings].map(([name, value]) => new Value(value, name));
  const { output } = evaluate(program, Object.fromEntries(names.map((name, i): [string, Value] => [name, leaves[i]])));
  output.backward();

  const report: EvalReport = {
    expression: args.expression,
    value: output.value,
    gradients: leaves.map((leaf, i) => ({ name: names[i], value: leaf.value, grad: leaf.grad })),
    nodeCount: topologicalOrder<Value>(output).length,
  };

  if (args.check) {
    report.check = checkGradients(
      inputs => evaluate(program, Object.fromEntries(names.map((name, i): [string, Value] => [name, inputs[i]]))).output,
      leaves.map(leaf => leaf.value),
      { labels: names }
    );
  }
  if (args.dot !== undefined) {
    report.dot = new DotRenderer().render(output);
  }
  return report;
}

export function formatReport(report: EvalReport): string[] {
  const lines = [`${report.expression} = ${report.value}`];
  for (const g of report.gradients) {
    lines.push(`  d/d${g.name} = ${g.grad}`);
  }
  lines.push(`[graph] ${report.nodeCount} nodes`);
  if (report.check) {
    lines.push(`[check] ${formatGradCheckResult(report.check, 'gradients')}`);
  }
  return lines;
}

export function formatOps(): string[] {
  return OP_KINDS.map(kind => `${kind.padEnd(5)} ${opSymbol(kind).padEnd(5)} arity ${opArity(kind)}`);
}
