import { UnboundVariableError } from '../Errors';
import { Value } from '../Value';
import type { Operand } from '../Value';
import type { Expr, Program } from './AST';
import { parse } from './Parser';

const CONSTANTS: ReadonlyMap<string, number> = new Map([
  ['pi', Math.PI],
  ['e', Math.E],
]);

export interface Evaluation {
  /** Node produced by the last statement. */
  output: Value;
  /** Bindings and assignment targets, by name. */
  variables: Map<string, Value>;
}

/**
 * Builds the Value graph of a parsed program.
 *
 * Numeric bindings become leaves labelled with their name; Value bindings are used
 * as they are. Each assignment binds its target and labels the assigned node with
 * the target name unless it already has a label.
 */
export function evaluate(program: Program, bindings: Readonly<Record<string, Operand>> = {}): Evaluation {
  const variables = new Map<string, Value>();
  for (const [name, operand] of Object.entries(bindings)) {
    variables.set(name, typeof operand === 'number' ? new Value(operand, name) : operand);
  }

  let output: Value | undefined;
  for (const statement of program.statements) {
    const node = build(statement.expression, variables);
    if (statement.target !== undefined) {
      if (node.label === undefined) node.label = statement.target;
      variables.set(statement.target, node);
    }
    output = node;
  }

  if (output === undefined) {
    throw new Error('Program has no statements');
  }
  return { output, variables };
}

/**
 * Parses and evaluates source in one step.
 */
export function evaluateSource(source: string, bindings: Readonly<Record<string, Operand>> = {}): Evaluation {
  return evaluate(parse(source), bindings);
}

/**
 * Post-order walk on an explicit stack: long left-associated chains such as
 * `1 + 1 + ... + 1` nest as deeply as they are long.
 * Operands are built left to right.
 */
function build(root: Expr, variables: Map<string, Value>): Value {
  const results: Value[] = [];
  const stack: Array<{ expr: Expr; ready: boolean }> = [{ expr: root, ready: false }];
  const take = (): Value => {
    const value = results.pop();
    if (value === undefined) throw new Error('Operand stack underflow');
    return value;
  };

  let frame = stack.pop();
  while (frame !== undefined) {
    const { expr, ready } = frame;
    switch (expr.type) {
      case 'Number':
        results.push(new Value(expr.value));
        break;
      case 'Variable':
        results.push(lookup(expr.name, variables));
        break;
      case 'Unary':
        if (ready) {
          results.push(Value.make(expr.op, [take()]));
        } else {
          stack.push({ expr, ready: true }, { expr: expr.operand, ready: false });
        }
        break;
      case 'Binary':
        if (ready) {
          const right = take();
          const left = take();
          results.push(Value.make(expr.op, [left, right]));
        } else {
          stack.push({ expr, ready: true }, { expr: expr.right, ready: false }, { expr: expr.left, ready: false });
        }
        break;
    }
    frame = stack.pop();
  }

  return take();
}

function lookup(name: string, variables: Map<string, Value>): Value {
  const bound = variables.get(name);
  if (bound !== undefined) return bound;
  const constant = CONSTANTS.get(name);
  if (constant !== undefined) return new Value(constant, name);
  throw new UnboundVariableError(name);
}
