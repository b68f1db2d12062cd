import { TypeCoercionError } from './Errors';
import { collectNodes, topologicalOrder } from './Graph';
import { backward as backwardRule, forward, opSymbol } from './Operations';
import type { OpKind } from './Operations';

/**
 * Anything a Value operation accepts as an operand.
 * @public
 */
export type Operand = Value | number;

/**
 * Options for {@link Value.backward}.
 * @public
 */
export interface BackwardOptions {
  /**
   * Called for every node in processing order (root first), right after the
   * node's gradient contributions have been added to its operands.
   */
  onNodeVisited?: (node: Value) => void;
}

/**
 * Display form of a node for diagnostics and renderers.
 * @public
 */
export interface ValueDisplay {
  value: number;
  grad: number;
  op?: string;
  label?: string;
}

/**
 * Converts a literal to a number.
 * Accepts numbers (NaN and infinities included), bigints and strings that
 * parse completely as a number.
 */
function toNumber(x: unknown): number {
  if (typeof x === 'number') return x;
  if (typeof x === 'bigint') return Number(x);
  if (typeof x === 'string' && x.trim() !== '') {
    const n = Number(x);
    if (!Number.isNaN(n)) return n;
  }
  throw new TypeCoercionError(x);
}

/**
 * Represents a scalar value in the computational graph for automatic differentiation.
 * Supports eager forward computation and reverse-mode autodiff (backpropagation).
 *
 * Only `grad` and `label` change after construction. `grad` is shared mutable
 * state: backward passes over graphs that share nodes must not overlap.
 * @public
 */
export class Value {
  /**
   * The numeric value stored in this node.
   * @public
   */
  readonly value: number;

  /**
   * The gradient of the last backward root with respect to this value.
   * @public
   */
  grad: number = 0;

  /**
   * Optional label for debugging and visualization.
   * @public
   */
  label?: string;

  private _op?: OpKind;
  private _prev: readonly Value[] = [];

  constructor(value: number, label?: string) {
    if (typeof value !== 'number') {
      throw new TypeCoercionError(value);
    }
    this.value = value;
    this.label = label;
  }

  /**
   * The operation that produced this node, or undefined for a leaf.
   */
  get op(): OpKind | undefined {
    return this._op;
  }

  /**
   * Operand nodes, in operand order.
   */
  get prev(): readonly Value[] {
    return this._prev;
  }

  /**
   * True for independent variables and wrapped constants.
   */
  get isLeaf(): boolean {
    return this._op === undefined;
  }

  /**
   * The single literal coercion entry point: returns x itself when it is a Value,
   * otherwise a fresh leaf holding its numeric value.
   * @throws TypeCoercionError when x is not numeric
   */
  static from(x: unknown, label?: string): Value {
    if (x instanceof Value) return x;
    return new Value(toNumber(x), label);
  }

  /**
   * Builds the node produced by applying op to operands.
   * The forward rule runs first, so a domain failure produces no node.
   * @param op Operation kind
   * @param operands Operand nodes, as many as the operation's arity
   * @returns New Value node
   */
  static make(op: OpKind, operands: readonly Value[]): Value {
    const out = new Value(forward(op, operands.map(o => o.value)));
    out._op = op;
    out._prev = [...operands];
    return out;
  }

  /**
   * Adds this and other.
   * @param other Value or number to add
   * @returns New Value with sum.
   */
  add(other: Operand): Value {
    return Value.make('add', [this, Value.from(other)]);
  }

  /**
   * Subtracts other from this.
   * @param other Value or number to subtract
   * @returns New Value with difference.
   */
  sub(other: Operand): Value {
    return Value.make('sub', [this, Value.from(other)]);
  }

  /**
   * Multiplies this and other.
   * @param other Value or number to multiply
   * @returns New Value with product.
   */
  mul(other: Operand): Value {
    return Value.make('mul', [this, Value.from(other)]);
  }

  /**
   * Divides this by other.
   * @param other Value or number divisor
   * @returns New Value with quotient.
   */
  div(other: Operand): Value {
    return Value.make('div', [this, Value.from(other)]);
  }

  /**
   * Raises this to the power other. Both base and exponent receive gradients.
   * @param other Exponent Value or number
   * @returns New Value with pow(this, other)
   */
  pow(other: Operand): Value {
    return Value.make('pow', [this, Value.from(other)]);
  }

  /**
   * Returns the negation (-this) Value.
   */
  neg(): Value {
    return Value.make('neg', [this]);
  }

  /**
   * Returns exp(this).
   */
  exp(): Value {
    return Value.make('exp', [this]);
  }

  /**
   * Returns log(this), the natural logarithm.
   * @throws DomainError when this is not positive
   */
  log(): Value {
    return Value.make('log', [this]);
  }

  sin(): Value {
    return Value.make('sin', [this]);
  }

  cos(): Value {
    return Value.make('cos', [this]);
  }

  /**
   * Returns tan(this).
   * @throws DomainError at an asymptote
   */
  tan(): Value {
    return Value.make('tan', [this]);
  }

  /**
   * Returns cot(this) = 1 / tan(this).
   * @throws DomainError where tan(this) is zero
   */
  cot(): Value {
    return Value.make('cot', [this]);
  }

  sinh(): Value {
    return Value.make('sinh', [this]);
  }

  cosh(): Value {
    return Value.make('cosh', [this]);
  }

  tanh(): Value {
    return Value.make('tanh', [this]);
  }

  /**
   * Returns coth(this) = 1 / tanh(this).
   * @throws DomainError at zero
   */
  coth(): Value {
    return Value.make('coth', [this]);
  }

  /**
   * Performs a reverse-mode autodiff backward pass from this Value.
   * Zeroes the grad of every node reachable from this one, seeds this.grad = 1,
   * then accumulates each node's local gradients into its operands, consumers
   * before operands.
   */
  backward(options: BackwardOptions = {}): void {
    const topo = topologicalOrder<Value>(this);

    for (const node of topo) {
      node.grad = 0;
    }
    this.grad = 1;

    for (let i = topo.length - 1; i >= 0; i--) {
      const node = topo[i];
      if (node._op !== undefined && node._prev.length > 0) {
        const contributions = backwardRule(node._op, node.grad, node._prev.map(p => p.value));
        node._prev.forEach((operand, j) => {
          operand.grad += contributions[j];
        });
      }
      options.onNodeVisited?.(node);
    }
  }

  /**
   * Sets all grad fields in the computation tree (from root) to 0.
   * @param root Value to zero tree from
   */
  static zeroGradTree(root: Value): void {
    for (const node of topologicalOrder<Value>(root)) {
      node.grad = 0;
    }
  }

  /**
   * Sets all grad fields in all supplied trees to 0.
   * @param vals Values whose trees to zero
   */
  static zeroGradAll(vals: readonly Value[]): void {
    for (const node of collectNodes<Value>(vals)) {
      node.grad = 0;
    }
  }

  /**
   * Value, gradient, operation symbol and label of this node.
   */
  describe(): ValueDisplay {
    const display: ValueDisplay = { value: this.value, grad: this.grad };
    if (this._op !== undefined) display.op = opSymbol(this._op);
    if (this.label !== undefined) display.label = this.label;
    return display;
  }

  /**
   * Returns string representation for debugging.
   * @returns String summary of Value
   */
  toString(): string {
    const op = this._op !== undefined ? `, op=${opSymbol(this._op)}` : '';
    const label = this.label !== undefined ? `, label=${this.label}` : '';
    return `Value(value=${this.value.toFixed(4)}, grad=${this.grad.toFixed(4)}${op}${label})`;
  }
}
