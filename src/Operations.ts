import { ArityError, DomainError } from './Errors';

/**
 * Operation kinds taking a single input.
 * @public
 */
export const UNARY_OPS = [
  'neg', 'exp', 'log',
  'sin', 'cos', 'tan', 'cot',
  'sinh', 'cosh', 'tanh', 'coth',
] as const;

/**
 * Operation kinds taking two inputs.
 * @public
 */
export const BINARY_OPS = ['add', 'sub', 'mul', 'div', 'pow'] as const;

/**
 * Every supported operation kind.
 * @public
 */
export const OP_KINDS = [...BINARY_OPS, ...UNARY_OPS] as const;

export type UnaryOpKind = typeof UNARY_OPS[number];
export type BinaryOpKind = typeof BINARY_OPS[number];
export type OpKind = UnaryOpKind | BinaryOpKind;

interface UnaryRule {
  arity: 1;
  symbol: string;
  /** Returns a reason when `a` lies outside the function's domain. */
  domain?: (a: number) => string | undefined;
  forward: (a: number) => number;
  backward: (g: number, a: number) => [number];
}

interface BinaryRule {
  arity: 2;
  symbol: string;
  domain?: (a: number, b: number) => string | undefined;
  forward: (a: number, b: number) => number;
  backward: (g: number, a: number, b: number) => [number, number];
}

/** Periodic functions have no limit at ±Infinity. NaN is left to propagate. */
function infiniteInput(fn: string, a: number): string | undefined {
  return a === Infinity || a === -Infinity ? `${fn} undefined for infinite input: ${a}` : undefined;
}

const UNARY_RULES: { readonly [K in UnaryOpKind]: UnaryRule } = {
  neg: {
    arity: 1,
    symbol: 'neg',
    forward: a => -a,
    backward: g => [-g],
  },
  exp: {
    arity: 1,
    symbol: 'exp',
    forward: a => Math.exp(a),
    backward: (g, a) => [g * Math.exp(a)],
  },
  log: {
    arity: 1,
    symbol: 'log',
    domain: a => (a <= 0 ? `Logarithm undefined for non-positive value: ${a}` : undefined),
    forward: a => Math.log(a),
    backward: (g, a) => [g / a],
  },
  sin: {
    arity: 1,
    symbol: 'sin',
    domain: a => infiniteInput('Sine', a),
    forward: a => Math.sin(a),
    backward: (g, a) => [g * Math.cos(a)],
  },
  cos: {
    arity: 1,
    symbol: 'cos',
    domain: a => infiniteInput('Cosine', a),
    forward: a => Math.cos(a),
    backward: (g, a) => [-g * Math.sin(a)],
  },
  tan: {
    arity: 1,
    symbol: 'tan',
    domain: a => infiniteInput('Tangent', a)
      ?? (Math.cos(a) === 0 ? `Tangent undefined at asymptote: ${a}` : undefined),
    forward: a => Math.tan(a),
    backward: (g, a) => [g / (Math.cos(a) ** 2)],
  },
  cot: {
    arity: 1,
    symbol: 'cot',
    domain: a => infiniteInput('Cotangent', a)
      ?? (Math.tan(a) === 0 ? `Cotangent undefined where tan is zero: ${a}` : undefined),
    forward: a => 1 / Math.tan(a),
    backward: (g, a) => [-g / (Math.sin(a) ** 2)],
  },
  sinh: {
    arity: 1,
    symbol: 'sinh',
    forward: a => Math.sinh(a),
    backward: (g, a) => [g * Math.cosh(a)],
  },
  cosh: {
    arity: 1,
    symbol: 'cosh',
    forward: a => Math.cosh(a),
    backward: (g, a) => [g * Math.sinh(a)],
  },
  tanh: {
    arity: 1,
    symbol: 'tanh',
    forward: a => Math.tanh(a),
    backward: (g, a) => [g * (1 - Math.tanh(a) ** 2)],
  },
  coth: {
    arity: 1,
    symbol: 'coth',
    domain: a => (Math.tanh(a) === 0 ? `Hyperbolic cotangent undefined at zero: ${a}` : undefined),
    forward: a => 1 / Math.tanh(a),
    backward: (g, a) => [-g / (Math.sinh(a) ** 2)],
  },
};

const BINARY_RULES: { readonly [K in BinaryOpKind]: BinaryRule } = {
  add: {
    arity: 2,
    symbol: '+',
    forward: (a, b) => a + b,
    backward: g => [g, g],
  },
  sub: {
    arity: 2,
    symbol: '-',
    forward: (a, b) => a - b,
    backward: g => [g, -g],
  },
  mul: {
    arity: 2,
    symbol: '*',
    forward: (a, b) => a * b,
    backward: (g, a, b) => [g * b, g * a],
  },
  div: {
    arity: 2,
    symbol: '/',
    domain: (a, b) => (b === 0 ? `Division by zero: ${a} / ${b}` : undefined),
    forward: (a, b) => a / b,
    backward: (g, a, b) => [g / b, -g * a / (b * b)],
  },
  pow: {
    arity: 2,
    symbol: '**',
    domain: (a, b) => {
      if (a === 0 && b < 0) {
        return `0 cannot be raised to a negative power: ${b}`;
      }
      if (a < 0 && Number.isFinite(b) && !Number.isInteger(b)) {
        return `Cannot raise negative base (${a}) to non-integer exponent (${b})`;
      }
      return undefined;
    },
    forward: (a, b) => Math.pow(a, b),
    // d/da is 0 for a zero exponent (0**0 included) and +Infinity at a zero base
    // with 0 < b < 1. d/db is taken as 0 for a non-positive base, where ln(a) is undefined.
    backward: (g, a, b) => [
      b === 0 ? 0 : g * b * Math.pow(a, b - 1),
      a > 0 ? g * Math.pow(a, b) * Math.log(a) : 0,
    ],
  },
};

/**
 * Type guard for unary operation kinds.
 * @public
 */
export function isUnaryOp(kind: OpKind): kind is UnaryOpKind {
  return Object.prototype.hasOwnProperty.call(UNARY_RULES, kind);
}

/**
 * Type guard for names of supported operations.
 * @public
 */
export function isOpKind(name: string): name is OpKind {
  return (OP_KINDS as readonly string[]).includes(name);
}

/**
 * Number of inputs the operation takes.
 * @public
 */
export function opArity(kind: OpKind): 1 | 2 {
  return isUnaryOp(kind) ? 1 : 2;
}

/**
 * Short display symbol, e.g. '+', '**', 'sin'.
 * @public
 */
export function opSymbol(kind: OpKind): string {
  return isUnaryOp(kind) ? UNARY_RULES[kind].symbol : BINARY_RULES[kind].symbol;
}

function checkArity(kind: OpKind, inputs: readonly number[]): void {
  const expected = opArity(kind);
  if (inputs.length !== expected) {
    throw new ArityError(kind, expected, inputs.length);
  }
}

/**
 * Evaluates an operation on plain numbers.
 * @throws DomainError when the inputs fall outside the function's domain
 * @public
 */
export function forward(kind: OpKind, inputs: readonly number[]): number {
  checkArity(kind, inputs);
  if (isUnaryOp(kind)) {
    const rule = UNARY_RULES[kind];
    const [a] = inputs;
    const reason = rule.domain?.(a);
    if (reason !== undefined) throw new DomainError(reason, kind, inputs);
    return rule.forward(a);
  }
  const rule = BINARY_RULES[kind];
  const [a, b] = inputs;
  const reason = rule.domain?.(a, b);
  if (reason !== undefined) throw new DomainError(reason, kind, inputs);
  return rule.forward(a, b);
}

/**
 * Local gradient contributions for each input, in input order, given the
 * gradient flowing into the operation's output.
 * @public
 */
export function backward(kind: OpKind, outputGrad: number, inputs: readonly number[]): number[] {
  checkArity(kind, inputs);
  if (isUnaryOp(kind)) {
    const [a] = inputs;
    return UNARY_RULES[kind].backward(outputGrad, a);
  }
  const [a, b] = inputs;
  return BINARY_RULES[kind].backward(outputGrad, a, b);
}
