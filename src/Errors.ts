/**
 * Error types raised by graph construction, the expression language and the CLI.
 * @public
 */
export class AutogradError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A forward evaluation received an input outside the function's domain
 * (log of a non-positive number, an asymptote of tan/cot/coth, division by zero).
 * @public
 */
export class DomainError extends AutogradError {
  constructor(
    message: string,
    public readonly op: string,
    public readonly inputs: readonly number[]
  ) {
    super(message);
  }
}

/**
 * An operand is neither a Value nor convertible to a numeric literal.
 * @public
 */
export class TypeCoercionError extends AutogradError {
  constructor(public readonly received: unknown) {
    super(`Cannot convert ${describeReceived(received)} to a Value`);
  }
}

/**
 * An operation rule was invoked with the wrong number of inputs.
 * @public
 */
export class ArityError extends AutogradError {
  constructor(
    public readonly op: string,
    public readonly expected: number,
    public readonly received: number
  ) {
    super(`Operation '${op}' expects ${expected} input(s), got ${received}`);
  }
}

/**
 * Malformed expression source.
 * @public
 */
export class ParseError extends AutogradError {
  constructor(message: string, public readonly position: number) {
    super(`Parse error at ${position}: ${message}`);
  }
}

/**
 * An expression refers to a name that has no binding.
 * @public
 */
export class UnboundVariableError extends AutogradError {
  constructor(public readonly variable: string) {
    super(`Unbound variable: ${variable}`);
  }
}

function describeReceived(x: unknown): string {
  if (x === null) return 'null';
  if (typeof x === 'string') return `string '${x}'`;
  if (typeof x === 'object') return x.constructor?.name ?? 'object';
  return typeof x;
}
