import { Value } from './Value';
import type { Operand } from './Value';

/**
 * Free-function form of every Value operation. Either operand of a binary
 * operation may be a plain number, so `V.sub(1, x)` and `V.pow(2, x)` work
 * where the method form would need the Value on the left.
 * @public
 */
export class V {
  /**
   * Leaf node holding x.
   */
  static of(x: number, label?: string): Value {
    return new Value(x, label);
  }

  static add(a: Operand, b: Operand): Value {
    return Value.make('add', [Value.from(a), Value.from(b)]);
  }

  static sub(a: Operand, b: Operand): Value {
    return Value.make('sub', [Value.from(a), Value.from(b)]);
  }

  static mul(a: Operand, b: Operand): Value {
    return Value.make('mul', [Value.from(a), Value.from(b)]);
  }

  static div(a: Operand, b: Operand): Value {
    return Value.make('div', [Value.from(a), Value.from(b)]);
  }

  static pow(base: Operand, exponent: Operand): Value {
    return Value.make('pow', [Value.from(base), Value.from(exponent)]);
  }

  static neg(x: Operand): Value {
    return Value.make('neg', [Value.from(x)]);
  }

  static exp(x: Operand): Value {
    return Value.make('exp', [Value.from(x)]);
  }

  static log(x: Operand): Value {
    return Value.make('log', [Value.from(x)]);
  }

  static sin(x: Operand): Value {
    return Value.make('sin', [Value.from(x)]);
  }

  static cos(x: Operand): Value {
    return Value.make('cos', [Value.from(x)]);
  }

  static tan(x: Operand): Value {
    return Value.make('tan', [Value.from(x)]);
  }

  static cot(x: Operand): Value {
    return Value.make('cot', [Value.from(x)]);
  }

  static sinh(x: Operand): Value {
    return Value.make('sinh', [Value.from(x)]);
  }

  static cosh(x: Operand): Value {
    return Value.make('cosh', [Value.from(x)]);
  }

  static tanh(x: Operand): Value {
    return Value.make('tanh', [Value.from(x)]);
  }

  static coth(x: Operand): Value {
    return Value.make('coth', [Value.from(x)]);
  }
}
