/**
 * Syntax tree of the expression language.
 * @internal
 */

import type { BinaryOpKind, UnaryOpKind } from '../Operations';

export interface NumberNode {
  type: 'Number';
  value: number;
}

export interface VariableNode {
  type: 'Variable';
  name: string;
  pos: number;
}

/**
 * Unary minus, or a call such as sin(x); both map onto a unary operation.
 */
export interface UnaryNode {
  type: 'Unary';
  op: UnaryOpKind;
  operand: Expr;
}

export interface BinaryNode {
  type: 'Binary';
  op: BinaryOpKind;
  left: Expr;
  right: Expr;
}

export type Expr = NumberNode | VariableNode | UnaryNode | BinaryNode;

export interface Statement {
  /** Name bound by `name = expression`, if any. */
  target?: string;
  expression: Expr;
}

export interface Program {
  statements: Statement[];
}
