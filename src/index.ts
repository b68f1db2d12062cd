export { Value } from './Value';
export type { BackwardOptions, Operand, ValueDisplay } from './Value';
export { V } from './V';
export {
  AutogradError,
  ArityError,
  DomainError,
  ParseError,
  TypeCoercionError,
  UnboundVariableError,
} from './Errors';
export {
  BINARY_OPS,
  OP_KINDS,
  UNARY_OPS,
  backward,
  forward,
  isOpKind,
  isUnaryOp,
  opArity,
  opSymbol,
} from './Operations';
export type { BinaryOpKind, OpKind, UnaryOpKind } from './Operations';
export { collectNodes, topologicalOrder, walkGraph } from './Graph';
export type { GraphEdge, GraphNode, GraphRenderer, GraphWalk } from './Graph';
export { checkGradients, formatGradCheckResult, gradientError, numericalGradient, partialDerivative } from './GradCheck';
export type { GradCheckEntry, GradCheckOptions, GradCheckResult } from './GradCheck';
export { DotRenderer } from './render/DotRenderer';
export type { DotRendererOptions } from './render/DotRenderer';

// Expression language
export { parse, Parser } from './expr/Parser';
export { evaluate, evaluateSource } from './expr/Evaluate';
export type { Evaluation } from './expr/Evaluate';
export type { BinaryNode, Expr, NumberNode, Program, Statement, UnaryNode, VariableNode } from './expr/AST';
