/**
 * regdag - Sethi-Ullman register allocation for expression DAGs
 *
 * Parses an arithmetic expression, shares its common subexpressions in a DAG,
 * labels it with register needs, searches for a cheaper algebraic
 * rearrangement and emits register-allocated three-address code.
 */

// Core API
export {
  compile,
  compileExpression,
  EXAMPLE_EXPRESSION,
  MAX_EXPRESSION_DEPTH,
  type CompileOptions,
  type CompileResponse,
  type CompileSuccess,
  type CompileFailure,
  type CompiledExpression,
  type ResultHalf
} from './Compiler.js';
export { formatReport, type ReportOptions } from './Report.js';

// Front end
export { parse, MAX_NESTING_DEPTH } from './expr/Parser.js';
export { tokenize, TokenType, type Token } from './expr/Lexer.js';
export {
  expressionToString,
  expressionDepth,
  makeNumber,
  makeVariable,
  makeBinaryOp,
  makeNegation
} from './expr/AST.js';
export type {
  Expression,
  BinaryOperator,
  NumberLiteral,
  Variable,
  BinaryOp,
  UnaryOp
} from './expr/AST.js';

// Errors
export {
  ParseError,
  RegisterBudgetExceededError,
  EvaluationError,
  CodeGenError,
  ExpressionTooDeepError,
  InvalidOptionError,
  formatParseError
} from './expr/Errors.js';

// Back end
export * from './dag/index.js';
