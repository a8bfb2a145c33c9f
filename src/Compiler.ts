/**
 * Compiler facade: expression text in, original and rearranged result
 * bundles out. This is the whole surface a presentation layer talks to.
 */

import { Expression, expressionDepth, expressionToString } from './expr/AST.js';
import { parse } from './expr/Parser.js';
import {
  CodeGenError,
  ExpressionTooDeepError,
  InvalidOptionError,
  ParseError,
  RegisterBudgetExceededError
} from './expr/Errors.js';
import { DAG, copyDAG } from './dag/DAG.js';
import { buildDAG } from './dag/Builder.js';
import { labelDAG } from './dag/Labeler.js';
import { RearrangeStats, rearrangeDAG } from './dag/Rearranger.js';
import { CodeGenResult, generateCode } from './dag/CodeGen.js';
import { GraphView, toGraphView } from './dag/GraphView.js';
import { nodeLevels } from './dag/Levels.js';

/**
 * Demo fragment inlined into one expression:
 *   c = a + b; d = a * c; e = b + d; f = c - e
 */
export const EXAMPLE_EXPRESSION = '(a + b) - (b + a * (a + b))';

/**
 * Deepest expression tree the pipeline compiles
 */
export const MAX_EXPRESSION_DEPTH = 2000;

export interface CompileOptions {
  /** Fixed register budget; unbounded when omitted */
  registerBudget?: number;

  /** Search for a cheaper equivalent DAG (default: true) */
  rearrange?: boolean;

  /** Rearranger depth bound (default: 64) */
  maxDepth?: number;

  /** Rearranger chain length bound (default: 8) */
  maxChainLength?: number;

  /** Deepest accepted expression tree (default: MAX_EXPRESSION_DEPTH) */
  maxExpressionDepth?: number;

  /** Print pipeline progress */
  verbose?: boolean;
}

/**
 * One half of the response, for either the original or the rearranged DAG
 */
export interface ResultHalf {
  graph: GraphView;
  min_registers: number;
  three_address_code: string[];
  steps: string[];
  registers_used: number;
  register_allocation: Record<string, string>;
  /** Instruction indices [defined, last read] of every computed value */
  live_ranges: Record<string, [number, number]>;
  /** Longest path from a leaf to each node */
  node_levels: Record<string, number>;
}

export interface CompileSuccess {
  success: true;
  expression: string;
  original: ResultHalf;
  rearranged: ResultHalf;
}

export interface CompileFailure {
  success: false;
  error: string;
}

export type CompileResponse = CompileSuccess | CompileFailure;

/**
 * Full pipeline output before projection onto the wire schema
 */
export interface CompiledExpression {
  expression: Expression;
  original: { dag: DAG; codegen: CodeGenResult };
  rearranged: { dag: DAG; expression: Expression; codegen: CodeGenResult };
  stats?: RearrangeStats;
}

/**
 * Run the pipeline, throwing on malformed input or an exhausted budget
 */
export function compile(text: string, options: CompileOptions = {}): CompiledExpression {
  const {
    registerBudget,
    rearrange = true,
    maxDepth,
    maxChainLength,
    maxExpressionDepth = MAX_EXPRESSION_DEPTH,
    verbose = false
  } = options;

  const expression = parse(text);

  const depth = expressionDepth(expression);
  if (depth > maxExpressionDepth) {
    throw new ExpressionTooDeepError(depth, maxExpressionDepth);
  }
  const original = labelDAG(buildDAG(expression));

  if (verbose) {
    console.log(`[compile] ${expressionToString(expression)}: ${original.size} nodes, label ${original.rootNode.label}`);
  }

  let rearranged: DAG;
  let rearrangedExpression = expression;
  let stats: RearrangeStats | undefined;
  if (rearrange) {
    const result = rearrangeDAG(original, { maxDepth, maxChainLength, verbose });
    rearranged = result.dag;
    rearrangedExpression = result.expression;
    stats = result.stats;
  } else {
    rearranged = copyDAG(original);
  }

  return {
    expression,
    original: { dag: original, codegen: generateCode(original, { registerBudget, verbose }) },
    rearranged: {
      dag: rearranged,
      expression: rearrangedExpression,
      codegen: generateCode(rearranged, { registerBudget, verbose })
    },
    stats
  };
}

/**
 * Run the pipeline and project it onto the response schema. Errors become a
 * failure response; a partial bundle is never returned.
 */
export function compileExpression(text: string, options: CompileOptions = {}): CompileResponse {
  try {
    const compiled = compile(text, options);
    return {
      success: true,
      expression: expressionToString(compiled.expression),
      original: toResultHalf(compiled.original.dag, compiled.original.codegen),
      rearranged: toResultHalf(compiled.rearranged.dag, compiled.rearranged.codegen)
    };
  } catch (err) {
    if (
      err instanceof ParseError ||
      err instanceof RegisterBudgetExceededError ||
      err instanceof CodeGenError ||
      err instanceof ExpressionTooDeepError ||
      err instanceof InvalidOptionError
    ) {
      return { success: false, error: err.message };
    }
    throw err;
  }
}

function toResultHalf(dag: DAG, codegen: CodeGenResult): ResultHalf {
  const registerAllocation: Record<string, string> = {};
  for (const [id, register] of codegen.registerAllocation) {
    registerAllocation[`${id}`] = register;
  }

  const liveRanges: Record<string, [number, number]> = {};
  for (const [id, range] of codegen.liveRanges) {
    liveRanges[`${id}`] = [range.definedAt, range.lastUsedAt];
  }

  const levels: Record<string, number> = {};
  for (const [id, level] of nodeLevels(dag)) {
    levels[`${id}`] = level;
  }

  return {
    graph: toGraphView(dag),
    min_registers: codegen.minRegisters,
    three_address_code: codegen.code,
    steps: codegen.steps,
    registers_used: codegen.registersUsed,
    register_allocation: registerAllocation,
    live_ranges: liveRanges,
    node_levels: levels
  };
}
