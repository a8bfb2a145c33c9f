/**
 * Algebraic rearrangement to lower register pressure
 *
 * Only + and * are rewritten: a commutative swap at the top of a chain, and
 * regrouping of a maximal same-operator chain into a few fixed shapes. Each
 * node is visited once, so the search is linear in the DAG size; it is a
 * heuristic and does not enumerate every equivalent expression. - / ^ and
 * unary minus keep their operand order.
 *
 * The winning expression is rebuilt into a new arena and relabeled. Unless its
 * root label is strictly lower, a copy of the input is returned instead.
 */

import { Expression, BinaryOperator, expressionToString, makeBinaryOp, makeNegation } from '../expr/AST.js';
import { DAG, copyDAG } from './DAG.js';
import { NodeId, isCommutative } from './DAGNode.js';
import { addExpression, buildDAG, dagToExpression } from './Builder.js';
import { combineLabels, labelDAG } from './Labeler.js';

export interface RearrangeOptions {
  /** Nodes deeper than this keep their shape (default: 64) */
  maxDepth?: number;

  /** Longer chains only try the original, swapped and sorted shapes (default: 8) */
  maxChainLength?: number;

  /** Print chosen rewrites */
  verbose?: boolean;
}

export interface RearrangeStats {
  improved: boolean;
  originalLabel: number;
  rearrangedLabel: number;
  nodesVisited: number;
  rewrites: number;
}

export interface RearrangeResult {
  dag: DAG;
  expression: Expression;
  stats: RearrangeStats;
}

type ShapeName =
  | 'original'
  | 'swapped'
  | 'left-skewed'
  | 'sorted'
  | 'balanced'
  | 'right-skewed';

/**
 * An expression together with its estimated label
 */
interface Candidate {
  expr: Expression;
  label: number;
  leaf: boolean;
}

interface SearchContext {
  dag: DAG;
  maxDepth: number;
  maxChainLength: number;
  verbose: boolean;
  memo: Map<NodeId, Candidate>;
  stats: RearrangeStats;
}

export function rearrangeDAG(dag: DAG, options: RearrangeOptions = {}): RearrangeResult {
  const {
    maxDepth = 64,
    maxChainLength = 8,
    verbose = false
  } = options;

  const baseline = labelDAG(copyDAG(dag));
  const originalLabel = baseline.rootNode.label;

  const ctx: SearchContext = {
    dag: baseline,
    maxDepth,
    maxChainLength,
    verbose,
    memo: new Map(),
    stats: {
      improved: false,
      originalLabel,
      rearrangedLabel: originalLabel,
      nodesVisited: 0,
      rewrites: 0
    }
  };

  const best = rewrite(ctx, baseline.root, 0);
  const candidate = labelDAG(buildDAG(best.expr));
  const candidateLabel = candidate.rootNode.label;

  if (candidateLabel < originalLabel) {
    ctx.stats.improved = true;
    ctx.stats.rearrangedLabel = candidateLabel;
    if (verbose) {
      console.log(`[rearrange] ${expressionToString(best.expr)}: label ${originalLabel} -> ${candidateLabel}`);
    }
    return { dag: candidate, expression: best.expr, stats: ctx.stats };
  }

  if (verbose) {
    console.log(`[rearrange] No improvement over label ${originalLabel}, keeping original`);
  }
  return { dag: baseline, expression: dagToExpression(baseline), stats: ctx.stats };
}

function rewrite(ctx: SearchContext, id: NodeId, depth: number): Candidate {
  const cached = ctx.memo.get(id);
  if (cached) {
    return cached;
  }
  ctx.stats.nodesVisited++;

  const node = ctx.dag.get(id);
  let result: Candidate;

  if (node.kind !== 'operation') {
    result = { expr: dagToExpression(ctx.dag, id), label: 1, leaf: true };
  } else if (node.operator === 'neg') {
    const operand = rewrite(ctx, node.operands[0], depth + 1);
    result = {
      expr: makeNegation(operand.expr),
      label: Math.max(1, operand.label),
      leaf: false
    };
  } else if (!isCommutative(node.operator) || depth > ctx.maxDepth) {
    const left = rewrite(ctx, node.operands[0], depth + 1);
    const right = rewrite(ctx, node.operands[1], depth + 1);
    result = combine(node.operator, left, right);
  } else {
    result = regroupChain(ctx, id, node.operator, depth);
  }

  ctx.memo.set(id, result);
  return result;
}

/**
 * Try the fixed set of shapes for the chain rooted at `id` and keep the best
 */
function regroupChain(
  ctx: SearchContext,
  id: NodeId,
  operator: BinaryOperator,
  depth: number
): Candidate {
  const operandIds = flattenChain(ctx.dag, id, operator);
  const operands = new Map<NodeId, Candidate>();
  for (const operandId of operandIds) {
    operands.set(operandId, rewrite(ctx, operandId, depth + 1));
  }
  const list = operandIds.map(operandId => lookup(operands, operandId));

  const original = rebuildOriginal(ctx.dag, id, operator, operands);
  const shapes: [ShapeName, Candidate][] = [['original', original]];

  const node = ctx.dag.get(id);
  if (node.kind === 'operation') {
    const [leftId, rightId] = node.operands;
    shapes.push(['swapped', combine(
      operator,
      rebuildOriginal(ctx.dag, rightId, operator, operands),
      rebuildOriginal(ctx.dag, leftId, operator, operands)
    )]);
  }

  if (list.length <= ctx.maxChainLength) {
    shapes.push(['left-skewed', leftSkewed(operator, list)]);
    shapes.push(['sorted', leftSkewed(operator, sortHeaviestFirst(list))]);
    shapes.push(['balanced', balanced(operator, list)]);
    shapes.push(['right-skewed', rightSkewed(operator, list)]);
  } else {
    shapes.push(['sorted', leftSkewed(operator, sortHeaviestFirst(list))]);
  }

  // Lowest label, then fewest distinct nodes, then the earliest shape
  let [bestName, best] = shapes[0];
  let bestNodes: number | undefined;
  for (const [name, shape] of shapes.slice(1)) {
    if (shape.label > best.label) {
      continue;
    }
    if (shape.label === best.label) {
      bestNodes ??= distinctNodeCount(best.expr);
      const nodes = distinctNodeCount(shape.expr);
      if (nodes >= bestNodes) {
        continue;
      }
      bestNodes = nodes;
    } else {
      bestNodes = undefined;
    }
    bestName = name;
    best = shape;
  }

  if (bestName !== 'original') {
    ctx.stats.rewrites++;
    if (ctx.verbose) {
      console.log(`[rearrange] n${id}: ${bestName} shape, label ${original.label} -> ${best.label}`);
    }
  }

  return best;
}

/**
 * Operand ids of the maximal `operator` chain under `id`, left to right.
 * Shared inner nodes are kept whole so common subexpressions survive.
 */
function flattenChain(dag: DAG, id: NodeId, operator: BinaryOperator): NodeId[] {
  const node = dag.get(id);
  if (node.kind !== 'operation') {
    return [id];
  }

  const result: NodeId[] = [];
  for (const operandId of node.operands) {
    if (isChainLink(dag, operandId, operator)) {
      result.push(...flattenChain(dag, operandId, operator));
    } else {
      result.push(operandId);
    }
  }
  return result;
}

function isChainLink(dag: DAG, id: NodeId, operator: BinaryOperator): boolean {
  const node = dag.get(id);
  return node.kind === 'operation' && node.operator === operator && node.parentCount === 1;
}

/**
 * The chain in its existing bracketing, with rewritten operands
 */
function rebuildOriginal(
  dag: DAG,
  id: NodeId,
  operator: BinaryOperator,
  operands: Map<NodeId, Candidate>
): Candidate {
  const leaf = operands.get(id);
  if (leaf) {
    return leaf;
  }
  const node = dag.get(id);
  if (node.kind !== 'operation' || node.operands.length !== 2) {
    throw new Error(`n${id} is not part of the ${operator} chain`);
  }
  return combine(
    operator,
    rebuildOriginal(dag, node.operands[0], operator, operands),
    rebuildOriginal(dag, node.operands[1], operator, operands)
  );
}

function leftSkewed(operator: BinaryOperator, list: Candidate[]): Candidate {
  return list.slice(1).reduce((acc, next) => combine(operator, acc, next), list[0]);
}

function rightSkewed(operator: BinaryOperator, list: Candidate[]): Candidate {
  return list.slice(0, -1).reduceRight((acc, prev) => combine(operator, prev, acc), list[list.length - 1]);
}

function balanced(operator: BinaryOperator, list: Candidate[]): Candidate {
  if (list.length === 1) {
    return list[0];
  }
  const mid = Math.ceil(list.length / 2);
  return combine(operator, balanced(operator, list.slice(0, mid)), balanced(operator, list.slice(mid)));
}

/**
 * Heaviest operands first, leaves last; stable for equal weights
 */
function sortHeaviestFirst(list: Candidate[]): Candidate[] {
  return list
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => weight(b.candidate) - weight(a.candidate) || a.index - b.index)
    .map(entry => entry.candidate);
}

function weight(candidate: Candidate): number {
  return candidate.leaf ? 0 : candidate.label;
}

/**
 * Label of a candidate placed in an operand slot: leaves need a register
 * only on the left
 */
function slotLabel(candidate: Candidate, slot: 0 | 1): number {
  if (candidate.leaf) {
    return slot === 0 ? 1 : 0;
  }
  return candidate.label;
}

function combine(operator: BinaryOperator, left: Candidate, right: Candidate): Candidate {
  return {
    expr: makeBinaryOp(operator, left.expr, right.expr),
    label: combineLabels(slotLabel(left, 0), slotLabel(right, 1)),
    leaf: false
  };
}

/**
 * Number of nodes the expression occupies once common subexpressions are shared
 */
function distinctNodeCount(expr: Expression): number {
  const scratch = new DAG();
  addExpression(scratch, expr);
  return scratch.size;
}

function lookup(operands: Map<NodeId, Candidate>, id: NodeId): Candidate {
  const candidate = operands.get(id);
  if (!candidate) {
    throw new Error(`Missing rewrite for n${id}`);
  }
  return candidate;
}
