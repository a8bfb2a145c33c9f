/**
 * AST -> DAG conversion
 *
 * Post-order: operands first, then the node is looked up or inserted by its
 * structural key, so repeated subexpressions map onto one shared node.
 */

import { Expression, makeBinaryOp, makeNegation, makeNumber, makeVariable } from '../expr/AST.js';
import { DAG } from './DAG.js';
import { NodeId } from './DAGNode.js';

/**
 * Build a DAG for an expression; the returned DAG is unlabeled
 */
export function buildDAG(expr: Expression): DAG {
  const dag = new DAG();
  dag.root = addExpression(dag, expr);
  return dag;
}

/**
 * Add an expression to an existing arena, returning its node id
 */
export function addExpression(dag: DAG, expr: Expression): NodeId {
  switch (expr.kind) {
    case 'number':
      return dag.add({ kind: 'constant', value: normalizeZero(expr.value) });

    case 'variable':
      return dag.add({ kind: 'variable', name: expr.name });

    case 'binary': {
      const left = addExpression(dag, expr.left);
      const right = addExpression(dag, expr.right);
      return dag.add({ kind: 'operation', operator: expr.operator, operands: [left, right] });
    }

    case 'unary': {
      // Fold -<literal> into a negative constant
      if (expr.operand.kind === 'number') {
        return dag.add({ kind: 'constant', value: normalizeZero(-expr.operand.value) });
      }
      const operand = addExpression(dag, expr.operand);
      return dag.add({ kind: 'operation', operator: 'neg', operands: [operand] });
    }
  }
}

/**
 * DAG -> AST conversion. Shared nodes map to the same expression object.
 */
export function dagToExpression(dag: DAG, id: NodeId = dag.root): Expression {
  const memo = new Map<NodeId, Expression>();

  const convert = (nodeId: NodeId): Expression => {
    const cached = memo.get(nodeId);
    if (cached) {
      return cached;
    }

    const node = dag.get(nodeId);
    let expr: Expression;
    switch (node.kind) {
      case 'variable':
        expr = makeVariable(node.name);
        break;
      case 'constant':
        expr = makeNumber(node.value);
        break;
      case 'operation':
        expr = node.operator === 'neg'
          ? makeNegation(convert(node.operands[0]))
          : makeBinaryOp(node.operator, convert(node.operands[0]), convert(node.operands[1]));
        break;
    }

    memo.set(nodeId, expr);
    return expr;
  };

  return convert(id);
}

// -0 and 0 are one constant
function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}
