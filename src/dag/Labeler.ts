/**
 * Sethi-Ullman labeling
 *
 * label(n) is the number of registers needed to evaluate n when the heavier
 * operand is always evaluated first. Leaves that sit in the left operand slot
 * must be loaded into a register (label 1); right-hand leaves are read from
 * memory by the instruction itself (label 0).
 */

import { DAG } from './DAG.js';
import { DAGNode, isLeaf } from './DAGNode.js';

/**
 * Label every node in place, in one ascending pass over the arena
 */
export function labelDAG(dag: DAG): DAG {
  const labeled = new Set<number>();

  for (const node of dag.allNodes()) {
    if (node.kind !== 'operation') {
      continue;
    }

    // Leaves take their label from the first parent that reaches them
    node.operands.forEach((operandId, slot) => {
      const operand = dag.get(operandId);
      if (isLeaf(operand) && !labeled.has(operandId)) {
        operand.label = slot === 0 ? 1 : 0;
        labeled.add(operandId);
      }
    });

    node.label = operationLabel(node.operands.map(id => dag.get(id)));
  }

  const root = dag.rootNode;
  if (isLeaf(root)) {
    root.label = 1;
  }

  return dag;
}

/**
 * Combine operand labels: max when they differ, one more when they tie
 */
export function combineLabels(left: number, right: number): number {
  return left === right ? left + 1 : Math.max(left, right);
}

function operationLabel(operands: DAGNode[]): number {
  if (operands.length === 1) {
    return Math.max(1, operands[0].label);
  }
  return combineLabels(operands[0].label, operands[1].label);
}
