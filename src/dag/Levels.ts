/**
 * Node levels: length of the longest path from a leaf up to each node.
 * Leaves sit at level 0; an operation is one above its highest operand.
 */

import { DAG } from './DAG.js';
import { NodeId, nodeChildren } from './DAGNode.js';

export function nodeLevels(dag: DAG): Map<NodeId, number> {
  const levels = new Map<NodeId, number>();

  // Arena order puts every operand before its parents
  for (const node of dag.allNodes()) {
    const operandLevels = nodeChildren(node).map(id => levels.get(id) ?? 0);
    levels.set(node.id, operandLevels.length === 0 ? 0 : Math.max(...operandLevels) + 1);
  }

  return levels;
}
