/**
 * Read-only projection of a DAG for rendering layers
 */

import { DAG } from './DAG.js';
import { NodeId, nodeText } from './DAGNode.js';

export interface GraphViewNode {
  id: NodeId;
  label: string;
  group: 'variable' | 'operation';
}

/**
 * Edge from an operand to the operation that consumes it
 */
export interface GraphViewEdge {
  from: NodeId;
  to: NodeId;
}

export interface GraphView {
  nodes: GraphViewNode[];
  edges: GraphViewEdge[];
}

export function toGraphView(dag: DAG): GraphView {
  const nodes: GraphViewNode[] = [];
  const edges: GraphViewEdge[] = [];

  for (const node of dag.allNodes()) {
    nodes.push({
      id: node.id,
      label: nodeText(node),
      group: node.kind === 'operation' ? 'operation' : 'variable'
    });

    if (node.kind === 'operation') {
      for (const operand of new Set(node.operands)) {
        edges.push({ from: operand, to: node.id });
      }
    }
  }

  return { nodes, edges };
}
