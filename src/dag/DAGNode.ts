/**
 * DAG nodes: arena-owned records referenced only by index
 *
 * Nodes are hash-consed through `nodeKey`, which is how common
 * subexpressions collapse into a single node with several parents.
 */

import { BinaryOperator } from '../expr/AST.js';

export type NodeId = number;

export type Operator = BinaryOperator | 'neg';

/**
 * What a node computes, without its bookkeeping fields
 */
export type NodeShape =
  | { kind: 'variable'; name: string }
  | { kind: 'constant'; value: number }
  | { kind: 'operation'; operator: Operator; operands: NodeId[] };

export type DAGNode = NodeShape & {
  id: NodeId;
  label: number;
  parentCount: number;
  register?: string;
};

export type LeafNode = Extract<DAGNode, { kind: 'variable' | 'constant' }>;
export type OperationNode = Extract<DAGNode, { kind: 'operation' }>;

/**
 * Operators whose operands may be exchanged and regrouped
 */
export const COMMUTATIVE_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['+', '*']);

export function isCommutative(operator: Operator): boolean {
  return COMMUTATIVE_OPERATORS.has(operator);
}

export function isLeaf(node: DAGNode): node is LeafNode {
  return node.kind !== 'operation';
}

/**
 * Structural key for hash-consing. Commutative operand ids are sorted in the
 * key only; the node itself keeps the order it was created with.
 */
export function nodeKey(shape: NodeShape): string {
  switch (shape.kind) {
    case 'variable':
      return `var:${shape.name}`;
    case 'constant':
      return `const:${shape.value}`;
    case 'operation': {
      const ids = isCommutative(shape.operator)
        ? [...shape.operands].sort((a, b) => a - b)
        : shape.operands;
      return `${shape.operator}:${ids.join(',')}`;
    }
  }
}

/**
 * Operand ids of a node (empty for leaves)
 */
export function nodeChildren(node: NodeShape): NodeId[] {
  return node.kind === 'operation' ? [...node.operands] : [];
}

/**
 * Display text: variable name, constant value or operator symbol
 */
export function nodeText(node: NodeShape): string {
  switch (node.kind) {
    case 'variable':
      return node.name;
    case 'constant':
      return `${node.value}`;
    case 'operation':
      return node.operator === 'neg' ? '-' : node.operator;
  }
}
