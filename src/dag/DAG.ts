/**
 * DAG: arena of hash-consed expression nodes
 *
 * The arena owns every node; nodes refer to each other only by index. A node
 * can only be added once its operands exist, so operand ids are always lower
 * than their parent's id and the arena order is a valid evaluation order.
 */

import { DAGNode, NodeId, NodeShape, OperationNode, nodeKey, nodeText } from './DAGNode.js';

export class DAG {
  private nodes: DAGNode[] = [];
  private hashcons: Map<string, NodeId> = new Map();
  private rootId: NodeId | undefined;

  /**
   * Add a node, returning the id of the existing node with the same structure
   * if there is one. Inserting an operation counts one parent reference per
   * operand slot.
   */
  add(shape: NodeShape): NodeId {
    const key = nodeKey(shape);

    const existing = this.hashcons.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.nodes.length;

    if (shape.kind === 'operation') {
      for (const operand of shape.operands) {
        if (operand < 0 || operand >= id) {
          throw new RangeError(`Operand n${operand} does not exist in the arena`);
        }
      }
      for (const operand of shape.operands) {
        this.nodes[operand].parentCount++;
      }
      this.nodes.push({
        kind: 'operation',
        operator: shape.operator,
        operands: [...shape.operands],
        id,
        label: 0,
        parentCount: 0
      });
    } else {
      this.nodes.push({ ...shape, id, label: 0, parentCount: 0 });
    }

    this.hashcons.set(key, id);
    return id;
  }

  get(id: NodeId): DAGNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`Node n${id} does not exist in the arena`);
    }
    return node;
  }

  get root(): NodeId {
    if (this.rootId === undefined) {
      throw new Error('DAG has no root');
    }
    return this.rootId;
  }

  set root(id: NodeId) {
    this.get(id);
    this.rootId = id;
  }

  get rootNode(): DAGNode {
    return this.get(this.root);
  }

  get size(): number {
    return this.nodes.length;
  }

  /**
   * All nodes in arena (dependency) order
   */
  allNodes(): readonly DAGNode[] {
    return this.nodes;
  }

  operations(): OperationNode[] {
    const ops: OperationNode[] = [];
    for (const node of this.nodes) {
      if (node.kind === 'operation') {
        ops.push(node);
      }
    }
    return ops;
  }

  /**
   * Debug: print arena state
   */
  dump(): string {
    const lines: string[] = ['DAG:'];
    for (const node of this.nodes) {
      const operands = node.kind === 'operation'
        ? ` ${node.operands.map(id => `n${id}`).join(' ')}`
        : '';
      const register = node.register ? ` ${node.register}` : '';
      const marker = node.id === this.rootId ? ' (root)' : '';
      lines.push(
        `  [n${node.id}] ${nodeText(node)}${operands} label=${node.label} parents=${node.parentCount}${register}${marker}`
      );
    }
    return lines.join('\n');
  }
}

/**
 * Structural copy into a fresh arena: labels and parent counts are kept,
 * assigned registers are not.
 */
export function copyDAG(dag: DAG): DAG {
  const copy = new DAG();
  for (const node of dag.allNodes()) {
    const shape: NodeShape = node.kind === 'operation'
      ? { kind: 'operation', operator: node.operator, operands: [...node.operands] }
      : node.kind === 'variable'
        ? { kind: 'variable', name: node.name }
        : { kind: 'constant', value: node.value };
    const id = copy.add(shape);
    copy.get(id).label = node.label;
  }
  copy.root = dag.root;
  return copy;
}
