/**
 * DAG back end: arena, builder, labeler, rearranger and code generator
 */

export { DAG, copyDAG } from './DAG.js';
export {
  type NodeId,
  type Operator,
  type NodeShape,
  type DAGNode,
  type LeafNode,
  type OperationNode,
  COMMUTATIVE_OPERATORS,
  isCommutative,
  isLeaf,
  nodeKey,
  nodeChildren,
  nodeText
} from './DAGNode.js';
export { buildDAG, addExpression, dagToExpression } from './Builder.js';
export { labelDAG, combineLabels } from './Labeler.js';
export {
  rearrangeDAG,
  type RearrangeOptions,
  type RearrangeResult,
  type RearrangeStats
} from './Rearranger.js';
export {
  generateCode,
  formatInstruction,
  describeOperand,
  type Operand,
  type Instruction,
  type AllocationStep,
  type LiveRange,
  type CodeGenOptions,
  type CodeGenResult
} from './CodeGen.js';
export { RegisterPool, registerName } from './RegisterPool.js';
export { toGraphView, type GraphView, type GraphViewNode, type GraphViewEdge } from './GraphView.js';
export { nodeLevels } from './Levels.js';
export {
  evaluateExpression,
  executeInstructions,
  type Environment
} from './Evaluator.js';
