/**
 * Three-address code generation with Sethi-Ullman register allocation
 *
 * Walks a labeled DAG from the root, evaluating the heavier operand of every
 * node first. Each operation node is emitted exactly once; later uses read
 * the register it was computed into until its last use frees it.
 */

import { CodeGenError, InvalidOptionError, RegisterBudgetExceededError } from '../expr/Errors.js';
import { DAG } from './DAG.js';
import { DAGNode, NodeId, Operator, OperationNode } from './DAGNode.js';
import { RegisterPool } from './RegisterPool.js';

export type Operand =
  | { kind: 'register'; register: string }
  | { kind: 'variable'; name: string }
  | { kind: 'constant'; value: number };

export interface Instruction {
  node: NodeId;
  dest: string;
  operator: Operator;
  operands: Operand[];
  text: string;
}

/**
 * One allocation decision, in emission order
 */
export interface AllocationStep {
  node: NodeId;
  text: string;
  registers: string[];
}

/**
 * Instruction indices where a computed value is defined and last read
 */
export interface LiveRange {
  definedAt: number;
  lastUsedAt: number;
}

export interface CodeGenOptions {
  /** Fixed number of registers; unbounded when omitted */
  registerBudget?: number;

  /** Log every emitted instruction */
  verbose?: boolean;
}

export interface CodeGenResult {
  instructions: Instruction[];
  code: string[];
  steps: string[];
  allocationSteps: AllocationStep[];
  minRegisters: number;
  registersUsed: number;
  registerAllocation: Map<NodeId, string>;
  liveRanges: Map<NodeId, LiveRange>;
  result: Operand;
}

/**
 * Everything a single generation run mutates, threaded through the traversal
 */
interface AllocationState {
  dag: DAG;
  pool: RegisterPool;
  remainingUses: Map<NodeId, number>;
  values: Map<NodeId, string>;
  instructions: Instruction[];
  steps: AllocationStep[];
  liveRanges: Map<NodeId, LiveRange>;
  verbose: boolean;
}

interface EvaluatedOperand {
  node: DAGNode;
  operand: Operand;
  scratch?: string;
}

/**
 * Generate register-allocated three-address code for a labeled DAG
 */
export function generateCode(dag: DAG, options: CodeGenOptions = {}): CodeGenResult {
  const { registerBudget, verbose = false } = options;

  if (registerBudget !== undefined && !(Number.isInteger(registerBudget) && registerBudget > 0)) {
    throw new InvalidOptionError('registerBudget', registerBudget, 'must be a positive integer');
  }

  const root = dag.rootNode;
  const minRegisters = root.label;

  if (registerBudget !== undefined && registerBudget < minRegisters) {
    throw new RegisterBudgetExceededError(
      'expression needs more registers than the budget allows',
      registerBudget,
      minRegisters
    );
  }

  const state: AllocationState = {
    dag,
    pool: new RegisterPool(registerBudget),
    remainingUses: new Map(),
    values: new Map(),
    instructions: [],
    steps: [],
    liveRanges: new Map(),
    verbose
  };

  for (const node of dag.allNodes()) {
    delete node.register;
    if (node.kind === 'operation') {
      state.remainingUses.set(node.id, node.parentCount);
    }
  }

  const result = root.kind === 'operation'
    ? registerOperand(emitOperation(state, root))
    : leafOperand(root);

  const registerAllocation = new Map<NodeId, string>();
  for (const node of dag.allNodes()) {
    if (node.register !== undefined) {
      registerAllocation.set(node.id, node.register);
    }
  }

  return {
    instructions: state.instructions,
    code: state.instructions.map(instr => instr.text),
    steps: state.steps.map(step => step.text),
    allocationSteps: state.steps,
    minRegisters,
    registersUsed: state.pool.peakUsage,
    registerAllocation,
    liveRanges: state.liveRanges,
    result
  };
}

/**
 * Evaluate the operands of `node` (heavier first), then emit its instruction
 */
function emitOperation(state: AllocationState, node: OperationNode): string {
  const operandNodes = node.operands.map(id => state.dag.get(id));

  // Heavier operand first; ties go left to right
  const order = operandNodes.length === 2 && operandNodes[1].label > operandNodes[0].label
    ? [1, 0]
    : operandNodes.map((_, slot) => slot);

  const evaluated: EvaluatedOperand[] = [];
  for (const slot of order) {
    evaluated[slot] = evaluate(state, operandNodes[slot]);
  }

  const index = state.instructions.length;
  const parts: string[] = [];
  const touched = new Set<string>();

  for (const entry of evaluated) {
    if (entry.scratch !== undefined) {
      parts.push(`load ${describeOperand(entry.operand)} into ${entry.scratch}`);
      touched.add(entry.scratch);
    }
  }

  // Consume one use per operand slot; release values at their last use
  const freed = new Set<NodeId>();
  for (const entry of evaluated) {
    if (entry.scratch !== undefined) {
      state.pool.release(entry.scratch);
      continue;
    }
    if (entry.node.kind !== 'operation') {
      continue;
    }
    const remaining = (state.remainingUses.get(entry.node.id) ?? 0) - 1;
    state.remainingUses.set(entry.node.id, remaining);

    const range = state.liveRanges.get(entry.node.id);
    if (range) {
      range.lastUsedAt = index;
    }

    if (remaining === 0) {
      const register = state.values.get(entry.node.id);
      if (register !== undefined) {
        state.pool.release(register);
        state.values.delete(entry.node.id);
        freed.add(entry.node.id);
      }
    }
  }

  const seen = new Set<NodeId>();
  for (const entry of evaluated) {
    if (entry.operand.kind !== 'register' || seen.has(entry.node.id)) {
      continue;
    }
    seen.add(entry.node.id);
    touched.add(entry.operand.register);
    const remaining = state.remainingUses.get(entry.node.id) ?? 0;
    const status = freed.has(entry.node.id)
      ? 'freed'
      : `${remaining} ${remaining === 1 ? 'use' : 'uses'} left`;
    parts.push(`read ${entry.operand.register} (n${entry.node.id}, ${status})`);
  }

  const dest = state.pool.allocate();
  parts.push(`write ${dest}`);
  touched.add(dest);

  const operands = evaluated.map(entry => entry.operand);
  const instruction: Instruction = {
    node: node.id,
    dest,
    operator: node.operator,
    operands,
    text: formatInstruction(dest, node.operator, operands)
  };

  const description = formatOperation(node.operator, evaluated.map(entry => describeNode(entry.node)));
  state.instructions.push(instruction);
  state.steps.push({
    node: node.id,
    text: `n${node.id} [${description}]: ${parts.join('; ')}`,
    registers: [...touched]
  });

  node.register = dest;
  state.values.set(node.id, dest);
  state.liveRanges.set(node.id, { definedAt: index, lastUsedAt: index });

  if (state.verbose) {
    console.log(`[codegen] ${instruction.text}    (n${node.id}, ${state.pool.liveCount} live)`);
  }

  return dest;
}

function evaluate(state: AllocationState, node: DAGNode): EvaluatedOperand {
  if (node.kind === 'operation') {
    const existing = state.values.get(node.id);
    if (existing !== undefined) {
      return { node, operand: registerOperand(existing) };
    }
    if (state.liveRanges.has(node.id)) {
      // Computed before and already freed: the use count was wrong
      throw new CodeGenError('value was read after its last use', node.id, 'parent count too low');
    }
    return { node, operand: registerOperand(emitOperation(state, node)) };
  }

  // Left-hand leaves hold a register from here until their consuming instruction
  if (node.label >= 1) {
    return { node, operand: leafOperand(node), scratch: state.pool.allocate() };
  }
  return { node, operand: leafOperand(node) };
}

function registerOperand(register: string): Operand {
  return { kind: 'register', register };
}

function leafOperand(node: DAGNode): Operand {
  switch (node.kind) {
    case 'variable':
      return { kind: 'variable', name: node.name };
    case 'constant':
      return { kind: 'constant', value: node.value };
    case 'operation':
      throw new CodeGenError('operation used as a leaf operand', node.id);
  }
}

export function describeOperand(operand: Operand): string {
  switch (operand.kind) {
    case 'register':
      return operand.register;
    case 'variable':
      return operand.name;
    case 'constant':
      return `${operand.value}`;
  }
}

function describeNode(node: DAGNode): string {
  return node.kind === 'operation' ? `n${node.id}` : describeOperand(leafOperand(node));
}

function formatOperation(operator: Operator, operands: string[]): string {
  if (operator === 'neg') {
    return `-${operands[0]}`;
  }
  return `${operands[0]} ${operator} ${operands[1]}`;
}

/**
 * `Rd = Ra <op> Rb`, `Rd = Ra <op> value` or `Rd = -Ra`
 */
export function formatInstruction(dest: string, operator: Operator, operands: Operand[]): string {
  return `${dest} = ${formatOperation(operator, operands.map(describeOperand))}`;
}
