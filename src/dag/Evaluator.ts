/**
 * Numeric evaluation of expressions and of generated three-address code,
 * used to check that code generation and rearrangement preserve meaning.
 */

import { Expression, BinaryOperator } from '../expr/AST.js';
import { EvaluationError } from '../expr/Errors.js';
import { Instruction, Operand } from './CodeGen.js';
import { Operator } from './DAGNode.js';

export type Environment = Record<string, number>;

export function evaluateExpression(expr: Expression, env: Environment): number {
  switch (expr.kind) {
    case 'number':
      return expr.value;
    case 'variable':
      return lookupVariable(expr.name, env);
    case 'unary':
      return -evaluateExpression(expr.operand, env);
    case 'binary':
      return applyBinary(
        expr.operator,
        evaluateExpression(expr.left, env),
        evaluateExpression(expr.right, env)
      );
  }
}

/**
 * Run instructions over a register file and return the value of `result`
 */
export function executeInstructions(
  instructions: Instruction[],
  result: Operand,
  env: Environment
): number {
  const registers = new Map<string, number>();

  const read = (operand: Operand): number => {
    switch (operand.kind) {
      case 'constant':
        return operand.value;
      case 'variable':
        return lookupVariable(operand.name, env);
      case 'register': {
        const value = registers.get(operand.register);
        if (value === undefined) {
          throw new EvaluationError('register read before it was written', operand.register);
        }
        return value;
      }
    }
  };

  for (const instruction of instructions) {
    const values = instruction.operands.map(read);
    registers.set(instruction.dest, applyOperator(instruction.operator, values));
  }

  return read(result);
}

function applyOperator(operator: Operator, values: number[]): number {
  if (operator === 'neg') {
    return -values[0];
  }
  return applyBinary(operator, values[0], values[1]);
}

function applyBinary(operator: BinaryOperator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '^':
      return Math.pow(left, right);
  }
}

function lookupVariable(name: string, env: Environment): number {
  if (!Object.hasOwn(env, name)) {
    throw new EvaluationError('no value bound', name);
  }
  return env[name];
}
