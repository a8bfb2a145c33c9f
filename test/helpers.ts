/**
 * Test helper utilities shared by the DAG and compiler specs
 */

import { parse } from '../src/expr/Parser.js';
import { Expression } from '../src/expr/AST.js';
import { buildDAG } from '../src/dag/Builder.js';
import { labelDAG } from '../src/dag/Labeler.js';
import { DAG } from '../src/dag/DAG.js';
import { DAGNode } from '../src/dag/DAGNode.js';

export interface LabeledExpression {
  expr: Expression;
  dag: DAG;
}

/**
 * Parse, build and label an expression
 *
 * @example
 * const { dag } = parseAndLabel('(a+b)*(a+b)');
 * expect(dag.rootNode.label).toBe(2);
 */
export function parseAndLabel(source: string): LabeledExpression {
  const expr = parse(source);
  const dag = labelDAG(buildDAG(expr));
  return { expr, dag };
}

/**
 * Find the single `operator` node whose operands read as `operandTexts`
 * (leaf name or value, `nN` for operation nodes)
 */
export function findOperation(dag: DAG, operator: string, operandTexts: string[]): DAGNode {
  const matches = dag.allNodes().filter(node => {
    if (node.kind !== 'operation' || node.operator !== operator) {
      return false;
    }
    const texts = node.operands.map(id => {
      const operand = dag.get(id);
      if (operand.kind === 'variable') return operand.name;
      if (operand.kind === 'constant') return `${operand.value}`;
      return `n${operand.id}`;
    });
    return texts.join(',') === operandTexts.join(',');
  });
  if (matches.length !== 1) {
    throw new Error(`Expected one ${operator} node over ${operandTexts.join(', ')}, found ${matches.length}`);
  }
  return matches[0];
}

/**
 * Variable names of every leaf reached through the expression, with repeats
 */
export function leafNames(expr: Expression): string[] {
  switch (expr.kind) {
    case 'number':
      return [`${expr.value}`];
    case 'variable':
      return [expr.name];
    case 'unary':
      return leafNames(expr.operand);
    case 'binary':
      return [...leafNames(expr.left), ...leafNames(expr.right)];
  }
}

/**
 * Expressions reused across the property-style specs. Every variable is bound
 * in `ASSIGNMENTS` to a positive value, so no division by zero can occur.
 */
export const SAMPLE_EXPRESSIONS = [
  'a + b * (c + d) - e',
  '(a+b)*(a+b)',
  'a + b * c',
  '(a + b) - (b + a * (a + b))',
  'a * b + c * d',
  'a + (b + (c + (d + e)))',
  'a * (b * (c * d)) - e / (a + b)',
  '(a - b) * (c - d) + (a - b)',
  '-a * b + c ^ 2',
  'a / b / c / d',
  '(a + b) * (c + d) * (e + a)',
  '2 * a + 3 * b - 4',
  'a ^ b ^ 0.5',
  '-(a + b) * -c',
  '(a*b + c*d) + (e*a + b*c)'
];

export const ASSIGNMENTS: Record<string, number>[] = [
  { a: 1, b: 2, c: 3, d: 4, e: 5 },
  { a: 2.5, b: 0.5, c: 7, d: 1.25, e: 3 },
  { a: 9, b: 4, c: 0.75, d: 6, e: 11 }
];
