import { describe, it, expect } from 'vitest';
import { compile, compileExpression, EXAMPLE_EXPRESSION } from '../src/Compiler.js';
import {
  ExpressionTooDeepError,
  InvalidOptionError,
  ParseError,
  RegisterBudgetExceededError
} from '../src/expr/Errors.js';

function subtractionChain(terms: number): string {
  return Array.from({ length: terms }, (_, i) => `v${i}`).join(' - ');
}

describe('Compiler', () => {
  it('should return both halves for a + b * c', () => {
    const response = compileExpression('a + b * c');

    expect(response.success).toBe(true);
    if (!response.success) return;

    expect(response.expression).toBe('a + b * c');
    expect(response.original).toMatchObject({
      min_registers: 2,
      registers_used: 2,
      three_address_code: ['R2 = b * c', 'R1 = a + R2'],
      steps: [
        'n3 [b * c]: load b into R2; write R2',
        'n4 [a + n3]: load a into R1; read R2 (n3, freed); write R1'
      ],
      register_allocation: { '3': 'R2', '4': 'R1' }
    });
    expect(response.rearranged).toMatchObject({
      min_registers: 1,
      registers_used: 1,
      three_address_code: ['R1 = b * c', 'R1 = R1 + a'],
      steps: [
        'n2 [b * c]: load b into R1; write R1',
        'n4 [n2 + a]: read R1 (n2, freed); write R1'
      ],
      register_allocation: { '2': 'R1', '4': 'R1' }
    });
  });

  it('should include the graph of each half', () => {
    const response = compileExpression('a + b * c');
    if (!response.success) throw new Error(response.error);

    expect(response.original.graph.nodes.map(node => node.label)).toEqual(['a', 'b', 'c', '*', '+']);
    expect(response.rearranged.graph.nodes.map(node => node.label)).toEqual(['b', 'c', '*', 'a', '+']);
    expect(response.rearranged.graph.edges).toEqual([
      { from: 0, to: 2 },
      { from: 1, to: 2 },
      { from: 2, to: 4 },
      { from: 3, to: 4 }
    ]);
  });

  it('should compile the example fragment', () => {
    const response = compileExpression(EXAMPLE_EXPRESSION);
    if (!response.success) throw new Error(response.error);

    const expectedCode = ['R2 = a + b', 'R1 = a * R2', 'R1 = b + R1', 'R1 = R2 - R1'];
    expect(response.original.three_address_code).toEqual(expectedCode);
    expect(response.original.register_allocation).toEqual({ '2': 'R2', '3': 'R1', '4': 'R1', '5': 'R1' });
    expect(response.rearranged.three_address_code).toEqual(expectedCode);
    expect(response.rearranged.min_registers).toBe(2);
  });

  it('should serialize to JSON without loss', () => {
    const response = compileExpression('(a+b)*(a+b)');
    expect(JSON.parse(JSON.stringify(response))).toEqual(response);
  });

  it('should return a failure response for malformed input', () => {
    expect(compileExpression('a +')).toEqual({
      success: false,
      error: "Parse error at column 4: Missing operand after '+'"
    });
    expect(compileExpression('')).toEqual({
      success: false,
      error: 'Parse error at column 1: Empty expression'
    });
  });

  it('should return a failure response when the budget is too small', () => {
    expect(compileExpression('a + b * c', { registerBudget: 1 })).toEqual({
      success: false,
      error: 'Register budget exceeded: expression needs more registers than the budget allows (budget 1, required 2)'
    });
  });

  it('should report live ranges and node levels for each half', () => {
    const response = compileExpression('a + b * c');
    if (!response.success) throw new Error(response.error);

    expect(response.original.live_ranges).toEqual({ '3': [0, 1], '4': [1, 1] });
    expect(response.original.node_levels).toEqual({ '0': 0, '1': 0, '2': 0, '3': 1, '4': 2 });
    expect(response.rearranged.live_ranges).toEqual({ '2': [0, 1], '4': [1, 1] });
    expect(response.rearranged.node_levels).toEqual({ '0': 0, '1': 0, '2': 1, '3': 0, '4': 2 });
  });

  it('should keep a shared value live across the instructions that need it', () => {
    const response = compileExpression(EXAMPLE_EXPRESSION);
    if (!response.success) throw new Error(response.error);

    expect(response.original.live_ranges).toEqual({
      '2': [0, 3],
      '3': [1, 2],
      '4': [2, 3],
      '5': [3, 3]
    });
  });

  it('should return a failure response for an invalid register budget', () => {
    expect(compileExpression('a + b * c', { registerBudget: NaN })).toEqual({
      success: false,
      error: 'Invalid registerBudget NaN: must be a positive integer'
    });
  });

  it('should return a failure response for a very long chain', () => {
    expect(compileExpression(subtractionChain(20000))).toEqual({
      success: false,
      error: 'Expression too deep: depth 19999 exceeds the limit of 2000'
    });
    expect(compileExpression(subtractionChain(3000))).toEqual({
      success: false,
      error: 'Expression too deep: depth 2999 exceeds the limit of 2000'
    });
  });

  it('should compile a long chain within the depth limit', () => {
    const response = compileExpression(subtractionChain(1500));
    if (!response.success) throw new Error(response.error);

    expect(response.original.three_address_code).toHaveLength(1499);
    expect(response.original.three_address_code[0]).toBe('R1 = v0 - v1');
  });

  it('should honor a custom depth limit', () => {
    expect(compileExpression('a + b * c', { maxExpressionDepth: 1 })).toEqual({
      success: false,
      error: 'Expression too deep: depth 2 exceeds the limit of 1'
    });
    expect(compileExpression('a + b * c', { maxExpressionDepth: 2 }).success).toBe(true);
  });

  it('should skip the rearranger when asked', () => {
    const response = compileExpression('a + b * c', { rearrange: false });
    if (!response.success) throw new Error(response.error);

    expect(response.rearranged).toEqual(response.original);
  });
});

describe('Compiler - compile', () => {
  it('should expose the DAGs, code and rearrangement stats', () => {
    const compiled = compile('a + b * c');

    expect(compiled.original.dag.rootNode.label).toBe(2);
    expect(compiled.rearranged.dag.rootNode.label).toBe(1);
    expect(compiled.original.codegen.minRegisters).toBe(2);
    expect(compiled.stats).toMatchObject({ improved: true, originalLabel: 2, rearrangedLabel: 1 });
  });

  it('should leave stats undefined without rearrangement', () => {
    expect(compile('a + b * c', { rearrange: false }).stats).toBeUndefined();
  });

  it('should forward rearranger bounds', () => {
    expect(compile('(a + b*c) - x', { maxDepth: 0 }).stats?.improved).toBe(false);
  });

  it('should throw typed errors', () => {
    expect(() => compile('(a')).toThrow(ParseError);
    expect(() => compile('a + b * c', { registerBudget: 1 })).toThrow(RegisterBudgetExceededError);
    expect(() => compile('a + b * c', { registerBudget: 0 })).toThrow(InvalidOptionError);
    expect(() => compile(subtractionChain(3000))).toThrow(ExpressionTooDeepError);
  });
});
