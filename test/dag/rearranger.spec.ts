import { describe, it, expect, vi, afterEach } from 'vitest';
import { expressionToString } from '../../src/expr/AST.js';
import { rearrangeDAG } from '../../src/dag/Rearranger.js';
import { generateCode } from '../../src/dag/CodeGen.js';
import { leafNames, parseAndLabel, SAMPLE_EXPRESSIONS } from '../helpers.js';

describe('Rearranger', () => {
  it('should swap a commutative node to put the heavy operand on the left', () => {
    const { dag } = parseAndLabel('a + b * c');
    const result = rearrangeDAG(dag);

    expect(expressionToString(result.expression)).toBe('b * c + a');
    expect(result.dag.rootNode.label).toBe(1);
    expect(result.stats).toEqual({
      improved: true,
      originalLabel: 2,
      rearrangedLabel: 1,
      nodesVisited: 5,
      rewrites: 1
    });
    expect(generateCode(result.dag).code).toEqual(['R1 = b * c', 'R1 = R1 + a']);
  });

  it('should rewrite through a non-commutative parent', () => {
    const { dag } = parseAndLabel('a + b * (c + d) - e');
    const result = rearrangeDAG(dag);

    expect(expressionToString(result.expression)).toBe('(c + d) * b + a - e');
    expect(result.stats.improved).toBe(true);
    expect(result.stats.rewrites).toBe(2);
    expect(generateCode(result.dag).code).toEqual([
      'R1 = c + d',
      'R1 = R1 * b',
      'R1 = R1 + a',
      'R1 = R1 - e'
    ]);
  });

  it('should regroup a right-leaning chain', () => {
    const { dag } = parseAndLabel('a + (b + (c + (d + e)))');
    const result = rearrangeDAG(dag);

    expect(dag.rootNode.label).toBe(2);
    expect(expressionToString(result.expression)).toBe('a + b + c + d + e');
    expect(result.dag.rootNode.label).toBe(1);
  });

  it('should prefer the shape with fewer distinct nodes among equal labels', () => {
    const { dag } = parseAndLabel('(x - y + c + (x - y) + c) - (a + (b + (d + e)))');
    const result = rearrangeDAG(dag);

    expect(dag.rootNode.label).toBe(3);
    // Bracketing the left chain in halves shares x - y + c
    expect(expressionToString(result.expression)).toBe('x - y + c + (x - y + c) - (a + b + d + e)');
    expect(result.dag.rootNode.label).toBe(2);
    expect(result.dag.size).toBe(14);
    expect(result.stats.rewrites).toBe(2);
  });

  it('should keep the original shape when labels and node counts tie', () => {
    const result = rearrangeDAG(parseAndLabel('a + b * (c + d) - e').dag);

    // c + d and d + c cost the same, so c + d stays
    expect(expressionToString(result.expression)).toBe('(c + d) * b + a - e');
  });

  it('should fall back to the original DAG when nothing is cheaper', () => {
    const { dag } = parseAndLabel('(a+b)*(a+b)');
    const result = rearrangeDAG(dag);

    expect(result.stats.improved).toBe(false);
    expect(result.stats.rearrangedLabel).toBe(2);
    expect(result.dag).not.toBe(dag);
    expect(result.dag.dump()).toBe(dag.dump());
    expect(expressionToString(result.expression)).toBe('(a + b) * (a + b)');
  });

  it('should keep the shared example fragment as it is', () => {
    const { dag } = parseAndLabel('(a + b) - (b + a * (a + b))');
    const result = rearrangeDAG(dag);

    expect(result.stats.improved).toBe(false);
    expect(generateCode(result.dag).code).toEqual(generateCode(dag).code);
  });

  it('should not reorder operands of non-commutative operators', () => {
    const result = rearrangeDAG(parseAndLabel('a - b * c').dag);

    expect(result.stats.improved).toBe(false);
    expect(expressionToString(result.expression)).toBe('a - b * c');
  });

  it('should leave nodes below maxDepth untouched', () => {
    const { dag } = parseAndLabel('(a + b*c) - x');

    expect(rearrangeDAG(dag).stats.improved).toBe(true);
    expect(rearrangeDAG(dag, { maxDepth: 0 }).stats.improved).toBe(false);
  });

  it('should not modify the input DAG', () => {
    const { dag } = parseAndLabel('a + b * (c + d) - e');
    const before = dag.dump();

    rearrangeDAG(dag);
    expect(dag.dump()).toBe(before);
  });

  it('should find nothing further to improve in its own output', () => {
    for (const source of ['a + b * c', 'a + b * (c + d) - e', 'a + (b + (c + (d + e)))']) {
      const first = rearrangeDAG(parseAndLabel(source).dag);
      const second = rearrangeDAG(first.dag);

      expect(first.dag.rootNode.label).toBe(1);
      expect(second.stats.improved).toBe(false);
      expect(expressionToString(second.expression)).toBe(expressionToString(first.expression));
    }
  });

  it('should never raise the label', () => {
    for (const source of SAMPLE_EXPRESSIONS) {
      const { dag } = parseAndLabel(source);
      expect(rearrangeDAG(dag).dag.rootNode.label).toBeLessThanOrEqual(dag.rootNode.label);
    }
  });

  it('should keep every leaf occurrence', () => {
    for (const source of SAMPLE_EXPRESSIONS) {
      const { expr, dag } = parseAndLabel(source);
      const rearranged = rearrangeDAG(dag).expression;

      expect(leafNames(rearranged).sort()).toEqual(leafNames(expr).sort());
    }
  });
});

describe('Rearranger - chain length bound', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function chosenShapes(source: string, maxChainLength?: number): string[] {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    rearrangeDAG(parseAndLabel(source).dag, { maxChainLength, verbose: true });
    const lines = log.mock.calls.map(call => String(call[0]));
    log.mockRestore();
    return lines;
  }

  it('should regroup a chain within the bound into the left-skewed shape', () => {
    expect(chosenShapes('a + (b + (c + (d + e)))')[0]).toBe(
      '[rearrange] n8: left-skewed shape, label 2 -> 1'
    );
  });

  it('should only try the original, swapped and sorted shapes past the bound', () => {
    // Five operands with a bound of four: left-skewed is not a candidate
    expect(chosenShapes('a + (b + (c + (d + e)))', 4)[0]).toBe(
      '[rearrange] n8: sorted shape, label 2 -> 1'
    );
    expect(chosenShapes('a + b * c', 1)[0]).toBe('[rearrange] n4: swapped shape, label 2 -> 1');
  });

  it('should miss improvements that only other shapes find', () => {
    // Only the balanced shape shares x - y + c
    const source = '(x - y + c + (x - y) + c) - (a + (b + (d + e)))';
    const { dag } = parseAndLabel(source);
    const bounded = rearrangeDAG(dag, { maxChainLength: 3 });

    expect(bounded.dag.rootNode.label).toBeLessThanOrEqual(dag.rootNode.label);
    expect(bounded.dag.size).toBe(15);
  });

  it('should never raise the label under a tight bound', () => {
    for (const source of SAMPLE_EXPRESSIONS) {
      const { dag } = parseAndLabel(source);
      expect(rearrangeDAG(dag, { maxChainLength: 1 }).dag.rootNode.label)
        .toBeLessThanOrEqual(dag.rootNode.label);
    }
  });
});

describe('Rearranger - verbose', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log the chosen rewrite and the label change', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    rearrangeDAG(parseAndLabel('a + b * c').dag, { verbose: true });

    expect(log.mock.calls).toEqual([
      ['[rearrange] n4: swapped shape, label 2 -> 1'],
      ['[rearrange] b * c + a: label 2 -> 1']
    ]);
  });

  it('should log when the original is kept', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    rearrangeDAG(parseAndLabel('(a+b)*(a+b)').dag, { verbose: true });

    expect(log).toHaveBeenCalledWith('[rearrange] No improvement over label 2, keeping original');
  });
});
