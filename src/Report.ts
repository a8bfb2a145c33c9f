/**
 * Plain-text report of a compiled expression (CLI output)
 */

import { expressionToString } from './expr/AST.js';
import { CompiledExpression } from './Compiler.js';
import { CodeGenResult } from './dag/CodeGen.js';
import { DAG } from './dag/DAG.js';
import { nodeText } from './dag/DAGNode.js';
import { nodeLevels } from './dag/Levels.js';

export interface ReportOptions {
  /** Include the node table with labels and parent counts */
  showNodes?: boolean;
}

export function formatReport(compiled: CompiledExpression, options: ReportOptions = {}): string {
  const { showNodes = false } = options;

  const sections: string[] = [
    `Expression: ${expressionToString(compiled.expression)}`,
    formatHalf('Original DAG', compiled.original.dag, compiled.original.codegen, showNodes),
    formatHalf(
      `Rearranged DAG: ${expressionToString(compiled.rearranged.expression)}`,
      compiled.rearranged.dag,
      compiled.rearranged.codegen,
      showNodes
    )
  ];

  const saved = compiled.original.codegen.minRegisters - compiled.rearranged.codegen.minRegisters;
  sections.push(
    saved > 0
      ? `Rearrangement saves ${saved} ${saved === 1 ? 'register' : 'registers'}.`
      : 'Rearrangement found no cheaper form.'
  );

  return sections.join('\n\n');
}

function formatHalf(title: string, dag: DAG, codegen: CodeGenResult, showNodes: boolean): string {
  const lines: string[] = [title];
  lines.push(`  Minimum registers: ${codegen.minRegisters}`);
  lines.push(`  Registers used:    ${codegen.registersUsed}`);

  if (showNodes) {
    lines.push('  Nodes:');
    for (const node of dag.allNodes()) {
      const operands = node.kind === 'operation'
        ? ` (${node.operands.map(id => `n${id}`).join(', ')})`
        : '';
      lines.push(`    n${node.id} ${nodeText(node)}${operands}: label ${node.label}, parents ${node.parentCount}`);
    }
  }

  lines.push('  Node levels:');
  const byLevel = new Map<number, string[]>();
  for (const [id, level] of nodeLevels(dag)) {
    const ids = byLevel.get(level) ?? [];
    ids.push(`n${id}`);
    byLevel.set(level, ids);
  }
  for (const [level, ids] of [...byLevel].sort((a, b) => a[0] - b[0])) {
    lines.push(`    level ${level}: ${ids.join(' ')}`);
  }

  lines.push('  Three-address code:');
  if (codegen.code.length === 0) {
    lines.push('    (none)');
  }
  codegen.code.forEach((text, i) => lines.push(`    ${i + 1}. ${text}`));

  lines.push('  Allocation steps:');
  codegen.steps.forEach((text, i) => lines.push(`    ${i + 1}. ${text}`));

  if (codegen.registerAllocation.size > 0) {
    lines.push('  Register allocation:');
    for (const [id, register] of codegen.registerAllocation) {
      const range = codegen.liveRanges.get(id);
      const live = range ? `, live ${range.definedAt + 1}..${range.lastUsedAt + 1}` : '';
      lines.push(`    n${id} -> ${register}${live}`);
    }
  }

  return lines.join('\n');
}
