/**
 * Example: register pressure before and after rearrangement
 *
 * Compiles a few expressions and prints the three-address code of the
 * original DAG next to the rearranged one.
 */

import { compile, compileExpression, EXAMPLE_EXPRESSION, expressionToString } from '../src/index.js';

const inputs = [
  'a + b * (c + d) - e',
  'a + (b + (c + (d + e)))',
  '(a+b)*(a+b)',
  EXAMPLE_EXPRESSION
];

console.log('=== Rearrangement Comparison ===\n');

inputs.forEach((input, i) => {
  const compiled = compile(input);
  const original = compiled.original.codegen;
  const rearranged = compiled.rearranged.codegen;

  console.log(`${i + 1}. ${input}\n`);
  console.log(`   Original (label ${original.minRegisters}, ${original.registersUsed} used):`);
  original.code.forEach(line => console.log(`     ${line}`));

  console.log(`\n   ${expressionToString(compiled.rearranged.expression)} (label ${rearranged.minRegisters}, ${rearranged.registersUsed} used):`);
  rearranged.code.forEach(line => console.log(`     ${line}`));
  console.log();
});

// The budget applies to both halves, so the original DAG decides
const budgeted = compileExpression('(a*b + c*d) + (e*f + g*h)', { registerBudget: 2 });
console.log('With a budget of 2 registers:');
console.log(budgeted.success ? budgeted.rearranged.three_address_code.join('\n') : `  ${budgeted.error}`);
