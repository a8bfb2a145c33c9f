#!/usr/bin/env node

import { compile, compileExpression, EXAMPLE_EXPRESSION } from './Compiler.js';
import type { CompileOptions } from './Compiler.js';
import { formatReport } from './Report.js';
import {
  ExpressionTooDeepError,
  ParseError,
  RegisterBudgetExceededError,
  formatParseError
} from './expr/Errors.js';

function printUsage() {
  console.log(`
regdag - Register allocation for expression DAGs

Usage:
  regdag "<expression>" [options]
  regdag --example [options]

Options:
  --registers <n>       Fixed register budget (default: unbounded)
  --no-rearrange        Skip the algebraic rearrangement search
  --max-depth <n>       Rearrangement depth bound (default: 64)
  --max-chain <n>       Longest +/* chain to regroup exhaustively (default: 8)
  --nodes               Print the DAG node table
  --json                Print the result bundle as JSON
  --example             Use the built-in example: ${EXAMPLE_EXPRESSION}
  --verbose             Log pipeline progress
  --help, -h            Show this help message

Examples:
  regdag "a + b * (c + d) - e"
  regdag "(a+b)*(a+b)" --json
  regdag "x * y + z" --registers 1
  `.trim());
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  if (value === undefined) {
    console.error(`Error: Missing value for ${flag}`);
    process.exit(1);
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.error(`Error: Invalid value "${value}" for ${flag}. Must be a positive integer.`);
    process.exit(1);
  }
  return parsed;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const options: CompileOptions = {
    rearrange: true,
    verbose: false
  };
  let input: string | undefined;
  let json = false;
  let showNodes = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--registers') {
      options.registerBudget = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--no-rearrange') {
      options.rearrange = false;
    } else if (arg === '--max-depth') {
      options.maxDepth = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--max-chain') {
      options.maxChainLength = parsePositiveInt(arg, args[++i]);
    } else if (arg === '--nodes') {
      showNodes = true;
    } else if (arg === '--json') {
      json = true;
    } else if (arg === '--example') {
      input = EXAMPLE_EXPRESSION;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('--')) {
      console.error(`Error: Unknown option "${arg}"`);
      printUsage();
      process.exit(1);
    } else if (input === undefined) {
      input = arg;
    } else {
      console.error('Error: Only one expression may be given');
      process.exit(1);
    }
  }

  if (input === undefined) {
    console.error('Error: No expression given');
    process.exit(1);
  }

  if (json) {
    const response = compileExpression(input, options);
    console.log(JSON.stringify(response, null, 2));
    process.exit(response.success ? 0 : 1);
  }

  try {
    const compiled = compile(input, options);
    console.log(formatReport(compiled, { showNodes }));
  } catch (err) {
    if (err instanceof ParseError) {
      console.error(formatParseError(err, input, options.verbose));
    } else if (err instanceof RegisterBudgetExceededError || err instanceof ExpressionTooDeepError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Error: Failed to compile expression');
      if (err instanceof Error) {
        console.error(err.message);
        if (err.stack) {
          console.error('\nStack trace:');
          console.error(err.stack);
        }
      }
    }
    process.exit(1);
  }
}

main();
