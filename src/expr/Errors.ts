export class ParseError extends Error {
  constructor(
    message: string,
    public position: number,
    public token?: string
  ) {
    super(`Parse error at column ${position + 1}: ${message}`);
    this.name = 'ParseError';
  }

  /**
   * 1-based column of the offending character
   */
  get column(): number {
    return this.position + 1;
  }
}

/**
 * Format a user-friendly error message with the expression and a caret
 */
export function formatParseError(
  error: ParseError,
  source: string,
  verbose: boolean = false
): string {
  let output = `Error: ${error.message.replace(/^Parse error at column \d+: /, '')}\n`;

  // Expressions are single-line; show them as-is with a caret underneath
  const line = source.replace(/\r?\n/g, ' ');
  if (line.length > 0) {
    output += `\n  ${line}\n`;
    const caretPos = Math.max(0, Math.min(error.position, line.length));
    output += `  ${' '.repeat(caretPos)}^\n`;
  }

  output += formatErrorGuidance(error);

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}

function formatErrorGuidance(error: ParseError): string {
  const msg = error.message.toLowerCase();

  if (msg.includes("expected ')'") || msg.includes("unmatched ')'")) {
    return `
💡 Tip: Every '(' needs a matching ')'.
`;
  }

  if (msg.includes('unexpected character')) {
    return `
💡 Tip: Expressions may only contain identifiers, numbers,
        the operators + - * / ^ and parentheses.
`;
  }

  return '';
}

export class RegisterBudgetExceededError extends Error {
  constructor(
    message: string,
    public budget: number,
    public required: number
  ) {
    super(`Register budget exceeded: ${message} (budget ${budget}, required ${required})`);
    this.name = 'RegisterBudgetExceededError';
  }
}

export class EvaluationError extends Error {
  constructor(
    message: string,
    public operand: string
  ) {
    super(`Evaluation error for '${operand}': ${message}`);
    this.name = 'EvaluationError';
  }
}

export class CodeGenError extends Error {
  constructor(
    message: string,
    public node: number,
    public reason?: string
  ) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Code generation error for node n${node}: ${message}${reasonInfo}`);
    this.name = 'CodeGenError';
  }
}

export class ExpressionTooDeepError extends Error {
  constructor(
    public depth: number,
    public limit: number
  ) {
    super(`Expression too deep: depth ${depth} exceeds the limit of ${limit}`);
    this.name = 'ExpressionTooDeepError';
  }
}

export class InvalidOptionError extends Error {
  constructor(
    public option: string,
    public value: unknown,
    reason: string
  ) {
    super(`Invalid ${option} ${String(value)}: ${reason}`);
    this.name = 'InvalidOptionError';
  }
}
