/**
 * AST nodes for arithmetic expressions
 * Operand order is the source order and is significant for - / ^
 */

export type BinaryOperator = '+' | '-' | '*' | '/' | '^';

/**
 * Expression types
 */
export type Expression =
  | NumberLiteral
  | Variable
  | BinaryOp
  | UnaryOp;

/**
 * Number literal
 */
export interface NumberLiteral {
  kind: 'number';
  value: number;
}

/**
 * Variable reference
 */
export interface Variable {
  kind: 'variable';
  name: string;
}

/**
 * Binary operation
 */
export interface BinaryOp {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

/**
 * Unary minus
 */
export interface UnaryOp {
  kind: 'unary';
  operator: '-';
  operand: Expression;
}

/**
 * Visitor pattern for AST traversal
 */
export interface ASTVisitor<T> {
  visitNumber(node: NumberLiteral): T;
  visitVariable(node: Variable): T;
  visitBinary(node: BinaryOp): T;
  visitUnary(node: UnaryOp): T;
}

/**
 * Helper to visit any expression node
 */
export function visitExpression<T>(visitor: ASTVisitor<T>, expr: Expression): T {
  switch (expr.kind) {
    case 'number':
      return visitor.visitNumber(expr);
    case 'variable':
      return visitor.visitVariable(expr);
    case 'binary':
      return visitor.visitBinary(expr);
    case 'unary':
      return visitor.visitUnary(expr);
  }
}

export function makeNumber(value: number): NumberLiteral {
  return { kind: 'number', value };
}

export function makeVariable(name: string): Variable {
  return { kind: 'variable', name };
}

export function makeBinaryOp(
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryOp {
  return { kind: 'binary', operator, left, right };
}

export function makeNegation(operand: Expression): UnaryOp {
  return { kind: 'unary', operator: '-', operand };
}

/**
 * Length of the longest path from the root to a leaf (a leaf has depth 0).
 * Walks an explicit stack so arbitrarily deep trees can be measured.
 */
export function expressionDepth(expr: Expression): number {
  let deepest = 0;
  const stack: [Expression, number][] = [[expr, 0]];

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const [node, depth] = entry;
    deepest = Math.max(deepest, depth);
    if (node.kind === 'binary') {
      stack.push([node.left, depth + 1], [node.right, depth + 1]);
    } else if (node.kind === 'unary') {
      stack.push([node.operand, depth + 1]);
    }
  }

  return deepest;
}

const PRECEDENCE: Record<BinaryOperator, number> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
  '^': 4
};

/**
 * Render an expression with the minimum parentheses needed to re-parse it
 */
export function expressionToString(expr: Expression): string {
  return visitExpression(printer, expr);
}

const printer: ASTVisitor<string> = {
  visitNumber: node => (node.value < 0 ? `(${node.value})` : `${node.value}`),
  visitVariable: node => node.name,
  visitUnary: node => {
    const inner = expressionToString(node.operand);
    return node.operand.kind === 'binary' ? `-(${inner})` : `-${inner}`;
  },
  visitBinary: node => {
    const prec = PRECEDENCE[node.operator];
    const rightAssoc = node.operator === '^';

    let left = expressionToString(node.left);
    if (needsParens(node.left, prec, rightAssoc)) {
      left = `(${left})`;
    }

    let right = expressionToString(node.right);
    if (needsParens(node.right, prec, !rightAssoc)) {
      right = `(${right})`;
    }

    return `${left} ${node.operator} ${right}`;
  }
};

function needsParens(child: Expression, parentPrec: number, strict: boolean): boolean {
  if (child.kind === 'unary') {
    // Unary minus binds looser than ^
    return parentPrec > 3;
  }
  if (child.kind !== 'binary') {
    return false;
  }
  const childPrec = PRECEDENCE[child.operator];
  return strict ? childPrec <= parentPrec : childPrec < parentPrec;
}
