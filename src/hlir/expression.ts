import { formatHeaderRef, validityOf } from './fieldId';
import { Expression, FieldId } from './types';

export function expressionReads(expression: Expression): FieldId[] {
  const reads: FieldId[] = [];
  const walk = (node: Expression) => {
    switch (node.kind) {
      case 'field':
        reads.push(node.field);
        break;
      case 'valid':
        reads.push(validityOf(node.header));
        break;
      case 'unary':
        walk(node.operand);
        break;
      case 'binary':
        walk(node.left);
        walk(node.right);
        break;
      default:
        break;
    }
  };
  walk(expression);
  return reads;
}

/** Source-like rendering of a condition, used for graph labels. */
export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'field':
      return expression.field;
    case 'const':
      return String(expression.value);
    case 'valid':
      return `valid(${formatHeaderRef(expression.header)})`;
    case 'unary':
      return expression.op === 'not'
        ? `not ${formatExpression(expression.operand)}`
        : `${expression.op}${formatExpression(expression.operand)}`;
    case 'binary':
      return `(${formatExpression(expression.left)} ${expression.op} ${formatExpression(expression.right)})`;
  }
}
