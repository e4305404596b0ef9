/**
 * Structured filter expressions and their Airtable formula form.
 *
 * @example
 * ```typescript
 * const formula = and(eq('Status', 'Open'), gt('Priority', 2));
 * toFormulaString(formula); // "AND({Status}='Open', {Priority}>2)"
 * ```
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Literal values a formula can compare against.
 */
export type FormulaValue = string | number | boolean | null | Date;

export type ComparisonOperator = '=' | '!=' | '>' | '>=' | '<' | '<=';

export type FormulaNode =
  | { type: 'field'; name: string }
  | { type: 'value'; value: FormulaValue }
  | { type: 'compare'; operator: ComparisonOperator; left: FormulaNode; right: FormulaNode }
  | { type: 'and'; operands: FormulaNode[] }
  | { type: 'or'; operands: FormulaNode[] }
  | { type: 'not'; operand: FormulaNode }
  | { type: 'raw'; text: string };

/**
 * Left-hand side of a comparison: a field name or any node.
 */
export type FormulaOperand = string | FormulaNode;

/**
 * Right-hand side of a comparison: a literal or any node.
 */
export type FormulaArgument = FormulaValue | FormulaNode;

// ============================================================================
// Schema
// ============================================================================

const comparisonOperatorSchema = z.enum(['=', '!=', '>', '>=', '<', '<=']);

/**
 * Schema for formula nodes arriving as JSON. Dates are not representable in
 * JSON, so values are limited to strings, numbers, booleans and null.
 */
export const formulaNodeSchema: z.ZodType<FormulaNode> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('field'), name: z.string().min(1) }),
    z.object({
      type: z.literal('value'),
      value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
    }),
    z.object({
      type: z.literal('compare'),
      operator: comparisonOperatorSchema,
      left: formulaNodeSchema,
      right: formulaNodeSchema,
    }),
    z.object({ type: z.literal('and'), operands: z.array(formulaNodeSchema).min(1) }),
    z.object({ type: z.literal('or'), operands: z.array(formulaNodeSchema).min(1) }),
    z.object({ type: z.literal('not'), operand: formulaNodeSchema }),
    z.object({ type: z.literal('raw'), text: z.string() }),
  ])
);

// ============================================================================
// Builders
// ============================================================================

export function isFormulaNode(value: FormulaArgument): value is FormulaNode {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

export function field(name: string): FormulaNode {
  return { type: 'field', name };
}

export function value(literal: FormulaValue): FormulaNode {
  return { type: 'value', value: literal };
}

export function raw(text: string): FormulaNode {
  return { type: 'raw', text };
}

function compare(operator: ComparisonOperator, left: FormulaOperand, right: FormulaArgument): FormulaNode {
  return {
    type: 'compare',
    operator,
    left: typeof left === 'string' ? field(left) : left,
    right: isFormulaNode(right) ? right : value(right),
  };
}

export const eq = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('=', left, right);
export const ne = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('!=', left, right);
export const gt = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('>', left, right);
export const gte = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('>=', left, right);
export const lt = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('<', left, right);
export const lte = (left: FormulaOperand, right: FormulaArgument): FormulaNode => compare('<=', left, right);

export function and(...operands: FormulaNode[]): FormulaNode {
  return { type: 'and', operands };
}

export function or(...operands: FormulaNode[]): FormulaNode {
  return { type: 'or', operands };
}

export function not(operand: FormulaNode): FormulaNode {
  return { type: 'not', operand };
}

/**
 * Builds an equality test for every entry, joined with AND.
 *
 * A single entry yields the bare comparison.
 *
 * @throws {ValidationError} If `fields` is empty
 */
export function match(fields: Record<string, FormulaValue>): FormulaNode {
  const comparisons = Object.entries(fields).map(([name, literal]) => eq(name, literal));
  const [only] = comparisons;
  if (only === undefined) {
    throw new ValidationError('match() requires at least one field');
  }
  return comparisons.length === 1 ? only : and(...comparisons);
}

// ============================================================================
// Serialization
// ============================================================================

function quote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function literalToString(literal: FormulaValue): string {
  if (literal === null) return 'BLANK()';
  if (literal instanceof Date) return `DATETIME_PARSE(${quote(literal.toISOString())})`;
  if (typeof literal === 'string') return quote(literal);
  if (typeof literal === 'boolean') return literal ? 'TRUE()' : 'FALSE()';
  if (!Number.isFinite(literal)) {
    throw new ValidationError(`Cannot use ${literal} in a formula`);
  }
  return String(literal);
}

function joinOperands(fn: 'AND' | 'OR', operands: FormulaNode[]): string {
  if (operands.length === 0) {
    throw new ValidationError(`${fn} requires at least one operand`);
  }
  return `${fn}(${operands.map(formulaToString).join(', ')})`;
}

/**
 * Renders a node as Airtable formula text.
 */
export function formulaToString(node: FormulaNode): string {
  switch (node.type) {
    case 'field':
      return `{${node.name.replace(/}/g, '\\}')}}`;
    case 'value':
      return literalToString(node.value);
    case 'compare':
      return `${formulaToString(node.left)}${node.operator}${formulaToString(node.right)}`;
    case 'and':
      return joinOperands('AND', node.operands);
    case 'or':
      return joinOperands('OR', node.operands);
    case 'not':
      return `NOT(${formulaToString(node.operand)})`;
    case 'raw':
      return node.text;
  }
}

/**
 * Accepts either form; strings pass through untouched.
 */
export function toFormulaString(formula: string | FormulaNode): string {
  return typeof formula === 'string' ? formula : formulaToString(formula);
}
