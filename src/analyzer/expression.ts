/**
 * Canonical rendering and structural dumps of expression snapshots
 */

import type { ExpressionNode } from '../types/index.js';
import { decodeStringLiteral, reprLiteral, type StringLiteral } from './strings.js';

export type RenderResult = { kind: 'rendered'; text: string } | { kind: 'opaque' };

/** Placeholder for values that have no safe canonical text */
export const OPAQUE_PLACEHOLDER = '...';

const TOKEN_TYPES = new Set(['identifier', 'integer', 'float', 'true', 'false', 'none', 'ellipsis']);

// Parentheses around these never change meaning, so the renderer drops them
const ATOMIC_TYPES = new Set([
  'identifier', 'integer', 'float', 'true', 'false', 'none', 'ellipsis',
  'string', 'concatenated_string', 'attribute', 'subscript', 'call',
  'list', 'tuple', 'set', 'dictionary', 'parenthesized_expression',
]);

/**
 * Render an expression to canonical source text.
 * Total: anything without a safe canonical form comes back as opaque.
 */
export function renderExpression(node: ExpressionNode): RenderResult {
  const text = render(node);
  return text === null ? { kind: 'opaque' } : { kind: 'rendered', text };
}

/**
 * Canonical text, or the opaque placeholder
 */
export function canonicalText(node: ExpressionNode): string {
  const result = renderExpression(node);
  return result.kind === 'rendered' ? result.text : OPAQUE_PLACEHOLDER;
}

function render(node: ExpressionNode): string | null {
  const { children } = node;

  switch (node.type) {
    case 'identifier':
      return node.text;
    case 'integer':
      return renderInteger(node.text);
    case 'float':
      return renderFloat(node.text);
    case 'true':
      return 'True';
    case 'false':
      return 'False';
    case 'none':
      return 'None';
    case 'ellipsis':
      return '...';
    case 'string':
    case 'concatenated_string': {
      const literal = literalOf(node);
      if (!literal || literal.isFormatted) return null;
      return reprLiteral(literal.value, literal.isBytes);
    }
    case 'type':
      return children.length === 1 && children[0] ? render(children[0]) : null;
    case 'attribute':
    case 'member_type':
      return join(children, '.');
    case 'subscript':
    case 'generic_type': {
      const [value, ...rest] = children;
      if (!value) return null;
      const head = render(value);
      const index = join(rest, ', ');
      return head === null || index === null ? null : `${head}[${index}]`;
    }
    case 'type_parameter':
      return join(children, ', ');
    case 'union_type':
      return join(children, ' | ');
    case 'call': {
      const [fn, args] = children;
      if (!fn || !args || args.type !== 'argument_list') return null;
      const head = render(fn);
      const rendered = render(args);
      return head === null || rendered === null ? null : `${head}${rendered}`;
    }
    case 'argument_list':
      return wrap('(', join(children, ', '), ')');
    case 'keyword_argument': {
      const [name, value] = children;
      if (!name || !value) return null;
      return wrap(`${name.text}=`, render(value), '');
    }
    case 'list_splat':
      return children[0] ? wrap('*', render(children[0]), '') : null;
    case 'dictionary_splat':
      return children[0] ? wrap('**', render(children[0]), '') : null;
    case 'list':
      return wrap('[', join(children, ', '), ']');
    case 'set':
      return wrap('{', join(children, ', '), '}');
    case 'tuple':
      return children.length === 1 && children[0]
        ? wrap('(', render(children[0]), ',)')
        : wrap('(', join(children, ', '), ')');
    case 'dictionary':
      return wrap('{', join(children, ', '), '}');
    case 'pair':
      return join(children, ': ');
    case 'unary_operator': {
      const [operand] = children;
      const op = node.operators[0];
      if (!operand || !op) return null;
      return wrap(op, render(operand), '');
    }
    case 'not_operator':
      return children[0] ? wrap('not ', render(children[0]), '') : null;
    case 'binary_operator':
    case 'boolean_operator': {
      const [left, right] = children;
      const op = node.operators[0];
      if (!left || !right || !op) return null;
      const l = render(left);
      const r = render(right);
      return l === null || r === null ? null : `${l} ${op} ${r}`;
    }
    case 'comparison_operator': {
      if (node.operators.length !== children.length - 1) return null;
      const parts: string[] = [];
      for (const [index, child] of children.entries()) {
        const rendered = render(child);
        if (rendered === null) return null;
        if (index > 0) parts.push(node.operators[index - 1] ?? '');
        parts.push(rendered);
      }
      return parts.join(' ');
    }
    case 'parenthesized_expression': {
      const [inner] = children;
      if (!inner || children.length !== 1) return null;
      const rendered = render(inner);
      if (rendered === null) return null;
      return ATOMIC_TYPES.has(inner.type) ? rendered : `(${rendered})`;
    }
    default:
      return null;
  }
}

function join(children: ExpressionNode[], separator: string): string | null {
  const parts: string[] = [];
  for (const child of children) {
    const rendered = render(child);
    if (rendered === null) return null;
    parts.push(rendered);
  }
  return parts.join(separator);
}

function wrap(open: string, inner: string | null, close: string): string | null {
  return inner === null ? null : `${open}${inner}${close}`;
}

function renderInteger(text: string): string {
  const cleaned = text.replace(/_/g, '').toLowerCase();
  if (/^(0x[0-9a-f]+|0o[0-7]+|0b[01]+|\d+)$/.test(cleaned)) {
    return BigInt(cleaned).toString();
  }
  return cleaned;
}

function renderFloat(text: string): string {
  const cleaned = text.replace(/_/g, '').toLowerCase();
  if (cleaned.endsWith('j')) return cleaned;

  const value = Number(cleaned);
  if (Number.isNaN(value)) return cleaned;
  if (!Number.isFinite(value)) return 'inf';

  // Shortest round-tripping digits, laid out with Python's repr thresholds
  const [mantissa = '', exponentText = '0'] = value.toExponential().split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 16) {
    const sign = exponent < 0 ? '-' : '+';
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

/**
 * Decoded value of a string or implicitly concatenated strings.
 * Mixing bytes and text is a syntax error, so it yields null.
 */
function literalOf(node: ExpressionNode): StringLiteral | null {
  if (node.type === 'string') return decodeStringLiteral(node.text);
  if (node.type !== 'concatenated_string') return null;

  const parts = node.children.map(child => (child.type === 'string' ? decodeStringLiteral(child.text) : null));
  const first = parts[0];
  if (!first) return null;

  let value = '';
  let isFormatted = false;
  for (const part of parts) {
    if (!part || part.isBytes !== first.isBytes) return null;
    value += part.value;
    isFormatted = isFormatted || part.isFormatted;
  }

  return {
    prefix: first.isBytes ? 'b' : '',
    value,
    isBytes: first.isBytes,
    isRaw: false,
    isFormatted,
  };
}

/**
 * Structural dump: node kinds, operators and token text.
 * Whitespace, comments, redundant parentheses and quote style leave no trace;
 * numeric spelling does (`0x10` and `16` dump differently).
 */
export function dumpExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'parenthesized_expression':
    case 'type': {
      const [inner] = node.children;
      if (inner && node.children.length === 1) return dumpExpression(inner);
      break;
    }
    case 'string':
    case 'concatenated_string': {
      const literal = literalOf(node);
      if (literal) {
        const kind = literal.isBytes ? 'bytes' : literal.isFormatted ? 'fstring' : 'str';
        return `string(${kind}, ${JSON.stringify(literal.value)})`;
      }
      return `string(${JSON.stringify(node.text)})`;
    }
  }

  if (node.children.length === 0) {
    return TOKEN_TYPES.has(node.type) ? `${node.type}(${JSON.stringify(node.text)})` : `${node.type}()`;
  }

  const ops = node.operators.length > 0 ? `[${node.operators.join(' ')}]` : '';
  return `${node.type}${ops}(${node.children.map(dumpExpression).join(', ')})`;
}
