/**
 * Signature normalization for callable declarations
 */

import type {
  CallableDeclaration,
  ExpressionNode,
  Parameter,
  ParameterList,
  ParameterSpec,
} from '../types/index.js';
import { canonicalText, dumpExpression } from './expression.js';

/** Type shown for parameters without an annotation */
export const ANY_TYPE = 'Any';

function annotationText(annotation: ExpressionNode | null): string {
  return annotation ? canonicalText(annotation) : ANY_TYPE;
}

/**
 * Canonical parameters in call order: positional, *args, keyword-only, **kwargs.
 *
 * Positional defaults fill the trailing positional parameters, so parameter `i`
 * of `N` takes default `i - (N - D)` when `i >= N - D`. Keyword-only defaults
 * line up by index.
 */
export function normalizeParameters(list: ParameterList): Parameter[] {
  const parameters: Parameter[] = [];
  const firstDefaulted = list.positional.length - list.defaults.length;

  list.positional.forEach((spec, index) => {
    const defaultNode = index >= firstDefaulted ? list.defaults[index - firstDefaulted] : undefined;
    parameters.push({
      name: spec.name,
      kind: 'positional',
      typeAnnotation: annotationText(spec.annotation),
      defaultValue: defaultNode ? canonicalText(defaultNode) : null,
    });
  });

  if (list.variadic) {
    parameters.push({
      name: list.variadic.name,
      kind: 'variadic-positional',
      typeAnnotation: annotationText(list.variadic.annotation),
      defaultValue: null,
    });
  }

  list.keywordOnly.forEach((spec, index) => {
    const defaultNode = list.keywordDefaults[index] ?? null;
    parameters.push({
      name: spec.name,
      kind: 'keyword-only',
      typeAnnotation: annotationText(spec.annotation),
      defaultValue: defaultNode ? canonicalText(defaultNode) : null,
    });
  });

  if (list.variadicKeyword) {
    parameters.push({
      name: list.variadicKeyword.name,
      kind: 'variadic-keyword',
      typeAnnotation: annotationText(list.variadicKeyword.annotation),
      defaultValue: null,
    });
  }

  return parameters;
}

/**
 * Parameter name with its star prefix
 */
export function displayName(parameter: Parameter): string {
  switch (parameter.kind) {
    case 'variadic-positional':
      return `*${parameter.name}`;
    case 'variadic-keyword':
      return `**${parameter.name}`;
    default:
      return parameter.name;
  }
}

/**
 * `name: type` or `name: type = default`
 */
export function formatParameter(parameter: Parameter): string {
  const head = `${displayName(parameter)}: ${parameter.typeAnnotation}`;
  return parameter.defaultValue === null ? head : `${head} = ${parameter.defaultValue}`;
}

/**
 * Full signature string used for fingerprinting.
 *
 * Besides the canonical parameter lines it embeds structural dumps of every
 * default and annotation. A default edited to a different spelling of the same
 * value (`0x10` -> `16`) therefore still counts as a change.
 */
export function functionSignature(callable: CallableDeclaration): string {
  const list = callable.parameters;
  const parameters = normalizeParameters(list);
  const parts: string[] = [];

  for (const parameter of parameters) {
    if (parameter.kind === 'keyword-only' && !list.variadic && !parts.includes('*')) {
      parts.push('*');
    }
    parts.push(formatParameter(parameter));
    if (parameter.kind === 'positional' && parts.length === list.positionalOnlyCount) {
      parts.push('/');
    }
  }

  let signature = `${callable.isAsync ? 'async ' : ''}(${parts.join(', ')})`;
  if (callable.returnType) {
    signature += ` -> ${canonicalText(callable.returnType)}`;
  }

  if (list.defaults.length > 0) {
    signature += ` defaults=[${list.defaults.map(dumpExpression).join(', ')}]`;
  }

  if (list.keywordDefaults.some(node => node !== null)) {
    const dumps = list.keywordDefaults.map(node => (node ? dumpExpression(node) : '-'));
    signature += ` kw_defaults=[${dumps.join(', ')}]`;
  }

  const annotations = annotationDumps(list, callable.returnType);
  if (annotations.length > 0) {
    signature += ` annotations=[${annotations.join(', ')}]`;
  }

  return signature;
}

function annotationDumps(list: ParameterList, returnType: ExpressionNode | null): string[] {
  const specs: ParameterSpec[] = [
    ...list.positional,
    ...(list.variadic ? [list.variadic] : []),
    ...list.keywordOnly,
    ...(list.variadicKeyword ? [list.variadicKeyword] : []),
  ];

  const dumps = specs.flatMap(spec =>
    spec.annotation ? [`${spec.name}:${dumpExpression(spec.annotation)}`] : []
  );

  if (returnType) {
    dumps.push(`return:${dumpExpression(returnType)}`);
  }
  return dumps;
}
