/**
 * Usage examples for callables
 */

import type { CallableDeclaration, ContainerDeclaration, Parameter } from '../types/index.js';
import { canonicalText } from '../analyzer/expression.js';
import { displayName, normalizeParameters } from '../analyzer/signature.js';

export const CONSTRUCTOR_NAME = '__init__';

const INDENT = '    ';

export function receiverName(container: ContainerDeclaration): string {
  return `self.${container.name.toLowerCase()}_obj`;
}

export function isStaticMethod(callable: CallableDeclaration): boolean {
  return callable.decorators.some(decorator => canonicalText(decorator) === 'staticmethod');
}

/**
 * Call arguments for the example. Methods drop their receiver (`self`/`cls`)
 * unless they are static.
 */
export function usageArguments(callable: CallableDeclaration, isMethod: boolean): string[] {
  let parameters: Parameter[] = normalizeParameters(callable.parameters);
  if (isMethod && !isStaticMethod(callable) && parameters[0]?.kind === 'positional') {
    parameters = parameters.slice(1);
  }

  return parameters.map(parameter => {
    if (parameter.defaultValue === null || parameter.kind === 'variadic-positional' || parameter.kind === 'variadic-keyword') {
      return displayName(parameter);
    }
    return `${parameter.name}=${parameter.defaultValue}`;
  });
}

export function formatCall(callee: string, args: string[]): string {
  if (args.length === 0) return `${callee}()`;
  if (args.length === 1) return `${callee}(${args[0]})`;
  return `${callee}(\n${args.map(arg => `${INDENT}${arg}`).join(',\n')}\n)`;
}

/**
 * Example code for a top-level function, a constructor or a method
 */
export function renderUsage(callable: CallableDeclaration, container: ContainerDeclaration | null = null): string {
  const awaitPrefix = callable.isAsync ? 'await ' : '';
  const args = usageArguments(callable, container !== null);

  if (!container) {
    return `${awaitPrefix}${formatCall(callable.name, args)}`;
  }

  const receiver = receiverName(container);
  if (callable.name === CONSTRUCTOR_NAME) {
    return `${receiver} = ${formatCall(container.name, args)}`;
  }
  return `${receiver} = ${container.name}\n\n${awaitPrefix}${formatCall(`${receiver}.${callable.name}`, args)}`;
}
