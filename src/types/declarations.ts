/**
 * Core declaration types for the help generator
 */

export type ParameterKind = 'positional' | 'variadic-positional' | 'keyword-only' | 'variadic-keyword';
export type DeclarationKind = 'container' | 'callable' | 'other';

/**
 * Parser-independent snapshot of a source expression.
 * Comments and line continuations are never part of `children`.
 */
export interface ExpressionNode {
  type: string;
  text: string;
  operators: string[];
  children: ExpressionNode[];
}

export interface ParameterSpec {
  name: string;
  annotation: ExpressionNode | null;
}

/**
 * Raw parameter list, laid out like Python's own `arguments` node:
 * positional defaults belong to the trailing positional parameters,
 * keyword-only defaults line up by index.
 */
export interface ParameterList {
  positional: ParameterSpec[];
  positionalOnlyCount: number;
  defaults: ExpressionNode[];
  variadic: ParameterSpec | null;
  keywordOnly: ParameterSpec[];
  keywordDefaults: Array<ExpressionNode | null>;
  variadicKeyword: ParameterSpec | null;
}

/** Canonical parameter, independent of source formatting */
export interface Parameter {
  name: string;
  kind: ParameterKind;
  typeAnnotation: string;
  defaultValue: string | null;
}

interface DeclarationBase {
  name: string;
  documentation: string | null;
  decorators: ExpressionNode[];
}

export interface ContainerDeclaration extends DeclarationBase {
  kind: 'container';
  bases: ExpressionNode[];
  keywords: ExpressionNode[];
  members: Declaration[];
}

export interface CallableDeclaration extends DeclarationBase {
  kind: 'callable';
  parameters: ParameterList;
  returnType: ExpressionNode | null;
  isAsync: boolean;
  members: Declaration[];
}

export interface OtherDeclaration {
  kind: 'other';
  name: string;
  node: ExpressionNode;
}

export type Declaration = ContainerDeclaration | CallableDeclaration | OtherDeclaration;

export interface ModuleTree {
  path: string;
  declarations: Declaration[];
}
