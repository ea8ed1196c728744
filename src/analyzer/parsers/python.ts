/**
 * Python parser using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import type {
  CallableDeclaration,
  ContainerDeclaration,
  Declaration,
  ExpressionNode,
  ModuleTree,
  ParameterList,
  ParameterSpec,
} from '../../types/index.js';
import { ParseFailure } from '../errors.js';
import { cleanDocstring, decodeStringLiteral } from '../strings.js';
import { ModuleParser, type ParserOptions } from './base.js';

interface TreeSitterNode {
  type: string;
  text: string;
  startIndex: number;
  endIndex: number;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: TreeSitterNode[];
  childForFieldName(name: string): TreeSitterNode | null;
  childrenForFieldName(name: string): TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  parent: TreeSitterNode | null;
}

const EXTRA_TYPES = new Set(['comment', 'line_continuation']);

// Compound statements whose bodies still belong to the enclosing scope
const COMPOUND_TYPES = new Set([
  'block',
  'if_statement',
  'elif_clause',
  'else_clause',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
  'for_statement',
  'while_statement',
]);

export class PythonParser extends ModuleParser {
  private parser: Parser;

  constructor(options: ParserOptions = {}) {
    super(options);
    this.parser = new Parser();
    this.parser.setLanguage(Python as unknown as Parser.Language);
  }

  get extensions(): string[] {
    return ['py', 'pyi'];
  }

  parse(filePath: string, content: string): ModuleTree {
    if (this.isFileTooLarge(content)) {
      throw new ParseFailure(filePath, 'File too large to parse');
    }

    let tree: Parser.Tree;
    try {
      // The default input buffer rejects sources over 32K characters
      tree = this.parser.parse(content, undefined, { bufferSize: content.length * 2 + 1 });
    } catch (error) {
      throw new ParseFailure(filePath, 'Parser rejected the source', null, { cause: error });
    }
    const root = tree.rootNode as unknown as TreeSitterNode;

    const invalid = this.findInvalidNode(root);
    if (invalid) {
      throw new ParseFailure(filePath, `Syntax error near "${invalid.text.slice(0, 40)}"`, invalid.startPosition.row + 1);
    }

    return {
      path: filePath,
      declarations: this.extractDeclarations(root, filePath),
    };
  }

  /**
   * First ERROR node, or a zero-width leaf inserted by error recovery
   */
  private findInvalidNode(node: TreeSitterNode): TreeSitterNode | null {
    if (node.type === 'ERROR') return node;
    if (node.parent && node.children.length === 0 && node.startIndex === node.endIndex) return node;

    for (const child of node.children) {
      const invalid = this.findInvalidNode(child);
      if (invalid) return invalid;
    }
    return null;
  }

  private named(node: TreeSitterNode): TreeSitterNode[] {
    return node.namedChildren.filter(child => !EXTRA_TYPES.has(child.type));
  }

  private extractDeclarations(scope: TreeSitterNode, filePath: string): Declaration[] {
    const declarations: Declaration[] = [];

    for (const child of this.named(scope)) {
      if (child.type === 'class_definition') {
        declarations.push(this.parseClass(child, filePath, []));
      } else if (child.type === 'function_definition') {
        declarations.push(this.parseFunction(child, filePath, []));
      } else if (child.type === 'decorated_definition') {
        const declaration = this.parseDecorated(child, filePath);
        if (declaration) declarations.push(declaration);
      } else if (COMPOUND_TYPES.has(child.type)) {
        declarations.push(...this.extractDeclarations(child, filePath));
      }
    }

    return declarations;
  }

  private parseDecorated(node: TreeSitterNode, filePath: string): Declaration | null {
    const definition = node.childForFieldName('definition');
    if (!definition) return null;

    const decorators = this.named(node)
      .filter(child => child.type === 'decorator')
      .flatMap(decorator => this.named(decorator).slice(0, 1))
      .map(expression => this.toExpression(expression));

    if (definition.type === 'class_definition') {
      return this.parseClass(definition, filePath, decorators);
    }
    if (definition.type === 'function_definition') {
      return this.parseFunction(definition, filePath, decorators);
    }
    return null;
  }

  private parseClass(node: TreeSitterNode, filePath: string, decorators: ExpressionNode[]): ContainerDeclaration {
    const name = this.requireField(node, 'name', filePath).text;
    const superclasses = node.childForFieldName('superclasses');
    const args = superclasses ? this.named(superclasses) : [];
    const body = node.childForFieldName('body');

    return {
      kind: 'container',
      name,
      documentation: this.parseDocstring(body, filePath),
      decorators,
      bases: args.filter(arg => arg.type !== 'keyword_argument').map(arg => this.toExpression(arg)),
      keywords: args.filter(arg => arg.type === 'keyword_argument').map(arg => this.toExpression(arg)),
      members: body ? this.extractDeclarations(body, filePath) : [],
    };
  }

  private parseFunction(node: TreeSitterNode, filePath: string, decorators: ExpressionNode[]): CallableDeclaration {
    const name = this.requireField(node, 'name', filePath).text;
    const returnType = node.childForFieldName('return_type');
    const body = node.childForFieldName('body');

    return {
      kind: 'callable',
      name,
      documentation: this.parseDocstring(body, filePath),
      decorators,
      parameters: this.parseParameters(node, filePath),
      returnType: returnType ? this.toExpression(returnType) : null,
      isAsync: node.children.some(child => child.type === 'async'),
      members: body ? this.extractDeclarations(body, filePath) : [],
    };
  }

  private parseParameters(funcNode: TreeSitterNode, filePath: string): ParameterList {
    const list: ParameterList = {
      positional: [],
      positionalOnlyCount: 0,
      defaults: [],
      variadic: null,
      keywordOnly: [],
      keywordDefaults: [],
      variadicKeyword: null,
    };

    const paramsNode = funcNode.childForFieldName('parameters');
    if (!paramsNode) return list;

    let keywordOnly = false;

    for (const param of this.named(paramsNode)) {
      if (param.type === 'positional_separator') {
        list.positionalOnlyCount = list.positional.length;
        continue;
      }
      if (param.type === 'keyword_separator') {
        keywordOnly = true;
        continue;
      }

      // `*args: int` and `**kwargs: str` arrive wrapped in typed_parameter
      const typeNode = param.childForFieldName('type');
      const target = param.type === 'typed_parameter' ? (this.named(param)[0] ?? param) : param;

      if (target.type === 'list_splat_pattern') {
        list.variadic = this.splatSpec(target, typeNode);
        keywordOnly = true;
        continue;
      }
      if (target.type === 'dictionary_splat_pattern') {
        list.variadicKeyword = this.splatSpec(target, typeNode);
        continue;
      }

      const nameNode = param.childForFieldName('name') ?? target;
      const valueNode = param.childForFieldName('value');
      const spec: ParameterSpec = {
        name: nameNode.text,
        annotation: typeNode ? this.toExpression(typeNode) : null,
      };
      const defaultValue = valueNode ? this.toExpression(valueNode) : null;

      if (keywordOnly) {
        list.keywordOnly.push(spec);
        list.keywordDefaults.push(defaultValue);
      } else {
        if (!defaultValue && list.defaults.length > 0) {
          throw new ParseFailure(
            filePath,
            'non-default argument follows default argument',
            param.startPosition.row + 1
          );
        }
        list.positional.push(spec);
        if (defaultValue) list.defaults.push(defaultValue);
      }
    }

    return list;
  }

  private splatSpec(pattern: TreeSitterNode, typeNode: TreeSitterNode | null): ParameterSpec {
    return {
      name: this.named(pattern)[0]?.text ?? pattern.text.replace(/^\*+/, ''),
      annotation: typeNode ? this.toExpression(typeNode) : null,
    };
  }

  private parseDocstring(body: TreeSitterNode | null, filePath: string): string | null {
    const firstStatement = body ? this.named(body)[0] : undefined;
    if (!firstStatement || firstStatement.type !== 'expression_statement') return null;

    const expr = this.named(firstStatement)[0];
    if (!expr) return null;

    const parts = expr.type === 'string' ? [expr] : expr.type === 'concatenated_string' ? this.named(expr) : [];
    if (parts.length === 0) return null;

    let raw = '';
    for (const part of parts) {
      const literal = decodeStringLiteral(part.text);
      if (!literal) {
        throw new ParseFailure(filePath, 'Invalid escape in docstring', part.startPosition.row + 1);
      }
      if (literal.isBytes || literal.isFormatted) return null;
      raw += literal.value;
    }

    const docstring = cleanDocstring(raw);
    return docstring.length > 0 ? docstring : null;
  }

  private toExpression(node: TreeSitterNode): ExpressionNode {
    return {
      type: node.type,
      text: node.text,
      operators: this.operatorsOf(node),
      children: node.type === 'string' ? [] : this.named(node).map(child => this.toExpression(child)),
    };
  }

  private operatorsOf(node: TreeSitterNode): string[] {
    if (node.type === 'comparison_operator') {
      return node.childrenForFieldName('operators').map(op => op.type);
    }
    const operator = node.childForFieldName('operator');
    return operator ? [operator.type] : [];
  }

  private requireField(node: TreeSitterNode, field: string, filePath: string): TreeSitterNode {
    const child = node.childForFieldName(field);
    if (!child) {
      throw new ParseFailure(filePath, `${node.type} without ${field}`, node.startPosition.row + 1);
    }
    return child;
  }
}
