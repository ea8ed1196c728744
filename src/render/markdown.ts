/**
 * Markdown help document renderer
 */

import type {
  CallableDeclaration,
  ContainerDeclaration,
  ModuleTree,
} from '../types/index.js';
import { formatParameter, normalizeParameters } from '../analyzer/signature.js';
import { AnchorRegistry, anchorSlug } from './anchors.js';
import { renderUsage } from './usage.js';

export const NO_HELP = 'No help provided.';
export const TOP_ANCHOR = 'top';

export interface RenderOptions {
  exclusions?: ReadonlySet<string>;
  /** Render a separate Arguments block for each callable */
  includeArguments?: boolean;
}

export interface CallableUnit {
  declaration: CallableDeclaration;
  anchor: string;
}

export interface ContainerUnit {
  declaration: ContainerDeclaration;
  anchor: string;
  methods: CallableUnit[];
}

export type DocumentUnit =
  | ({ kind: 'container' } & ContainerUnit)
  | ({ kind: 'function' } & CallableUnit);

/**
 * Decide what renders, in source order, and assign every unit its anchor
 */
export function planDocument(tree: ModuleTree, exclusions: ReadonlySet<string> = new Set()): DocumentUnit[] {
  const anchors = new AnchorRegistry();
  const units: DocumentUnit[] = [];

  for (const declaration of tree.declarations) {
    if (exclusions.has(declaration.name)) continue;

    if (declaration.kind === 'container') {
      const anchor = anchors.claim(anchorSlug('class', declaration.name));
      const methods: CallableUnit[] = [];
      for (const member of declaration.members) {
        if (member.kind !== 'callable' || exclusions.has(member.name)) continue;
        methods.push({
          declaration: member,
          anchor: anchors.claim(anchorSlug('method', declaration.name, member.name)),
        });
      }
      units.push({
        kind: 'container',
        declaration,
        anchor,
        methods,
      });
    } else if (declaration.kind === 'callable') {
      units.push({
        kind: 'function',
        declaration,
        anchor: anchors.claim(anchorSlug('func', declaration.name)),
      });
    }
  }

  return units;
}

function link(name: string, anchor: string): string {
  return `[\`${name}\`](#${anchor})`;
}

function blockquote(text: string): string {
  return text
    .split('\n')
    .map(line => (line.trim() ? `> ${line}` : '>'))
    .join('\n');
}

function helpBlock(documentation: string | null, heading: string): string {
  const help = documentation?.trim();
  return `${heading} Help:\n${blockquote(help ? help : NO_HELP)}`;
}

function argumentsBlock(callable: CallableDeclaration, heading: string): string {
  const lines = normalizeParameters(callable.parameters).map(parameter => `- ${formatParameter(parameter)}`);
  return `${heading} Arguments:\n${lines.length > 0 ? lines.join('\n') : '_No arguments._'}`;
}

function usageBlock(callable: CallableDeclaration, container: ContainerDeclaration | null, heading: string): string {
  return `${heading} Usage:\n\`\`\`python\n${renderUsage(callable, container)}\n\`\`\``;
}

function renderCallable(
  unit: CallableUnit,
  container: ContainerUnit | null,
  includeArguments: boolean
): string[] {
  const { declaration } = unit;
  const heading = container ? '###' : '##';
  const subheading = `${heading}#`;

  const blocks = [
    `<a id="${unit.anchor}"></a>`,
    `${heading} ${container ? 'Method' : 'Function'}: \`${declaration.name}\``,
  ];

  if (includeArguments) {
    blocks.push(argumentsBlock(declaration, subheading));
  }
  blocks.push(helpBlock(declaration.documentation, subheading));
  blocks.push(usageBlock(declaration, container?.declaration ?? null, subheading));
  blocks.push(
    container
      ? `[Back to \`${container.declaration.name}\`](#${container.anchor}) or [Classes](#${TOP_ANCHOR})`
      : `[Back to top](#${TOP_ANCHOR})`
  );

  return blocks;
}

function renderContainer(unit: ContainerUnit, includeArguments: boolean): string[] {
  const blocks = [
    `<a id="${unit.anchor}"></a>`,
    `## Class: \`${unit.declaration.name}\``,
    helpBlock(unit.declaration.documentation, '###'),
  ];

  if (unit.methods.length > 0) {
    blocks.push(`### Quick Links:\n${unit.methods.map(m => link(m.declaration.name, m.anchor)).join(' | ')}`);
  }

  for (const method of unit.methods) {
    blocks.push(...renderCallable(method, unit, includeArguments));
  }
  return blocks;
}

function renderTableOfContents(units: DocumentUnit[]): string[] {
  const blocks = [`<a id="${TOP_ANCHOR}"></a>`, '## Table of Contents'];

  const classes = units.filter(unit => unit.kind === 'container');
  if (classes.length > 0) {
    blocks.push(`### Classes:\n${classes.map(unit => link(unit.declaration.name, unit.anchor)).join(' | ')}`);
  }

  const functions = units.filter(unit => unit.kind === 'function');
  if (functions.length > 0) {
    blocks.push(`### Functions:\n${functions.map(unit => link(unit.declaration.name, unit.anchor)).join(' | ')}`);
  }

  return blocks;
}

/**
 * Render the full help document, or '' when nothing is left to render
 */
export function renderDocument(tree: ModuleTree, options: RenderOptions = {}): string {
  const includeArguments = options.includeArguments ?? false;
  const units = planDocument(tree, options.exclusions);
  if (units.length === 0) return '';

  const blocks = renderTableOfContents(units);
  for (const unit of units) {
    blocks.push(
      ...(unit.kind === 'container'
        ? renderContainer(unit, includeArguments)
        : renderCallable(unit, null, includeArguments))
    );
  }

  return `${blocks.join('\n\n')}\n`;
}
