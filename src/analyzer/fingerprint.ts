/**
 * Per-declaration content fingerprints
 */

import crypto from 'node:crypto';

import type { Declaration, FingerprintRecord, ModuleTree } from '../types/index.js';
import { dumpExpression } from './expression.js';
import { functionSignature } from './signature.js';

function sha256(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Hash of a declaration's canonical content.
 *
 * Containers hash their own header plus the signature and documentation of
 * each direct callable member. Nested containers are not descended into here;
 * they receive their own key from collectFingerprints.
 */
export function fingerprint(declaration: Declaration): string {
  switch (declaration.kind) {
    case 'container': {
      let content = `ClassDef:${declaration.name}:${declaration.documentation ?? ''}:`;
      content += `bases:${declaration.bases.map(dumpExpression).join(',')}:`;
      content += `keywords:${declaration.keywords.map(dumpExpression).join(',')}:`;
      content += `decorators:${declaration.decorators.map(dumpExpression).join(',')}:`;

      for (const member of declaration.members) {
        if (member.kind === 'callable') {
          content += `|${member.name}:${functionSignature(member)}:${member.documentation ?? ''}`;
        }
      }
      return sha256(content);
    }
    case 'callable': {
      let content = `FunctionDef:${declaration.name}:${declaration.documentation ?? ''}:`;
      content += `decorators:${declaration.decorators.map(dumpExpression).join(',')}:`;
      content += `signature:${functionSignature(declaration)}`;
      return sha256(content);
    }
    case 'other':
      return sha256(dumpExpression(declaration.node));
  }
}

/**
 * Key that stays stable while names and nesting do. The kind prefix keeps
 * function `X` and class `X` apart.
 */
export function qualifiedKey(declaration: Declaration, scope: string[] = []): string {
  const qualifiedName = [...scope, declaration.name].join('.');
  switch (declaration.kind) {
    case 'container':
      return `class_${qualifiedName}`;
    case 'callable':
      return `def_${qualifiedName}`;
    case 'other':
      return `other_${qualifiedName}`;
  }
}

/**
 * Fingerprint every declaration in the module, at any depth.
 * A redefinition in the same scope replaces the earlier entry.
 */
export function collectFingerprints(tree: ModuleTree): FingerprintRecord {
  const record: FingerprintRecord = {};

  const visit = (declarations: Declaration[], scope: string[]): void => {
    for (const declaration of declarations) {
      record[qualifiedKey(declaration, scope)] = fingerprint(declaration);
      if (declaration.kind !== 'other') {
        visit(declaration.members, [...scope, declaration.name]);
      }
    }
  };

  visit(tree.declarations, []);
  return record;
}
