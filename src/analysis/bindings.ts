import { walk } from 'estree-walker';
import type { Directive, ModuleDeclaration, Node, Pattern, Statement } from 'estree';
import type { ScopeStack } from './scope.js';

export type BodyItem = Statement | ModuleDeclaration | Directive;

/** Every name a binding pattern introduces, in source order. */
export function patternNames(pattern: Pattern): string[] {
  switch (pattern.type) {
    case 'Identifier':
      return [pattern.name];
    case 'ObjectPattern':
      return pattern.properties.flatMap((prop) =>
        prop.type === 'RestElement' ? patternNames(prop.argument) : patternNames(prop.value)
      );
    case 'ArrayPattern':
      return pattern.elements.flatMap((element) => (element ? patternNames(element) : []));
    case 'RestElement':
      return patternNames(pattern.argument);
    case 'AssignmentPattern':
      return patternNames(pattern.left);
    case 'MemberExpression':
      // assignment target, binds nothing
      return [];
  }
}

/**
 * Collect `var` names declared anywhere under `root`, without crossing into
 * nested functions or class static blocks, which own their own `var` scope.
 */
export function collectVarNames(root: Node): string[] {
  const names: string[] = [];

  walk(root, {
    enter(node) {
      if (
        node.type === 'FunctionDeclaration' ||
        node.type === 'FunctionExpression' ||
        node.type === 'ArrowFunctionExpression' ||
        node.type === 'StaticBlock'
      ) {
        this.skip();
        return;
      }

      if (node.type === 'VariableDeclaration' && node.kind === 'var') {
        for (const declarator of node.declarations) {
          names.push(...patternNames(declarator.id));
        }
      }
    },
  });

  return names;
}

/**
 * Bind the lexical declarations that sit directly in a statement list:
 * `let`/`const`, functions, classes and imports, unwrapping exports.
 */
export function hoistLexical(body: BodyItem[], scopes: ScopeStack): void {
  for (const item of body) {
    const statement =
      (item.type === 'ExportNamedDeclaration' || item.type === 'ExportDefaultDeclaration') &&
      item.declaration
        ? item.declaration
        : item;

    switch (statement.type) {
      case 'FunctionDeclaration':
      case 'ClassDeclaration':
        if (statement.id) scopes.bind(statement.id.name, 'declaration');
        break;
      case 'VariableDeclaration':
        if (statement.kind !== 'var') {
          for (const declarator of statement.declarations) {
            for (const name of patternNames(declarator.id)) scopes.bind(name, 'lexical');
          }
        }
        break;
      case 'ImportDeclaration':
        for (const specifier of statement.specifiers) scopes.bind(specifier.local.name, 'import');
        break;
      default:
        break;
    }
  }
}

/** Hoisting for a script or function body: every `var` plus the top-level lexical names. */
export function hoistBody(body: BodyItem[], scopes: ScopeStack): void {
  for (const item of body) {
    for (const name of collectVarNames(item)) scopes.bindVar(name);
  }
  hoistLexical(body, scopes);
}
