import type {
  BaseClass,
  BaseFunction,
  CatchClause,
  ExportDefaultDeclaration,
  ExportNamedDeclaration,
  Expression,
  Identifier,
  ImportExpression,
  MemberExpression,
  MethodDefinition,
  Node,
  ObjectExpression,
  Pattern,
  PrivateIdentifier,
  Program,
  PropertyDefinition,
  SimpleCallExpression,
  SpreadElement,
  Statement,
  StaticBlock,
  Super,
  VariableDeclaration,
} from 'estree';
import { MalformedInputError } from '../errors.js';
import type { BindingKind, LifetimeContext, PolicyViolation } from '../types.js';
import { hoistBody, hoistLexical, patternNames, type BodyItem } from './bindings.js';
import { REQUEST_LIFETIME, type LifetimeTracker } from './lifetime.js';
import type { AvailabilityPolicy } from './policy.js';
import { ScopeStack } from './scope.js';

// Stage 3 syntax the parser emits and the ESTree typings do not cover.
interface Decorator {
  type: 'Decorator';
  expression: Expression;
}
interface Decorated {
  decorators?: Decorator[] | null;
}
interface AccessorProperty extends Omit<PropertyDefinition, 'type'> {
  type: 'AccessorProperty';
}
type ClassMember = (MethodDefinition | PropertyDefinition | AccessorProperty | StaticBlock) & Decorated;
type DynamicImport = ImportExpression & { options?: Expression | null };

type FunctionNode = BaseFunction & { id?: Identifier | null };
type ClassNode = BaseClass & Decorated & { id?: Identifier | null };
type PatternMode = 'binding' | 'assignment';

export interface WalkerOptions {
  policy: AvailabilityPolicy;
  lifetime: LifetimeTracker;
  /** Called for every violation; throwing from here ends the pass. */
  onViolation: (violation: PolicyViolation) => void;
}

/** Offset of a node in the parsed source, as reported by the parser. */
export function offsetOf(node: Node): number {
  if ('start' in node && typeof node.start === 'number') return node.start;
  return node.range?.[0] ?? 0;
}

function unreachable(node: { type: string }): never {
  throw new MalformedInputError(node.type);
}

function isFunctionLiteral(node: Expression | SpreadElement): boolean {
  return node.type === 'FunctionExpression' || node.type === 'ArrowFunctionExpression';
}

/**
 * Walks one program, tracking lexical scope and lifetime context, and reports
 * free identifier references the availability policy rejects. A walker owns
 * its scope stack and is good for a single pass.
 */
export class Walker {
  private readonly scopes = new ScopeStack();
  private readonly policy: AvailabilityPolicy;
  private readonly lifetime: LifetimeTracker;
  private readonly onViolation: (violation: PolicyViolation) => void;

  constructor(options: WalkerOptions) {
    this.policy = options.policy;
    this.lifetime = options.lifetime;
    this.onViolation = options.onViolation;
  }

  lintProgram(program: Program, context: LifetimeContext): void {
    this.scopes.withFrame('script', () => {
      hoistBody(program.body, this.scopes);
      for (const item of program.body) {
        this.lintBodyItem(item, context);
      }
    });
  }

  // ============================================
  // Statements
  // ============================================

  private lintBodyItem(item: BodyItem, context: LifetimeContext): void {
    switch (item.type) {
      case 'ImportDeclaration':
      case 'ExportAllDeclaration':
        // imports were bound when the body was hoisted
        return;
      case 'ExportNamedDeclaration':
        return this.lintExportNamed(item, context);
      case 'ExportDefaultDeclaration':
        return this.lintExportDefault(item, context);
      default:
        return this.lintStatement(item, context);
    }
  }

  private lintStatement(node: Statement, context: LifetimeContext): void {
    switch (node.type) {
      case 'ExpressionStatement':
        return this.lintExpression(node.expression, context);

      case 'BlockStatement':
        return this.lintBlock(node.body, context);

      case 'EmptyStatement':
      case 'DebuggerStatement':
      case 'BreakStatement':
      case 'ContinueStatement':
        return;

      case 'WithStatement':
        this.lintExpression(node.object, context);
        return this.lintStatement(node.body, context);

      case 'ReturnStatement':
        if (node.argument) this.lintExpression(node.argument, context);
        return;

      case 'LabeledStatement':
        return this.lintStatement(node.body, context);

      case 'IfStatement':
        this.lintExpression(node.test, context);
        this.lintStatement(node.consequent, context);
        if (node.alternate) this.lintStatement(node.alternate, context);
        return;

      case 'SwitchStatement': {
        this.lintExpression(node.discriminant, context);
        const { cases } = node;
        // all cases share one block scope
        return this.scopes.withFrame('block', () => {
          hoistLexical(
            cases.flatMap((switchCase) => switchCase.consequent),
            this.scopes
          );
          for (const switchCase of cases) {
            if (switchCase.test) this.lintExpression(switchCase.test, context);
            for (const statement of switchCase.consequent) {
              this.lintStatement(statement, context);
            }
          }
        });
      }

      case 'ThrowStatement':
        return this.lintExpression(node.argument, context);

      case 'TryStatement':
        this.lintBlock(node.block.body, context);
        if (node.handler) this.lintCatch(node.handler, context);
        if (node.finalizer) this.lintBlock(node.finalizer.body, context);
        return;

      case 'WhileStatement':
      case 'DoWhileStatement':
        this.lintExpression(node.test, context);
        return this.lintStatement(node.body, context);

      case 'ForStatement': {
        const { init, test, update, body } = node;
        return this.scopes.withFrame('loop', () => {
          if (init) {
            if (init.type === 'VariableDeclaration') {
              this.lintVariableDeclaration(init, context, 'loop');
            } else {
              this.lintExpression(init, context);
            }
          }
          if (test) this.lintExpression(test, context);
          if (update) this.lintExpression(update, context);
          this.lintStatement(body, context);
        });
      }

      case 'ForInStatement':
      case 'ForOfStatement': {
        const { left, right, body } = node;
        return this.scopes.withFrame('loop', () => {
          if (left.type === 'VariableDeclaration') {
            this.lintVariableDeclaration(left, context, 'loop');
          } else {
            this.lintPattern(left, context, 'assignment');
          }
          this.lintExpression(right, context);
          this.lintStatement(body, context);
        });
      }

      case 'FunctionDeclaration':
        if (node.id) this.scopes.bind(node.id.name, 'declaration');
        return this.lintFunction(node, context);

      case 'VariableDeclaration':
        return this.lintVariableDeclaration(node, context, 'lexical');

      case 'ClassDeclaration':
        if (node.id) this.scopes.bind(node.id.name, 'declaration');
        return this.lintClass(node, context);

      default:
        return unreachable(node);
    }
  }

  private lintBlock(body: Statement[], context: LifetimeContext): void {
    this.scopes.withFrame('block', () => {
      hoistLexical(body, this.scopes);
      for (const statement of body) {
        this.lintStatement(statement, context);
      }
    });
  }

  private lintCatch(clause: CatchClause, context: LifetimeContext): void {
    const { param, body } = clause;
    this.scopes.withFrame('catch', () => {
      if (param) {
        for (const name of patternNames(param)) this.scopes.bind(name, 'catch');
      }
      this.lintBlock(body.body, context);
      if (param) this.lintPattern(param, context, 'binding');
    });
  }

  private lintVariableDeclaration(
    node: VariableDeclaration,
    context: LifetimeContext,
    kind: BindingKind
  ): void {
    for (const declarator of node.declarations) {
      for (const name of patternNames(declarator.id)) {
        if (node.kind === 'var') {
          this.scopes.bindVar(name);
        } else {
          this.scopes.bind(name, kind);
        }
      }
      if (declarator.init) this.lintExpression(declarator.init, context);
      this.lintPattern(declarator.id, context, 'binding');
    }
  }

  private lintExportNamed(node: ExportNamedDeclaration, context: LifetimeContext): void {
    if (node.declaration) {
      return this.lintStatement(node.declaration, context);
    }
    // `export { x } from 'mod'` re-exports without reading a local binding
    if (node.source) return;

    for (const specifier of node.specifiers) {
      if (specifier.local.type === 'Identifier') {
        this.reference(specifier.local, context);
      }
    }
  }

  private lintExportDefault(node: ExportDefaultDeclaration, context: LifetimeContext): void {
    const { declaration } = node;
    switch (declaration.type) {
      case 'FunctionDeclaration':
        if (declaration.id) this.scopes.bind(declaration.id.name, 'declaration');
        return this.lintFunction(declaration, context);
      case 'ClassDeclaration':
        if (declaration.id) this.scopes.bind(declaration.id.name, 'declaration');
        return this.lintClass(declaration, context);
      case 'ObjectExpression':
        return this.lintObject(declaration, context, true);
      default:
        return this.lintExpression(declaration, context);
    }
  }

  // ============================================
  // Functions and classes
  // ============================================

  private lintFunction(node: FunctionNode, context: LifetimeContext): void {
    const { id, params, body } = node;
    this.scopes.withFrame('function', () => {
      // a function expression's own name is visible only inside it
      if (id && node.type === 'FunctionExpression') this.scopes.bind(id.name, 'declaration');
      for (const param of params) {
        for (const name of patternNames(param)) this.scopes.bind(name, 'parameter');
      }
      for (const param of params) {
        this.lintPattern(param, context, 'binding');
      }

      if (body.type !== 'BlockStatement') {
        return this.lintExpression(body, context);
      }
      // parameter defaults cannot see body declarations, so the body gets its own frame
      const statements = body.body;
      this.scopes.withFrame('function', () => {
        hoistBody(statements, this.scopes);
        for (const statement of statements) {
          this.lintStatement(statement, context);
        }
      });
    });
  }

  private lintClass(node: ClassNode, context: LifetimeContext): void {
    const { id, superClass, body } = node;
    this.lintDecorators(node.decorators, context);
    if (superClass) this.lintExpression(superClass, context);

    const members: readonly ClassMember[] = body.body;
    this.scopes.withFrame('class', () => {
      if (id) this.scopes.bind(id.name, 'declaration');

      for (const member of members) {
        if (member.type !== 'StaticBlock') this.lintDecorators(member.decorators, context);
        switch (member.type) {
          case 'MethodDefinition':
            this.lintKey(member.key, member.computed, context);
            this.lintFunction(member.value, context);
            break;
          case 'PropertyDefinition':
          case 'AccessorProperty':
            this.lintKey(member.key, member.computed, context);
            if (member.value) this.lintExpression(member.value, context);
            break;
          case 'StaticBlock': {
            const statements = member.body;
            // static blocks own a var scope, like a function body
            this.scopes.withFrame('function', () => {
              hoistBody(statements, this.scopes);
              for (const statement of statements) {
                this.lintStatement(statement, context);
              }
            });
            break;
          }
          default:
            unreachable(member);
        }
      }
    });
  }

  private lintDecorators(decorators: Decorator[] | null | undefined, context: LifetimeContext): void {
    for (const decorator of decorators ?? []) {
      this.lintExpression(decorator.expression, context);
    }
  }

  private lintKey(key: Expression | PrivateIdentifier, computed: boolean, context: LifetimeContext): void {
    if (computed && key.type !== 'PrivateIdentifier') {
      this.lintExpression(key, context);
    }
  }

  // ============================================
  // Patterns
  // ============================================

  /**
   * Binding patterns only contribute their computed keys and default values;
   * their names are bound by the caller. Assignment patterns additionally
   * read every identifier target.
   */
  private lintPattern(pattern: Pattern, context: LifetimeContext, mode: PatternMode): void {
    switch (pattern.type) {
      case 'Identifier':
        if (mode === 'assignment') this.reference(pattern, context);
        return;

      case 'MemberExpression':
        return this.lintMember(pattern, context);

      case 'ObjectPattern':
        for (const property of pattern.properties) {
          if (property.type === 'RestElement') {
            this.lintPattern(property.argument, context, mode);
          } else {
            this.lintKey(property.key, property.computed, context);
            this.lintPattern(property.value, context, mode);
          }
        }
        return;

      case 'ArrayPattern':
        for (const element of pattern.elements) {
          if (element) this.lintPattern(element, context, mode);
        }
        return;

      case 'RestElement':
        return this.lintPattern(pattern.argument, context, mode);

      case 'AssignmentPattern':
        this.lintPattern(pattern.left, context, mode);
        return this.lintExpression(pattern.right, context);

      default:
        return unreachable(pattern);
    }
  }

  // ============================================
  // Expressions
  // ============================================

  private lintExpression(node: Expression, context: LifetimeContext): void {
    switch (node.type) {
      case 'Identifier':
        return this.reference(node, context);

      case 'Literal':
      case 'ThisExpression':
      case 'MetaProperty':
        return;

      case 'ArrayExpression':
        for (const element of node.elements) {
          if (element) this.lintArgument(element, context);
        }
        return;

      case 'ObjectExpression':
        return this.lintObject(node, context, false);

      case 'FunctionExpression':
      case 'ArrowFunctionExpression':
        return this.lintFunction(node, context);

      case 'ClassExpression':
        return this.lintClass(node, context);

      case 'TemplateLiteral':
        for (const expression of node.expressions) {
          this.lintExpression(expression, context);
        }
        return;

      case 'TaggedTemplateExpression':
        this.lintExpression(node.tag, context);
        return this.lintExpression(node.quasi, context);

      case 'UnaryExpression':
      case 'UpdateExpression':
      case 'AwaitExpression':
        return this.lintExpression(node.argument, context);

      case 'YieldExpression':
        if (node.argument) this.lintExpression(node.argument, context);
        return;

      case 'BinaryExpression':
        // `#field in obj` has a private name on the left
        if (node.left.type !== 'PrivateIdentifier') this.lintExpression(node.left, context);
        return this.lintExpression(node.right, context);

      case 'LogicalExpression':
        this.lintExpression(node.left, context);
        return this.lintExpression(node.right, context);

      case 'AssignmentExpression':
        if (node.left.type === 'Identifier' || node.left.type === 'MemberExpression') {
          this.lintPattern(node.left, context, 'assignment');
          return this.lintExpression(node.right, context);
        }
        // destructuring reads the value before assigning targets
        this.lintExpression(node.right, context);
        return this.lintPattern(node.left, context, 'assignment');

      case 'ConditionalExpression':
        this.lintExpression(node.test, context);
        this.lintExpression(node.consequent, context);
        return this.lintExpression(node.alternate, context);

      case 'CallExpression':
        return this.lintCall(node, context);

      case 'NewExpression':
        this.lintCallee(node.callee, context);
        for (const argument of node.arguments) {
          this.lintArgument(argument, context);
        }
        return;

      case 'MemberExpression':
        return this.lintMember(node, context);

      case 'ChainExpression':
        return node.expression.type === 'CallExpression'
          ? this.lintCall(node.expression, context)
          : this.lintMember(node.expression, context);

      case 'SequenceExpression':
        for (const expression of node.expressions) {
          this.lintExpression(expression, context);
        }
        return;

      case 'ImportExpression': {
        const dynamicImport: DynamicImport = node;
        this.lintExpression(dynamicImport.source, context);
        if (dynamicImport.options) this.lintExpression(dynamicImport.options, context);
        return;
      }

      default:
        return unreachable(node);
    }
  }

  private lintCall(node: SimpleCallExpression, context: LifetimeContext): void {
    this.lintCallee(node.callee, context);

    const handlerSlots = this.lifetime.handlerArguments(node, (name) => this.scopes.isFree(name));
    node.arguments.forEach((argument, index) => {
      const argumentContext =
        handlerSlots.has(index) && isFunctionLiteral(argument) ? REQUEST_LIFETIME : context;
      this.lintArgument(argument, argumentContext);
    });
  }

  private lintCallee(callee: Expression | Super, context: LifetimeContext): void {
    if (callee.type !== 'Super') this.lintExpression(callee, context);
  }

  private lintArgument(node: Expression | SpreadElement, context: LifetimeContext): void {
    this.lintExpression(node.type === 'SpreadElement' ? node.argument : node, context);
  }

  /** Only the object, and the key of computed access, are references. */
  private lintMember(node: MemberExpression, context: LifetimeContext): void {
    this.lintCallee(node.object, context);
    if (node.computed && node.property.type !== 'PrivateIdentifier') {
      this.lintExpression(node.property, context);
    }
  }

  private lintObject(node: ObjectExpression, context: LifetimeContext, exported: boolean): void {
    for (const property of node.properties) {
      if (property.type === 'SpreadElement') {
        this.lintExpression(property.argument, context);
        continue;
      }

      this.lintKey(property.key, property.computed, context);
      const valueContext = exported
        ? this.lifetime.contextForExportedProperty(property, context)
        : context;

      const { value } = property;
      switch (value.type) {
        case 'ObjectPattern':
        case 'ArrayPattern':
        case 'RestElement':
        case 'AssignmentPattern':
          this.lintPattern(value, valueContext, 'assignment');
          break;
        default:
          this.lintExpression(value, valueContext);
      }
    }
  }

  private reference(node: Identifier, context: LifetimeContext): void {
    if (!this.scopes.isFree(node.name)) return;
    if (this.policy.permitted(node.name, context)) return;

    const list = this.policy.restriction(node.name);
    if (list === undefined) return;
    this.onViolation({ name: node.name, list, offset: offsetOf(node) });
  }
}
