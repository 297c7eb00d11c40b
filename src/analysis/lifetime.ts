import type { CallExpression, Expression, PrivateIdentifier, Property, Super } from 'estree';
import type { HandlerRegistration, LifetimeContext } from '../types.js';

export const GLOBAL_LIFETIME: LifetimeContext = Object.freeze({ inRequestLifetime: false });
export const REQUEST_LIFETIME: LifetimeContext = Object.freeze({ inRequestLifetime: true });

interface CalleePath {
  path: string;
  root: string;
}

function literalString(node: Expression | PrivateIdentifier): string | undefined {
  return node.type === 'Literal' && typeof node.value === 'string' ? node.value : undefined;
}

/**
 * `a.b['c']` resolves to `{ path: 'a.b.c', root: 'a' }`. Anything dynamic
 * along the chain (calls, computed non-literal keys, `super`) has no path.
 */
export function calleePath(node: Expression | Super): CalleePath | undefined {
  if (node.type === 'Identifier') {
    return { path: node.name, root: node.name };
  }
  if (node.type !== 'MemberExpression' || node.property.type === 'PrivateIdentifier') {
    return undefined;
  }

  const object = calleePath(node.object);
  if (!object) return undefined;

  const property = node.computed
    ? literalString(node.property)
    : node.property.type === 'Identifier'
      ? node.property.name
      : undefined;
  if (property === undefined) return undefined;

  return { path: `${object.path}.${property}`, root: object.root };
}

/**
 * Decides which nested function bodies run in the request lifetime. The
 * decision is syntactic: only function literals written directly in a
 * registered argument slot, or as a handler method of the default export,
 * switch context.
 */
export class LifetimeTracker {
  private readonly registrations: Map<string, HandlerRegistration[]>;
  private readonly exportedHandlers: ReadonlySet<string>;

  constructor(registrations: readonly HandlerRegistration[], exportedHandlers: readonly string[] = []) {
    this.registrations = new Map();
    for (const registration of registrations) {
      const existing = this.registrations.get(registration.callee) ?? [];
      existing.push(registration);
      this.registrations.set(registration.callee, existing);
    }
    this.exportedHandlers = new Set(exportedHandlers);
  }

  /**
   * Argument positions of `call` that hold request handlers. `isFree` guards
   * against local functions that happen to share a registration API's name.
   */
  handlerArguments(call: CallExpression, isFree: (name: string) => boolean): ReadonlySet<number> {
    const slots = new Set<number>();
    const callee = calleePath(call.callee);
    if (!callee || !isFree(callee.root)) return slots;

    for (const registration of this.registrations.get(callee.path) ?? []) {
      if (registration.event !== undefined) {
        const first = call.arguments[0];
        if (!first || first.type !== 'Literal' || first.value !== registration.event) continue;
      }
      slots.add(registration.argument);
    }
    return slots;
  }

  /** Context for the value of a property on an `export default { ... }` object. */
  contextForExportedProperty(property: Property, ambient: LifetimeContext): LifetimeContext {
    if (
      property.value.type !== 'FunctionExpression' &&
      property.value.type !== 'ArrowFunctionExpression'
    ) {
      return ambient;
    }
    const name = property.computed
      ? literalString(property.key)
      : property.key.type === 'Identifier'
        ? property.key.name
        : property.key.type === 'Literal'
          ? String(property.key.value)
          : undefined;

    return name !== undefined && this.exportedHandlers.has(name) ? REQUEST_LIFETIME : ambient;
  }
}
