import { describe, it, expect } from 'vitest';
import type { Property, SimpleCallExpression } from 'estree';
import {
  GLOBAL_LIFETIME,
  LifetimeTracker,
  REQUEST_LIFETIME,
  calleePath,
} from '../../src/analysis/lifetime.js';
import { parseJavaScript } from '../../src/parsers/javascript.js';

function callOf(source: string): SimpleCallExpression {
  const statement = parseJavaScript(source, 'test.js').body[0];
  if (statement.type !== 'ExpressionStatement' || statement.expression.type !== 'CallExpression') {
    throw new Error(`expected a call expression in: ${source}`);
  }
  return statement.expression;
}

function exportedProperties(source: string): Property[] {
  const statement = parseJavaScript(source, 'test.js').body[0];
  if (
    statement.type !== 'ExportDefaultDeclaration' ||
    statement.declaration.type !== 'ObjectExpression'
  ) {
    throw new Error(`expected an exported object in: ${source}`);
  }
  return statement.declaration.properties.flatMap((p) => (p.type === 'Property' ? [p] : []));
}

const alwaysFree = () => true;

describe('calleePath', () => {
  it('joins identifier and member chains', () => {
    expect(calleePath(callOf("self.addEventListener('fetch', f)").callee)).toEqual({
      path: 'self.addEventListener',
      root: 'self',
    });
    expect(calleePath(callOf('register()').callee)).toEqual({ path: 'register', root: 'register' });
  });

  it('accepts computed string keys', () => {
    expect(calleePath(callOf("a['b'].c()").callee)).toEqual({ path: 'a.b.c', root: 'a' });
  });

  it('has no path for dynamic callees', () => {
    expect(calleePath(callOf('a[b]()').callee)).toBeUndefined();
    expect(calleePath(callOf('make()()').callee)).toBeUndefined();
  });
});

describe('LifetimeTracker', () => {
  it('marks the configured argument of a registration call', () => {
    const tracker = new LifetimeTracker([{ callee: 'register', argument: 1 }]);
    const slots = tracker.handlerArguments(callOf('register("onRequest", function () {})'), alwaysFree);
    expect([...slots]).toEqual([1]);
  });

  it('ignores registration names that are locally bound', () => {
    const tracker = new LifetimeTracker([{ callee: 'register', argument: 1 }]);
    const slots = tracker.handlerArguments(callOf('register("onRequest", function () {})'), () => false);
    expect(slots.size).toBe(0);
  });

  it('checks the event name when the registration has one', () => {
    const tracker = new LifetimeTracker([{ callee: 'addEventListener', argument: 1, event: 'fetch' }]);
    expect(tracker.handlerArguments(callOf("addEventListener('scheduled', () => {})"), alwaysFree).size).toBe(0);
    expect([...tracker.handlerArguments(callOf("addEventListener('fetch', () => {})"), alwaysFree)]).toEqual([1]);
  });

  it('does not match other callees', () => {
    const tracker = new LifetimeTracker([{ callee: 'self.addEventListener', argument: 1 }]);
    expect(tracker.handlerArguments(callOf("addEventListener('fetch', () => {})"), alwaysFree).size).toBe(0);
  });

  it('switches exported handler methods to the request lifetime', () => {
    const tracker = new LifetimeTracker([], ['fetch']);
    const [fetchMethod, helper, config] = exportedProperties(
      'export default { fetch() {}, helper() {}, fetchTimeout: 10 };'
    );
    expect(tracker.contextForExportedProperty(fetchMethod, GLOBAL_LIFETIME)).toBe(REQUEST_LIFETIME);
    expect(tracker.contextForExportedProperty(helper, GLOBAL_LIFETIME)).toBe(GLOBAL_LIFETIME);
    expect(tracker.contextForExportedProperty(config, GLOBAL_LIFETIME)).toBe(GLOBAL_LIFETIME);
  });

  it('only switches function-valued exported properties', () => {
    const tracker = new LifetimeTracker([], ['fetch']);
    const [property] = exportedProperties('export default { fetch: handler };');
    expect(tracker.contextForExportedProperty(property, GLOBAL_LIFETIME)).toBe(GLOBAL_LIFETIME);
  });
});
