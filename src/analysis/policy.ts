import type { LifetimeContext, RestrictionList } from '../types.js';

export interface AvailabilityLists {
  unavailable: Iterable<string>;
  requestOnly: Iterable<string>;
}

/**
 * Denylist/allowlist pair over free identifiers. Names on neither list are
 * treated as ordinary user globals.
 */
export class AvailabilityPolicy {
  readonly unavailable: ReadonlySet<string>;
  readonly requestOnly: ReadonlySet<string>;

  constructor(lists: AvailabilityLists) {
    this.unavailable = new Set(lists.unavailable);
    // a name on both lists is unavailable
    this.requestOnly = new Set(
      [...lists.requestOnly].filter((name) => !this.unavailable.has(name))
    );
  }

  restriction(name: string): RestrictionList | undefined {
    if (this.unavailable.has(name)) return 'unavailable';
    if (this.requestOnly.has(name)) return 'request-only';
    return undefined;
  }

  permitted(name: string, context: LifetimeContext): boolean {
    const list = this.restriction(name);
    if (list === 'unavailable') return false;
    if (list === 'request-only') return context.inRequestLifetime;
    return true;
  }
}
