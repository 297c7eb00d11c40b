import type { Program } from 'estree';
import { GLOBAL_LIFETIME, LifetimeTracker } from './analysis/lifetime.js';
import type { AvailabilityPolicy } from './analysis/policy.js';
import { Walker } from './analysis/walker.js';
import { DEFAULT_EXPORTED_HANDLERS, DEFAULT_HANDLERS } from './defaults.js';
import { finalize } from './diagnostics.js';
import { PolicyViolationError } from './errors.js';
import type {
  HandlerRegistration,
  LifetimeContext,
  LintResult,
  PolicyViolation,
  SourceMapResolver,
} from './types.js';

export interface LintOptions {
  handlers?: readonly HandlerRegistration[];
  exportedHandlers?: readonly string[];
  sourceMap?: SourceMapResolver;
  /** Source text the tree was parsed from; needed for line/column and source maps. */
  source?: string;
  filePath?: string;
  /** Keep walking after the first violation and report all of them. */
  reportAll?: boolean;
  initialContext?: LifetimeContext;
}

/**
 * Lint one parsed program. By default the pass stops at the first violation
 * in traversal order and reports only that one.
 */
export function lint(tree: Program, policy: AvailabilityPolicy, options: LintOptions = {}): LintResult {
  const violations: PolicyViolation[] = [];
  const walker = new Walker({
    policy,
    lifetime: new LifetimeTracker(
      options.handlers ?? DEFAULT_HANDLERS,
      options.exportedHandlers ?? DEFAULT_EXPORTED_HANDLERS
    ),
    onViolation: options.reportAll
      ? (violation) => {
          violations.push(violation);
        }
      : (violation) => {
          throw new PolicyViolationError(violation);
        },
  });

  try {
    walker.lintProgram(tree, options.initialContext ?? GLOBAL_LIFETIME);
  } catch (err) {
    if (!(err instanceof PolicyViolationError)) throw err;
    violations.push(err.violation);
  }

  return finalize(violations, {
    source: options.source,
    filePath: options.filePath,
    sourceMap: options.sourceMap,
  });
}
