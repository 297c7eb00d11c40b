import type { AvailabilityPolicy } from './analysis/policy.js';
import { lint } from './linter.js';
import { parseJavaScript } from './parsers/javascript.js';
import type { HandlerRegistration, LintResult, SourceMapResolver } from './types.js';

export interface LintFileOptions {
  filePath: string;
  source: string;
  policy: AvailabilityPolicy;
  handlers?: readonly HandlerRegistration[];
  exportedHandlers?: readonly string[];
  sourceMap?: SourceMapResolver;
  reportAll?: boolean;
}

/** Parse and lint one file. Syntax errors surface as `ParseError`. */
export function lintFile(options: LintFileOptions): LintResult {
  const { filePath, source, policy, ...rest } = options;
  const program = parseJavaScript(source, filePath);
  return lint(program, policy, { ...rest, source, filePath });
}
