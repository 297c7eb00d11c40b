import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadConfig, resolvePolicy } from './config.js';
import { lintFile } from './engine.js';
import { ParseError } from './errors.js';
import { scanFiles } from './scanner.js';
import { loadSourceMapFor } from './sourcemap.js';
import type { CheckResult, Diagnostic, LifetimeLintConfig, ParseFailure } from './types.js';

export interface CheckOptions {
  config?: LifetimeLintConfig;
  reportAll?: boolean;
  sourceMaps?: boolean;
}

function relativeTo(root: string, diagnostic: Diagnostic): Diagnostic {
  if (!diagnostic.filePath || !path.isAbsolute(diagnostic.filePath)) return diagnostic;
  return { ...diagnostic, filePath: path.relative(root, diagnostic.filePath) };
}

export async function check(projectRoot: string, options: CheckOptions = {}): Promise<CheckResult> {
  const resolvedRoot = path.resolve(projectRoot);
  const config = options.config ?? loadConfig(resolvedRoot);
  const { policy, handlers, exportedHandlers } = resolvePolicy(config);
  const reportAll = options.reportAll ?? config.reportAll ?? false;
  const useSourceMaps = options.sourceMaps ?? config.sourceMaps ?? true;

  const filePaths = await scanFiles(resolvedRoot, config);

  const diagnostics: Diagnostic[] = [];
  const parseFailures: ParseFailure[] = [];

  for (const filePath of filePaths) {
    const relativePath = path.relative(resolvedRoot, filePath);
    const source = fs.readFileSync(filePath, 'utf-8');
    const sourceMap = useSourceMaps ? loadSourceMapFor(filePath, source) : undefined;

    try {
      const result = lintFile({
        filePath: relativePath,
        source,
        policy,
        handlers,
        exportedHandlers,
        sourceMap,
        reportAll,
      });
      if (!result.ok) {
        diagnostics.push(...result.diagnostics.map((d) => relativeTo(resolvedRoot, d)));
      }
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      parseFailures.push({ filePath: relativePath, message: err.message });
    }
  }

  return { diagnostics, parseFailures, filesScanned: filePaths.length };
}

export { lint, type LintOptions } from './linter.js';
export { lintFile, type LintFileOptions } from './engine.js';
export { finalize, describeViolation, LineIndex } from './diagnostics.js';
export { AvailabilityPolicy, type AvailabilityLists } from './analysis/policy.js';
export {
  LifetimeTracker,
  GLOBAL_LIFETIME,
  REQUEST_LIFETIME,
  calleePath,
} from './analysis/lifetime.js';
export { ScopeStack, type Resolution } from './analysis/scope.js';
export { parseJavaScript } from './parsers/javascript.js';
export { createSourceMapResolver, loadSourceMapFor, TraceMapResolver } from './sourcemap.js';
export { loadConfig, resolvePolicy, toConfig } from './config.js';
export * from './defaults.js';
export * from './errors.js';
export type * from './types.js';
