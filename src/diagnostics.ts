import type {
  Diagnostic,
  LintResult,
  PolicyViolation,
  SourceMapResolver,
  SourcePosition,
} from './types.js';

export interface FinalizeOptions {
  source?: string;
  filePath?: string;
  sourceMap?: SourceMapResolver;
}

/** Offset to line/column lookup over one source text. */
export class LineIndex {
  private readonly lineStarts: number[] = [0];
  private readonly lines: string[];

  constructor(source: string) {
    this.lines = source.split('\n');
    for (let i = 0; i < source.length; i++) {
      if (source[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  positionAt(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.lineStarts[low] };
  }

  lineText(line: number): string {
    return this.lines[line - 1] ?? '';
  }
}

export function describeViolation(violation: PolicyViolation): string {
  return violation.list === 'unavailable'
    ? `\`${violation.name}\` is not available on this platform.`
    : `\`${violation.name}\` is only available inside a request handler, not at global scope.`;
}

function toDiagnostic(
  violation: PolicyViolation,
  index: LineIndex | undefined,
  options: FinalizeOptions
): Diagnostic {
  const { filePath, sourceMap } = options;
  const message = describeViolation(violation);
  const diagnostic: Diagnostic = {
    name: violation.name,
    list: violation.list,
    message,
    offset: violation.offset,
    filePath,
  };
  if (!index) return diagnostic;

  const generated = index.positionAt(violation.offset);
  diagnostic.line = generated.line;
  diagnostic.column = generated.column;
  diagnostic.codeSnippet = index.lineText(generated.line).trim() || undefined;
  if (!sourceMap) return diagnostic;

  // positions the map does not cover keep their generated location
  const original = sourceMap.originalPositionFor(generated);
  if (!original) return diagnostic;

  return {
    ...diagnostic,
    message: `${message} (original source: ${original.source}:${original.line}:${original.column})`,
    filePath: original.source,
    line: original.line,
    column: original.column,
    generated: { filePath, ...generated },
  };
}

/**
 * Turn the violations of one pass into the pass result. Without the source
 * text only offsets are known; a source map needs the text to be consulted.
 */
export function finalize(violations: PolicyViolation[], options: FinalizeOptions = {}): LintResult {
  if (violations.length === 0) return { ok: true };

  const index = options.source !== undefined ? new LineIndex(options.source) : undefined;
  return {
    ok: false,
    diagnostics: violations.map((violation) => toDiagnostic(violation, index, options)),
  };
}
