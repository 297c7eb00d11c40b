export type RestrictionList = 'unavailable' | 'request-only';

export interface LifetimeContext {
  readonly inRequestLifetime: boolean;
}

export type BindingKind =
  | 'var'
  | 'lexical'
  | 'declaration'
  | 'parameter'
  | 'catch'
  | 'loop'
  | 'import';

export type FrameKind = 'script' | 'function' | 'block' | 'class' | 'catch' | 'loop';

/**
 * A call shape that installs a function to run in the request lifetime,
 * e.g. `{ callee: 'addEventListener', argument: 1, event: 'fetch' }`.
 */
export interface HandlerRegistration {
  /** Dotted callee path, matched against identifier and member chains. */
  callee: string;
  /** Zero-based position of the handler argument. */
  argument: number;
  /** When set, the first argument must be this string literal. */
  event?: string;
}

export interface PolicyViolation {
  name: string;
  list: RestrictionList;
  offset: number;
}

/** 1-based line, 0-based column. */
export interface SourcePosition {
  line: number;
  column: number;
}

export interface OriginalPosition extends SourcePosition {
  source: string;
  name?: string;
}

export interface SourceMapResolver {
  originalPositionFor(position: SourcePosition): OriginalPosition | null;
}

export interface Diagnostic {
  name: string;
  list: RestrictionList;
  message: string;
  offset: number;
  filePath?: string;
  line?: number;
  column?: number;
  /** Position in the linted file, kept when a source map moved the diagnostic. */
  generated?: SourcePosition & { filePath?: string };
  codeSnippet?: string;
}

export type LintResult =
  | { ok: true }
  | { ok: false; diagnostics: Diagnostic[] };

export interface ParseFailure {
  filePath: string;
  message: string;
}

export interface CheckResult {
  diagnostics: Diagnostic[];
  parseFailures: ParseFailure[];
  filesScanned: number;
}

export interface LifetimeLintConfig {
  unavailable?: string[];
  requestOnly?: string[];
  handlers?: HandlerRegistration[];
  exportedHandlers?: string[];
  ignore?: {
    files?: string[];
  };
  reportAll?: boolean;
  sourceMaps?: boolean;
}
