import { parseSync } from 'oxc-parser';
import type { Program } from 'estree';
import { ParseError } from '../errors.js';

function isProgram(value: unknown): value is Program {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Program' &&
    'body' in value &&
    Array.isArray(value.body)
  );
}

/**
 * Parse JavaScript into an ESTree program. Every file parses as a module
 * except `.cjs`, which parses as a script.
 */
export function parseJavaScript(source: string, filePath: string): Program {
  const result = parseSync(filePath, source, {
    sourceType: filePath.endsWith('.cjs') ? 'script' : 'module',
    preserveParens: false,
  });
  if (result.errors.length > 0) {
    throw new ParseError(filePath, result.errors[0].message);
  }

  const program: unknown = result.program;
  if (!isProgram(program)) {
    throw new ParseError(filePath, 'parser did not return a Program node');
  }
  return program;
}
