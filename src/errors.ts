import type { PolicyViolation } from './types.js';

/** Thrown by the walker to unwind a fail-fast pass; `lint` turns it into a diagnostic. */
export class PolicyViolationError extends Error {
  readonly violation: PolicyViolation;

  constructor(violation: PolicyViolation) {
    super(`\`${violation.name}\` violates the ${violation.list} list at offset ${violation.offset}`);
    this.name = 'PolicyViolationError';
    this.violation = violation;
  }
}

/** The walker reached a node it has no handling for. */
export class MalformedInputError extends Error {
  readonly nodeType: string;

  constructor(nodeType: string) {
    super(`Unexpected syntax node \`${nodeType}\`; the tree is not a well-formed ESTree program`);
    this.name = 'MalformedInputError';
    this.nodeType = nodeType;
  }
}

export class ParseError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Failed to parse ${filePath}: ${message}`);
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}
