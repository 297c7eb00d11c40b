import { describe, it, expect } from 'vitest';
import { formatTerminalReport } from '../../src/reporters/terminal.js';
import type { Diagnostic } from '../../src/types.js';

const evalInHandler: Diagnostic = {
  name: 'eval',
  list: 'unavailable',
  message: '`eval` is not available on this platform.',
  offset: 58,
  filePath: 'src/worker.js',
  line: 2,
  column: 20,
  codeSnippet: "event.respondWith(eval('1'));",
};

const fetchAtGlobal: Diagnostic = {
  name: 'fetch',
  list: 'request-only',
  message: '`fetch` is only available inside a request handler, not at global scope.',
  offset: 15,
  filePath: 'src/config.js',
  line: 1,
  column: 15,
};

describe('formatTerminalReport', () => {
  it('summarises issues by list', () => {
    const output = formatTerminalReport([evalInHandler, fetchAtGlobal], [], 10, false);

    expect(output).toContain('Files scanned: 10');
    expect(output).toContain('2 issues found: 1 unavailable, 1 request-only');
  });

  it('prints one line per name with its first location', () => {
    const second: Diagnostic = { ...fetchAtGlobal, filePath: 'src/other.js', line: 4, column: 2 };
    const output = formatTerminalReport([fetchAtGlobal, second], [], 2, false);

    expect(output).toContain('(2)  first at src/config.js:1:15');
    expect(output).not.toContain('src/other.js');
  });

  it('groups by file in verbose mode', () => {
    const output = formatTerminalReport([evalInHandler, fetchAtGlobal], [], 2, true);

    expect(output).toContain('src/worker.js');
    expect(output).toContain('src/config.js');
    expect(output).toContain('2:20');
    expect(output).toContain('1:15');
    expect(output).toContain('`eval` is not available on this platform.');
  });

  it('shows the generated position of mapped issues in verbose mode', () => {
    const mapped: Diagnostic = {
      ...fetchAtGlobal,
      filePath: 'src/timer.ts',
      line: 3,
      column: 0,
      generated: { filePath: 'dist/bundle.js', line: 1, column: 0 },
    };
    const output = formatTerminalReport([mapped], [], 1, true);

    expect(output).toContain('generated: dist/bundle.js:1:0');
  });

  it('falls back to offsets when positions are unknown', () => {
    const bare: Diagnostic = {
      name: 'fetch',
      list: 'request-only',
      message: '`fetch` is only available inside a request handler, not at global scope.',
      offset: 7,
    };
    const output = formatTerminalReport([bare], [], 1, false);

    expect(output).toContain('first at <input>@7');
  });

  it('lists parse failures', () => {
    const output = formatTerminalReport(
      [],
      [{ filePath: 'src/broken.js', message: 'Failed to parse src/broken.js: Unexpected token' }],
      3,
      false
    );

    expect(output).toContain('Failed to parse src/broken.js: Unexpected token');
    expect(output).not.toContain('No issues found!');
  });

  it('handles zero diagnostics', () => {
    const output = formatTerminalReport([], [], 5, false);

    expect(output).toContain('No issues found!');
  });
});
