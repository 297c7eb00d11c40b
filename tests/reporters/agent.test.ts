import { describe, it, expect } from 'vitest';
import { formatAgentReport } from '../../src/reporters/agent.js';
import type { Diagnostic } from '../../src/types.js';

describe('formatAgentReport', () => {
  it('produces XML with one issue element per diagnostic', () => {
    const diagnostics: Diagnostic[] = [
      {
        name: 'fetch',
        list: 'request-only',
        message: '`fetch` is only available inside a request handler, not at global scope.',
        offset: 15,
        filePath: 'src/config.js',
        line: 1,
        column: 15,
        codeSnippet: "const cached = fetch('https://example.com/config');",
      },
    ];
    const output = formatAgentReport(diagnostics, [], 10);
    const lines = output.split('\n');

    expect(lines[0]).toBe('<lifetime-lint-report files-scanned="10" issues="1" parse-failures="0">');
    expect(lines[1]).toBe(
      '  <issue name="fetch" list="request-only" file="src/config.js" line="1" column="15" offset="15">'
    );
    expect(lines[2]).toBe(
      '    <description>`fetch` is only available inside a request handler, not at global scope.</description>'
    );
    expect(lines[3]).toBe(
      "    <code-snippet>const cached = fetch('https://example.com/config');</code-snippet>"
    );
    expect(lines[4]).toMatch(/^ {4}<agent-instruction>This API only works while a request is being handled\./);
    expect(lines[5]).toBe('  </issue>');
    expect(lines[6]).toBe('</lifetime-lint-report>');
  });

  it('escapes markup in snippets', () => {
    const diagnostics: Diagnostic[] = [
      {
        name: 'eval',
        list: 'unavailable',
        message: '`eval` is not available on this platform.',
        offset: 9,
        filePath: 'src/worker.js',
        line: 1,
        column: 9,
        codeSnippet: 'if (a < eval("b")) {}',
      },
    ];
    const output = formatAgentReport(diagnostics, [], 1);

    expect(output).toContain('<code-snippet>if (a &lt; eval(&quot;b&quot;)) {}</code-snippet>');
  });

  it('lists parse failures', () => {
    const output = formatAgentReport(
      [],
      [{ filePath: 'src/broken.js', message: 'Failed to parse src/broken.js: Unexpected token' }],
      2
    );

    expect(output).toContain('parse-failures="1"');
    expect(output).toContain(
      '<parse-failure file="src/broken.js">Failed to parse src/broken.js: Unexpected token</parse-failure>'
    );
  });

  it('produces XML with no diagnostics', () => {
    const output = formatAgentReport([], [], 5);

    expect(output).toContain('issues="0"');
    expect(output).not.toContain('<issue');
  });
});
