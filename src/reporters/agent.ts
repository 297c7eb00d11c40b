import type { Diagnostic, ParseFailure, RestrictionList } from '../types.js';

const INSTRUCTIONS: Record<RestrictionList, string> = {
  unavailable:
    'This API does not exist on the target platform. Remove the reference or replace it with a platform-provided alternative; shadowing it with a local binding of the same name also clears the error.',
  'request-only':
    'This API only works while a request is being handled. Move the reference into a function registered as a request handler (for example the listener passed to `addEventListener` or a method of the default-exported handler object).',
};

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatAgentReport(
  diagnostics: Diagnostic[],
  parseFailures: ParseFailure[],
  filesScanned: number
): string {
  const lines: string[] = [];

  lines.push(
    `<lifetime-lint-report files-scanned="${filesScanned}" issues="${diagnostics.length}" parse-failures="${parseFailures.length}">`
  );

  for (const failure of parseFailures) {
    lines.push(`  <parse-failure file="${escapeXml(failure.filePath)}">${escapeXml(failure.message)}</parse-failure>`);
  }

  for (const d of diagnostics) {
    const file = d.filePath !== undefined ? ` file="${escapeXml(d.filePath)}"` : '';
    const position = d.line !== undefined ? ` line="${d.line}" column="${d.column ?? 0}"` : '';
    lines.push(
      `  <issue name="${escapeXml(d.name)}" list="${d.list}"${file}${position} offset="${d.offset}">`
    );
    lines.push(`    <description>${escapeXml(d.message)}</description>`);

    if (d.codeSnippet) {
      lines.push(`    <code-snippet>${escapeXml(d.codeSnippet)}</code-snippet>`);
    }

    lines.push(`    <agent-instruction>${escapeXml(INSTRUCTIONS[d.list])}</agent-instruction>`);
    lines.push('  </issue>');
  }

  lines.push('</lifetime-lint-report>');

  return lines.join('\n');
}
