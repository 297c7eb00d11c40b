import pc from 'picocolors';
import type { Diagnostic, ParseFailure } from '../types.js';

function location(d: Diagnostic): string {
  const file = d.filePath ?? '<input>';
  return d.line !== undefined ? `${file}:${d.line}:${d.column ?? 0}` : `${file}@${d.offset}`;
}

export function formatTerminalReport(
  diagnostics: Diagnostic[],
  parseFailures: ParseFailure[],
  filesScanned: number,
  verbose: boolean
): string {
  const lines: string[] = [];

  // Header
  lines.push('');
  lines.push(pc.bold('  lifetime-lint'));
  lines.push('');
  lines.push(`  Files scanned: ${filesScanned}`);
  lines.push('');

  for (const failure of parseFailures) {
    lines.push(`  ${pc.red('x')} ${pc.underline(failure.filePath)}  ${failure.message}`);
  }
  if (parseFailures.length > 0) lines.push('');

  if (diagnostics.length === 0) {
    if (parseFailures.length === 0) {
      lines.push(pc.green('  No issues found!'));
      lines.push('');
    }
    return lines.join('\n');
  }

  const unavailableCount = diagnostics.filter((d) => d.list === 'unavailable').length;
  const requestOnlyCount = diagnostics.length - unavailableCount;

  lines.push(
    `  ${diagnostics.length} issue${diagnostics.length !== 1 ? 's' : ''} found: ${unavailableCount} unavailable, ${requestOnlyCount} request-only`
  );
  lines.push('');

  if (verbose) {
    // Group by file path
    const byFile = new Map<string, Diagnostic[]>();
    for (const d of diagnostics) {
      const key = d.filePath ?? '<input>';
      const existing = byFile.get(key) ?? [];
      existing.push(d);
      byFile.set(key, existing);
    }

    for (const [filePath, fileDiags] of byFile) {
      lines.push(`  ${pc.underline(filePath)}`);

      for (const d of fileDiags) {
        const listLabel = d.list === 'unavailable' ? pc.red('unavailable') : pc.yellow('request-only');
        const position = d.line !== undefined ? `${d.line}:${d.column ?? 0}` : `@${d.offset}`;
        lines.push(`    ${position}  ${listLabel}  ${pc.bold(d.name)}  ${d.message}`);
        if (d.generated) {
          lines.push(pc.dim(`      generated: ${d.generated.filePath ?? '<input>'}:${d.generated.line}:${d.generated.column}`));
        }
      }

      lines.push('');
    }
  } else {
    // Non-verbose: one line per offending name
    const byName = new Map<string, Diagnostic[]>();
    for (const d of diagnostics) {
      const existing = byName.get(d.name) ?? [];
      existing.push(d);
      byName.set(d.name, existing);
    }

    for (const [name, nameDiags] of byName) {
      const first = nameDiags[0];
      const icon = first.list === 'unavailable' ? pc.red('x') : pc.yellow('!');
      lines.push(`  ${icon} ${pc.bold(name)} (${nameDiags.length})  first at ${location(first)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
