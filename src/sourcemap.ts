import { TraceMap, originalPositionFor, type SourceMapInput } from '@jridgewell/trace-mapping';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { OriginalPosition, SourceMapResolver, SourcePosition } from './types.js';

const SOURCE_MAPPING_URL = /\/\/[#@]\s*sourceMappingURL=(\S+)/g;

export class TraceMapResolver implements SourceMapResolver {
  private readonly map: TraceMap;

  constructor(input: SourceMapInput, mapUrl?: string) {
    this.map = new TraceMap(input, mapUrl);
  }

  originalPositionFor(position: SourcePosition): OriginalPosition | null {
    const mapped = originalPositionFor(this.map, position);
    if (mapped.source === null || mapped.line === null || mapped.column === null) {
      return null;
    }
    return {
      source: mapped.source,
      line: mapped.line,
      column: mapped.column,
      name: mapped.name ?? undefined,
    };
  }
}

export function createSourceMapResolver(input: SourceMapInput, mapUrl?: string): SourceMapResolver {
  return new TraceMapResolver(input, mapUrl);
}

function sourceMappingUrl(source: string): string | undefined {
  const matches = [...source.matchAll(SOURCE_MAPPING_URL)];
  return matches.at(-1)?.[1];
}

function decodeDataUrl(url: string): string {
  const comma = url.indexOf(',');
  const meta = url.slice('data:'.length, comma);
  const payload = url.slice(comma + 1);
  return meta.endsWith(';base64')
    ? Buffer.from(payload, 'base64').toString('utf-8')
    : decodeURIComponent(payload);
}

/**
 * Find the source map for a generated file: an inline `data:` URL, the file
 * named by its `sourceMappingURL` comment, or `<file>.map` beside it.
 */
export function loadSourceMapFor(filePath: string, source: string): SourceMapResolver | undefined {
  const url = sourceMappingUrl(source);

  let raw: string | undefined;
  let mapPath = `${filePath}.map`;
  if (url?.startsWith('data:')) {
    raw = decodeDataUrl(url);
    mapPath = filePath;
  } else {
    if (url) mapPath = path.resolve(path.dirname(filePath), decodeURIComponent(url));
    if (fs.existsSync(mapPath)) raw = fs.readFileSync(mapPath, 'utf-8');
  }
  if (raw === undefined) return undefined;

  try {
    return createSourceMapResolver(raw, mapPath);
  } catch (err) {
    console.warn(
      `Warning: Failed to read source map for ${filePath}: ${err instanceof Error ? err.message : err}`
    );
    return undefined;
  }
}
