import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadConfig, resolvePolicy, toConfig } from '../src/config.js';
import { DEFAULT_HANDLERS, DEFAULT_REQUEST_ONLY } from '../src/defaults.js';
import * as fs from 'node:fs';

vi.mock('node:fs');

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns empty config when no config file exists', () => {
    vi.spyOn(fs, 'existsSync').mockReturnValue(false);
    vi.spyOn(fs, 'readFileSync').mockReturnValue('{}');
    const config = loadConfig('/fake/project');
    expect(config).toEqual({});
  });

  it('loads lifetime-lint.config.json when present', () => {
    vi.spyOn(fs, 'existsSync').mockImplementation((p) =>
      String(p).endsWith('lifetime-lint.config.json')
    );
    vi.spyOn(fs, 'readFileSync').mockReturnValue(
      JSON.stringify({ requestOnly: ['fetch'], reportAll: true })
    );
    const config = loadConfig('/fake/project');
    expect(config).toEqual({ requestOnly: ['fetch'], reportAll: true });
  });

  it('falls back to package.json lifetimeLint key', () => {
    vi.spyOn(fs, 'existsSync').mockImplementation((p) => String(p).endsWith('package.json'));
    vi.spyOn(fs, 'readFileSync').mockReturnValue(
      JSON.stringify({ lifetimeLint: { ignore: { files: ['vendor/**'] } } })
    );
    const config = loadConfig('/fake/project');
    expect(config.ignore?.files).toEqual(['vendor/**']);
  });

  it('lifetime-lint.config.json takes precedence over package.json', () => {
    vi.spyOn(fs, 'existsSync').mockReturnValue(true);
    vi.spyOn(fs, 'readFileSync').mockImplementation((p) => {
      if (String(p).endsWith('lifetime-lint.config.json')) {
        return JSON.stringify({ unavailable: ['fromConfig'] });
      }
      return JSON.stringify({ lifetimeLint: { unavailable: ['fromPackage'] } });
    });
    const config = loadConfig('/fake/project');
    expect(config.unavailable).toEqual(['fromConfig']);
  });

  it('warns and returns empty config for invalid JSON', () => {
    vi.spyOn(fs, 'existsSync').mockImplementation((p) =>
      String(p).endsWith('lifetime-lint.config.json')
    );
    vi.spyOn(fs, 'readFileSync').mockReturnValue('{ not json');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(loadConfig('/fake/project')).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^Warning: Failed to parse lifetime-lint\.config\.json: /);
  });
});

describe('toConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps well-formed handler entries and drops the rest', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = toConfig({
      handlers: [
        { callee: 'router.on', argument: 1, event: 'request' },
        { callee: 'serve', argument: 0 },
        { callee: 'broken', argument: -1 },
      ],
    });

    expect(config.handlers).toEqual([
      { callee: 'router.on', argument: 1, event: 'request' },
      { callee: 'serve', argument: 0 },
    ]);
    expect(warn).toHaveBeenCalledWith(
      'Warning: Ignoring malformed handler entry in lifetime-lint config: {"callee":"broken","argument":-1}'
    );
  });

  it('ignores fields of the wrong type', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = toConfig({ unavailable: 'eval', sourceMaps: 'yes', exportedHandlers: ['fetch'] });

    expect(config).toEqual({ exportedHandlers: ['fetch'] });
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('returns empty config for non-objects', () => {
    expect(toConfig(['eval'])).toEqual({});
    expect(toConfig(null)).toEqual({});
  });
});

describe('resolvePolicy', () => {
  it('uses the built-in lists when none are configured', () => {
    const resolved = resolvePolicy({});

    expect(resolved.policy.restriction('eval')).toBe('unavailable');
    expect(resolved.policy.restriction('fetch')).toBe('request-only');
    expect(resolved.handlers).toBe(DEFAULT_HANDLERS);
  });

  it('replaces each configured list on its own', () => {
    const resolved = resolvePolicy({ requestOnly: ['connect'] });

    expect(resolved.policy.restriction('connect')).toBe('request-only');
    expect(resolved.policy.restriction('fetch')).toBeUndefined();
    expect(resolved.policy.restriction('eval')).toBe('unavailable');
    expect(DEFAULT_REQUEST_ONLY).toContain('fetch');
  });
});
