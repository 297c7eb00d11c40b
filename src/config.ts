import * as fs from 'node:fs';
import * as path from 'node:path';
import { AvailabilityPolicy } from './analysis/policy.js';
import {
  DEFAULT_EXPORTED_HANDLERS,
  DEFAULT_HANDLERS,
  DEFAULT_REQUEST_ONLY,
  DEFAULT_UNAVAILABLE,
} from './defaults.js';
import type { HandlerRegistration, LifetimeLintConfig } from './types.js';

export const CONFIG_FILE = 'lifetime-lint.config.json';
const PACKAGE_KEY = 'lifetimeLint';

export interface ResolvedPolicy {
  policy: AvailabilityPolicy;
  handlers: readonly HandlerRegistration[];
  exportedHandlers: readonly string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value;
  }
  console.warn(`Warning: Ignoring \`${field}\` in lifetime-lint config: expected an array of strings`);
  return undefined;
}

function handlerList(value: unknown): HandlerRegistration[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    console.warn('Warning: Ignoring `handlers` in lifetime-lint config: expected an array');
    return undefined;
  }

  const handlers: HandlerRegistration[] = [];
  for (const entry of value) {
    if (
      isRecord(entry) &&
      typeof entry.callee === 'string' &&
      typeof entry.argument === 'number' &&
      Number.isInteger(entry.argument) &&
      entry.argument >= 0 &&
      (entry.event === undefined || typeof entry.event === 'string')
    ) {
      handlers.push(
        entry.event === undefined
          ? { callee: entry.callee, argument: entry.argument }
          : { callee: entry.callee, argument: entry.argument, event: entry.event }
      );
    } else {
      console.warn(`Warning: Ignoring malformed handler entry in lifetime-lint config: ${JSON.stringify(entry)}`);
    }
  }
  return handlers;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') return value;
  console.warn(`Warning: Ignoring \`${field}\` in lifetime-lint config: expected a boolean`);
  return undefined;
}

/** Keep the recognised fields of a parsed config value. */
export function toConfig(value: unknown): LifetimeLintConfig {
  if (!isRecord(value)) return {};

  const config: LifetimeLintConfig = {};
  const unavailable = stringList(value.unavailable, 'unavailable');
  if (unavailable) config.unavailable = unavailable;
  const requestOnly = stringList(value.requestOnly, 'requestOnly');
  if (requestOnly) config.requestOnly = requestOnly;
  const handlers = handlerList(value.handlers);
  if (handlers) config.handlers = handlers;
  const exportedHandlers = stringList(value.exportedHandlers, 'exportedHandlers');
  if (exportedHandlers) config.exportedHandlers = exportedHandlers;

  if (isRecord(value.ignore)) {
    const files = stringList(value.ignore.files, 'ignore.files');
    if (files) config.ignore = { files };
  }

  const reportAll = optionalBoolean(value.reportAll, 'reportAll');
  if (reportAll !== undefined) config.reportAll = reportAll;
  const sourceMaps = optionalBoolean(value.sourceMaps, 'sourceMaps');
  if (sourceMaps !== undefined) config.sourceMaps = sourceMaps;

  return config;
}

export function loadConfig(projectRoot: string): LifetimeLintConfig {
  const configPath = path.join(projectRoot, CONFIG_FILE);
  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf-8');
    try {
      return toConfig(JSON.parse(raw));
    } catch (err) {
      console.warn(
        `Warning: Failed to parse ${CONFIG_FILE}: ${err instanceof Error ? err.message : err}`
      );
      return {};
    }
  }

  const pkgPath = path.join(projectRoot, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const raw = fs.readFileSync(pkgPath, 'utf-8');
    try {
      const pkg: unknown = JSON.parse(raw);
      if (isRecord(pkg) && pkg[PACKAGE_KEY] !== undefined) {
        return toConfig(pkg[PACKAGE_KEY]);
      }
    } catch (err) {
      console.warn(
        `Warning: Failed to parse package.json: ${err instanceof Error ? err.message : err}`
      );
      return {};
    }
  }

  return {};
}

/** Lists given in the config replace the built-in defaults one by one. */
export function resolvePolicy(config: LifetimeLintConfig): ResolvedPolicy {
  return {
    policy: new AvailabilityPolicy({
      unavailable: config.unavailable ?? DEFAULT_UNAVAILABLE,
      requestOnly: config.requestOnly ?? DEFAULT_REQUEST_ONLY,
    }),
    handlers: config.handlers ?? DEFAULT_HANDLERS,
    exportedHandlers: config.exportedHandlers ?? DEFAULT_EXPORTED_HANDLERS,
  };
}
