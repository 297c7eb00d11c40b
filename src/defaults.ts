import type { HandlerRegistration } from './types.js';

/** Code generation from strings and worker-only globals the platform does not provide. */
export const DEFAULT_UNAVAILABLE: readonly string[] = ['eval', 'importScripts', 'XMLHttpRequest'];

/** I/O and timers are bound to a request and cannot run at module load. */
export const DEFAULT_REQUEST_ONLY: readonly string[] = [
  'fetch',
  'setTimeout',
  'setInterval',
  'caches',
  'WebSocket',
];

export const DEFAULT_HANDLERS: readonly HandlerRegistration[] = [
  { callee: 'addEventListener', argument: 1 },
  { callee: 'self.addEventListener', argument: 1 },
  { callee: 'globalThis.addEventListener', argument: 1 },
];

/** Handler methods of a module worker's default export. */
export const DEFAULT_EXPORTED_HANDLERS: readonly string[] = ['fetch', 'scheduled', 'queue', 'email', 'tail'];
