import type { BindingKind, FrameKind } from '../types.js';

export type Resolution = BindingKind | 'free';

interface Frame {
  kind: FrameKind;
  bindings: Map<string, BindingKind>;
}

const HOIST_TARGETS: ReadonlySet<FrameKind> = new Set(['script', 'function']);

/**
 * Lexical environment for a single lint pass. Frames are pushed on entering
 * a body and popped on leaving it; lookups go innermost to outermost.
 */
export class ScopeStack {
  private frames: Frame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  withFrame<T>(kind: FrameKind, fn: () => T): T {
    this.frames.push({ kind, bindings: new Map() });
    try {
      return fn();
    } finally {
      this.frames.pop();
    }
  }

  bind(name: string, kind: BindingKind): void {
    this.innermost().bindings.set(name, kind);
  }

  /** `var` bindings land in the nearest function or script frame. */
  bindVar(name: string): void {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (HOIST_TARGETS.has(frame.kind)) {
        frame.bindings.set(name, 'var');
        return;
      }
    }
    this.innermost().bindings.set(name, 'var');
  }

  resolve(name: string): Resolution {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const kind = this.frames[i].bindings.get(name);
      if (kind !== undefined) return kind;
    }
    return 'free';
  }

  isFree(name: string): boolean {
    return this.resolve(name) === 'free';
  }

  private innermost(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new Error('No scope frame is open');
    }
    return frame;
  }
}
