/**
 * Per-render state.
 *
 * @module
 */

import type { RenderPolicy } from '../types/policy.js';
import type { MissingToken } from '../types/render.js';
import type { TemplateStore } from '../store/template-store.js';

/**
 * State owned by a single top-level render call: the template stack used for
 * diagnostics and the depth guard, and the report collected on the way.
 */
export class RenderContext {
  private readonly stack: string[] = [];
  private readonly missingTokens: MissingToken[] = [];
  private readonly rendered: string[] = [];

  constructor(
    readonly store: TemplateStore,
    readonly policy: RenderPolicy,
  ) {}

  get depth(): number {
    return this.stack.length;
  }

  /** Snapshot of the template stack, outermost first. */
  get templateStack(): readonly string[] {
    return [...this.stack];
  }

  get missing(): readonly MissingToken[] {
    return this.missingTokens;
  }

  get templates(): readonly string[] {
    return this.rendered;
  }

  enter(templateId: string): void {
    this.stack.push(templateId);
    this.rendered.push(templateId);
  }

  leave(): void {
    this.stack.pop();
  }

  recordMissing(entry: MissingToken): void {
    this.missingTokens.push(entry);
  }
}
