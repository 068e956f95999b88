/**
 * Template registry and the sealed, read-only template store.
 *
 * Templates are collected in a mutable {@link TemplateRegistry}; calling
 * {@link TemplateRegistry.seal} scans every body once and hands back a
 * {@link TemplateStore} that can no longer change. Only sealed stores are
 * accepted by the engine, so a render never observes a store mid-update.
 *
 * ```typescript
 * const store = new TemplateRegistry()
 *   .register('page', '<body><!--% content %--></body>')
 *   .register('para', '<p><!--% text %--></p>')
 *   .seal();
 * ```
 *
 * @module
 */

import type { TemplateBody, TokenSyntax } from '../types/template.js';
import { scanTemplate, listTokenNames, DEFAULT_TOKEN_SYNTAX } from '../scanner/token-scanner.js';
import { DuplicateTemplateError, StoreError } from '../errors/config-errors.js';

/**
 * Immutable mapping of template ids to scanned bodies.
 */
export class TemplateStore {
  private readonly bodies: ReadonlyMap<string, TemplateBody>;
  readonly syntax: TokenSyntax;

  /** @internal Use {@link TemplateRegistry.seal}. */
  constructor(bodies: ReadonlyMap<string, TemplateBody>, syntax: TokenSyntax) {
    this.bodies = bodies;
    this.syntax = syntax;
    Object.freeze(this);
  }

  get(id: string): TemplateBody | undefined {
    return this.bodies.get(id);
  }

  has(id: string): boolean {
    return this.bodies.has(id);
  }

  /** Template ids in registration order. */
  ids(): string[] {
    return [...this.bodies.keys()];
  }

  get size(): number {
    return this.bodies.size;
  }
}

/**
 * Collects raw template sources before sealing.
 */
export class TemplateRegistry {
  private readonly sources = new Map<string, string>();
  private sealed = false;

  /**
   * Adds a template.
   *
   * @throws {DuplicateTemplateError} If `id` is already registered.
   * @throws {StoreError} If `id` is empty or the registry is sealed.
   */
  register(id: string, body: string): this {
    if (this.sealed) {
      throw new StoreError(`Cannot register "${id}": registry is already sealed`);
    }
    if (typeof id !== 'string' || id.length === 0) {
      throw new StoreError('Template id must be a non-empty string');
    }
    if (typeof body !== 'string') {
      throw new StoreError(`Template "${id}" body must be a string`);
    }
    if (this.sources.has(id)) {
      throw new DuplicateTemplateError(id);
    }
    this.sources.set(id, body);
    return this;
  }

  /** Adds every entry of `templates`. */
  registerAll(templates: Readonly<Record<string, string>>): this {
    for (const [id, body] of Object.entries(templates)) {
      this.register(id, body);
    }
    return this;
  }

  has(id: string): boolean {
    return this.sources.has(id);
  }

  /** Registered `[id, source]` pairs in registration order. */
  entries(): Array<[string, string]> {
    return [...this.sources.entries()];
  }

  get size(): number {
    return this.sources.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Scans every registered body with `syntax` and returns the read-only
   * store. The registry accepts no further templates afterwards.
   *
   * @throws {MalformedTokenError} If any body contains a malformed token.
   */
  seal(syntax: TokenSyntax = DEFAULT_TOKEN_SYNTAX): TemplateStore {
    const bodies = new Map<string, TemplateBody>();
    for (const [id, source] of this.sources) {
      const scanned = scanTemplate(source, syntax, id);
      bodies.set(
        id,
        Object.freeze({
          id,
          source: scanned.source,
          segments: Object.freeze([...scanned.segments]),
          tokens: Object.freeze([...scanned.tokens]),
          tokenNames: Object.freeze(listTokenNames(scanned)),
        }),
      );
    }
    this.sealed = true;
    return new TemplateStore(bodies, Object.freeze({ ...syntax }));
  }
}

/**
 * Shorthand for registering a record of templates and sealing it.
 */
export function createTemplateStore(
  templates: Readonly<Record<string, string>>,
  syntax: TokenSyntax = DEFAULT_TOKEN_SYNTAX,
): TemplateStore {
  return new TemplateRegistry().registerAll(templates).seal(syntax);
}
