/**
 * TemplateNest - a template store bound to one render policy.
 *
 * @example
 * ```typescript
 * const nest = TemplateNest.fromTemplates(
 *   {
 *     page: '<main>\n  <!--% body %-->\n</main>',
 *     para: '<p><!--% text %--></p>',
 *   },
 *   { showLabels: true },
 * );
 *
 * nest.renderPlain('page', { body: { TEMPLATE: 'para', text: 'Hi & bye' } });
 * ```
 *
 * @module
 */

import type { FillingValue, PlainFillingObject } from '../types/filling.js';
import type { RenderPolicy, RenderPolicyOptions } from '../types/policy.js';
import type { RenderReport, RenderResult } from '../types/render.js';
import { TemplateRegistry, type TemplateStore } from '../store/template-store.js';
import { createRenderPolicy } from '../policy/render-policy.js';
import { fromPlain } from '../filling/filling-value.js';
import { loadTemplateDirectory, type DirectoryLoadOptions } from '../loader/template-loader.js';
import { render, renderTree, renderTreeWithReport, renderWithReport, tryRender } from './composition-engine.js';
import { sameSyntax } from '../scanner/token-scanner.js';
import { SyntaxMismatchError } from '../errors/config-errors.js';

export class TemplateNest {
  readonly store: TemplateStore;
  readonly policy: RenderPolicy;

  /**
   * @throws {PolicyError} On invalid options.
   * @throws {SyntaxMismatchError} If the store was sealed with a token
   *   syntax other than the one `options` describe.
   */
  constructor(store: TemplateStore, options: RenderPolicyOptions = {}) {
    this.store = store;
    this.policy = createRenderPolicy(options);
    if (!sameSyntax(this.store.syntax, this.policy.syntax)) {
      throw new SyntaxMismatchError();
    }
  }

  /**
   * Registers `templates`, seals them with the token syntax from `options`
   * and binds the result.
   */
  static fromTemplates(
    templates: Readonly<Record<string, string>>,
    options: RenderPolicyOptions = {},
  ): TemplateNest {
    const policy = createRenderPolicy(options);
    const store = new TemplateRegistry().registerAll(templates).seal(policy.syntax);
    return new TemplateNest(store, options);
  }

  /**
   * Loads every template file under `directory` and binds the result.
   */
  static async fromDirectory(
    directory: string,
    options: RenderPolicyOptions & DirectoryLoadOptions = {},
  ): Promise<TemplateNest> {
    const { extension, registry, ...policyOptions } = options;
    const policy = createRenderPolicy(policyOptions);
    const loaded = await loadTemplateDirectory(directory, {
      ...(extension !== undefined && { extension }),
      ...(registry !== undefined && { registry }),
    });
    return new TemplateNest(loaded.seal(policy.syntax), policyOptions);
  }

  render(templateId: string, filling: FillingValue): string {
    return render(this.store, templateId, filling, this.policy);
  }

  /** Converts `filling` with {@link fromPlain} and renders it. */
  renderPlain(templateId: string, filling: PlainFillingObject): string {
    return render(this.store, templateId, fromPlain(filling), this.policy);
  }

  renderWithReport(templateId: string, filling: FillingValue): RenderReport {
    return renderWithReport(this.store, templateId, filling, this.policy);
  }

  tryRender(templateId: string, filling: FillingValue): RenderResult {
    return tryRender(this.store, templateId, filling, this.policy);
  }

  /** Renders a filling that names its own template. */
  renderTree(filling: FillingValue): string {
    return renderTree(this.store, filling, this.policy);
  }

  renderTreeWithReport(filling: FillingValue): RenderReport {
    return renderTreeWithReport(this.store, filling, this.policy);
  }

  has(templateId: string): boolean {
    return this.store.has(templateId);
  }

  templates(): string[] {
    return this.store.ids();
  }
}
