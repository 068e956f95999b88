import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadTemplateDirectory } from '../../src/loader/template-loader.js';
import { loadFillingFromFile, loadFillingFromYAML } from '../../src/loader/filling-loader.js';
import { createRenderPolicy } from '../../src/policy/render-policy.js';
import { renderTree, renderTreeWithReport } from '../../src/engine/composition-engine.js';
import { TemplateNest } from '../../src/engine/template-nest.js';

const fixturesDir = resolve(__dirname, '../fixtures');

describe('rendering a site from files', () => {
  it('renders a YAML filling against a template directory', async () => {
    const policy = createRenderPolicy();
    const store = (await loadTemplateDirectory(resolve(fixturesDir, 'templates'))).seal(policy.syntax);
    const filling = await loadFillingFromFile(resolve(fixturesDir, 'fillings', 'page.yaml'));

    expect(renderTree(store, filling, policy)).toBe(
      [
        '<html>',
        '  <head><title>Fish &amp; Chips</title></head>',
        '  <body>',
        '    <p>First</p>',
        '    <p>Second</p>',
        '',
        '  </body>',
        '</html>',
        '',
      ].join('\n'),
    );
  });

  it('labels every nested block', async () => {
    const nest = await TemplateNest.fromDirectory(resolve(fixturesDir, 'templates'), { showLabels: true });
    const filling = loadFillingFromYAML(`
      TEMPLATE: page
      title: Menu
      content:
        - TEMPLATE: parts/nav-item
          label: Home
    `);

    expect(nest.renderTree(filling)).toBe(
      [
        '<html>',
        '  <head><title>Menu</title></head>',
        '  <body>',
        '    <!-- BEGIN parts/nav-item (content[0]) -->',
        '    <li>Home</li>',
        '    <!-- END parts/nav-item (content[0]) -->',
        '',
        '  </body>',
        '</html>',
        '',
      ].join('\n'),
    );
  });

  it('renders the same output from the same inputs', async () => {
    const nest = await TemplateNest.fromDirectory(resolve(fixturesDir, 'templates'), { dieOnBadParams: false });
    const filling = await loadFillingFromFile(resolve(fixturesDir, 'fillings', 'missing.yaml'));

    const first = renderTreeWithReport(nest.store, filling, nest.policy);
    const second = renderTreeWithReport(nest.store, filling, nest.policy);

    expect(first).toEqual(second);
    expect(first.output).toBe('<p></p>\n');
    expect(first.missing).toHaveLength(1);
  });
});
