import assert from 'node:assert/strict';
import test from 'node:test';
import { fileURLToPath } from 'url';
import type { BindingSet, LoadedTemplate, TemplateConfig } from '../types/index.js';
import {
  InvalidGridSpecError,
  MalformedTokenError,
  MissingBindingError,
  PaperGridError,
} from '../types/index.js';
import { childElements, requireElementById } from './html-engine.js';
import { createRenderer, renderTemplate } from './renderer.js';
import { loadTemplate } from './template.js';

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

const XHTML = 'xmlns="http://www.w3.org/1999/xhtml"';

function inlineTemplate(source: string, grid?: TemplateConfig['grid']): LoadedTemplate {
  return {
    config: {
      schema: 'papergrid-template/v0.1',
      template: { id: 'inline', version: 'v1' },
      document: 'template.xhtml',
      grid,
    },
    dir: '.',
    source,
  };
}

function bodyRows(doc: Document, id = 'tableBody'): Element[] {
  return childElements(requireElementById(doc, id, 'test'));
}

function cellTexts(row: Element): string[] {
  return childElements(row).map(cell => cell.textContent ?? '');
}

test('cost sheet with 20 rows: 4 span cells on row 1, total row kept last', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'cost-sheet', version: 'v1' });
  const working = renderTemplate(template, { qty: '120,00', cost_per_unit: '15,50 €', total_cost: '1.860,00 €' }, { rowCount: 20 });

  const rows = bodyRows(working.document);
  assert.equal(rows.length, 21);
  assert.equal(rows[20]?.getAttribute('class'), 'total-row');

  const generated = rows.slice(0, 20);
  generated.forEach((row, i) => {
    assert.equal(row.getAttribute('data-row-index'), String(i + 1));
  });

  const firstCells = childElements(generated[0] ?? rows[0]);
  const spans = firstCells.filter(cell => cell.hasAttribute('rowspan'));
  assert.equal(spans.length, 4);
  assert.deepEqual(spans.map(cell => cell.getAttribute('rowspan')), ['20', '20', '20', '20']);
  assert.deepEqual(cellTexts(generated[0] ?? rows[0]), ['', 'm²', '120,00', '15,50 €', '1.860,00 €']);

  for (const row of generated.slice(1)) {
    assert.equal(childElements(row).length, 1);
    assert.equal(childElements(row).some(cell => cell.hasAttribute('rowspan')), false);
  }

  assert.deepEqual(cellTexts(rows[20] ?? rows[0]), ['Total', '1.860,00 €']);
});

test('declared tokens follow document order after row generation', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'cost-sheet', version: 'v1' });
  const tokens = createRenderer(template).declaredTokens({ rowCount: 3 });

  assert.deepEqual(tokens, [
    'project_name',
    'client',
    'date',
    'table_row1',
    'qty',
    'cost_per_unit',
    'total_cost',
    'table_row2',
    'table_row3',
    'notes',
  ]);
});

test('binding every discovered token leaves no token behind', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'cost-sheet', version: 'v1' });
  const renderer = createRenderer(template);
  const grid = { rowCount: 20 };

  const bindings: BindingSet = {};
  for (const name of renderer.declaredTokens(grid)) {
    bindings[name] = `value of ${name}`;
  }

  const working = renderer.render(bindings, grid, { strict: true });
  assert.equal(working.content.includes('{{'), false);
  assert.equal(working.content.includes('}}'), false);
  assert.deepEqual(working.blankTokens, []);
  assert.equal(working.resolvedTokens.length, 27);
});

test('rendering twice yields byte-identical documents', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'cost-sheet', version: 'v1' });
  const bindings = { client: 'Cliente Teste', qty: 3 };

  const first = renderTemplate(template, bindings, { rowCount: 5 });
  const second = renderTemplate(template, bindings, { rowCount: 5 });

  assert.equal(first.content, second.content);
  assert.notEqual(first.id, second.id);
});

test('the template source is never modified', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'cost-sheet', version: 'v1' });
  const before = template.source;

  renderTemplate(template, { client: 'Cliente Teste' }, { rowCount: 2 });

  assert.equal(template.source, before);
  assert.equal(template.source.includes('{{client}}'), true);
});

test('unbound tokens are blank-filled and reported', () => {
  const template = inlineTemplate(`<html ${XHTML}><body><p>{{a}}-{{b}}</p></body></html>`);
  const working = renderTemplate(template, { a: 'x' });

  assert.equal(working.content, `<html ${XHTML}><body><p>x-</p></body></html>`);
  assert.deepEqual(working.resolvedTokens, ['a']);
  assert.deepEqual(working.blankTokens, ['b']);
});

test('strict mode reports every missing token at once', () => {
  const template = inlineTemplate(`<html ${XHTML}><body><p>{{a}} {{b}} {{c}}</p></body></html>`);

  assert.throws(() => renderTemplate(template, { b: 1 }, undefined, { strict: true }), (error: unknown) => {
    assert.ok(error instanceof MissingBindingError);
    assert.deepEqual(error.tokens, ['a', 'c']);
    assert.equal(error.message, 'Missing bindings: a, c');
    return true;
  });
});

test('attributes are not rewritten', () => {
  const template = inlineTemplate(`<html ${XHTML}><body><p title="{{a}}">{{a}}</p></body></html>`);
  const working = renderTemplate(template, { a: 'x' });
  assert.equal(working.content, `<html ${XHTML}><body><p title="{{a}}">x</p></body></html>`);
});

test('malformed tokens fail before substitution', () => {
  const template = inlineTemplate(`<html ${XHTML}><body><p>{{a}}</p><p>{{broken</p></body></html>`);
  assert.throws(() => renderTemplate(template, { a: 'x' }), MalformedTokenError);
});

test('rows are appended when the trailing row is absent', () => {
  const template = inlineTemplate(
    `<html ${XHTML}><body><table><tbody id="rows"><tr class="head"><td>H</td></tr></tbody></table></body></html>`,
    { region_id: 'rows', trailing_row_class: 'total-row', layout: { kind: 'table' } }
  );
  const working = renderTemplate(template, { table_row1: 'a', table_row2: 'b' }, { rowCount: 2 });

  assert.deepEqual(bodyRows(working.document, 'rows').map(row => cellTexts(row)), [['H'], ['a'], ['b']]);
});

test('calendar template gets 12 header cells and 12 month cells per row', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'calendar', version: 'v1' });
  const working = renderTemplate(template, { table_row1: 'Obra' }, { rowCount: 2, monthCount: 24 });

  const header = requireElementById(working.document, 'month-numbers', 'test');
  assert.deepEqual(
    childElements(header).map(th => th.textContent),
    ['2', '4', '6', '8', '10', '12', '14', '16', '18', '20', '22', '24']
  );
  assert.equal(childElements(header).every(cell => cell.tagName === 'th'), true);

  const rows = bodyRows(working.document);
  assert.equal(rows.length, 2);
  assert.deepEqual(cellTexts(rows[0] ?? header), ['Obra', '', '', '', '', '', '', '', '', '', '', '', '']);
  assert.equal(childElements(rows[1] ?? header).length, 13);
});

test('default_row_count applies when no grid spec is given', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'calendar', version: 'v1' });
  const working = renderTemplate(template, {});
  assert.equal(bodyRows(working.document).length, 10);
});

test('a grid region without default_row_count needs a grid spec', () => {
  const template = inlineTemplate(
    `<html ${XHTML}><body><table><tbody id="rows"/></table></body></html>`,
    { region_id: 'rows', layout: { kind: 'table' } }
  );
  assert.throws(() => renderTemplate(template, {}), InvalidGridSpecError);
});

test('invalid grid specs are rejected', async () => {
  const template = await loadTemplate(TEMPLATES_DIR, { id: 'calendar', version: 'v1' });
  assert.throws(() => renderTemplate(template, {}, { rowCount: 0 }), InvalidGridSpecError);
  assert.throws(() => renderTemplate(template, {}, { rowCount: 3, monthCount: 7 }), InvalidGridSpecError);
});

test('a missing region element is reported', () => {
  const template = inlineTemplate(`<html ${XHTML}><body/></html>`, {
    region_id: 'nowhere',
    default_row_count: 1,
    layout: { kind: 'table' },
  });
  assert.throws(() => renderTemplate(template, {}), (error: unknown) => {
    assert.ok(error instanceof PaperGridError);
    assert.equal(error.message, 'Required element not found: #nowhere');
    return true;
  });
});
