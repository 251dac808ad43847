// core/renderer.ts
// Fill a template: splice generated rows, then substitute every token

import { randomUUID } from 'crypto';
import type {
  BindingSet,
  GridRegionConfig,
  GridSpec,
  LoadedTemplate,
  TemplateConfig,
  WorkingDocument,
} from '../types/index.js';
import { InvalidGridSpecError, MissingBindingError } from '../types/index.js';
import { generateGrid, toGridLayout } from './grid-generator.js';
import * as htmlEngine from './html-engine.js';
import { hasBinding, scanTokens, substituteTokens, TOKEN_OPEN } from './tokens.js';

export interface RenderOptions {
  strict?: boolean;
  requestId?: string;
}

export class Renderer {
  private config: TemplateConfig;
  private source: string;

  constructor(template: LoadedTemplate) {
    this.config = template.config;
    this.source = template.source;
  }

  render(bindings: BindingSet, grid?: GridSpec, options: RenderOptions = {}): WorkingDocument {
    const doc = this.buildDocument(grid);

    // Scanning the whole tree first surfaces malformed tokens before any substitution
    const tokens = [...scanTokens(doc)];
    const missing = tokens.filter(name => !hasBinding(name, bindings));

    if (options.strict && missing.length > 0) {
      throw new MissingBindingError(missing);
    }

    for (const node of htmlEngine.collectTextNodes(doc)) {
      if (node.data.includes(TOKEN_OPEN)) {
        htmlEngine.setTextData(node, substituteTokens(node.data, bindings, { strict: options.strict }));
      }
    }

    return {
      id: options.requestId ?? randomUUID(),
      template: this.config.template,
      document: doc,
      content: htmlEngine.serializeDocument(doc),
      resolvedTokens: tokens.filter(name => hasBinding(name, bindings)),
      blankTokens: missing,
    };
  }

  /**
   * Token names the template expects once its rows are generated
   */
  declaredTokens(grid?: GridSpec): string[] {
    return [...scanTokens(this.buildDocument(grid))];
  }

  /**
   * Parse a fresh copy of the template and splice in the generated rows
   */
  private buildDocument(grid?: GridSpec): Document {
    const doc = htmlEngine.parseDocument(this.source, this.config.document);
    const region = this.config.grid;

    if (region) {
      this.applyGrid(doc, region, grid ?? this.defaultGrid(region));
    } else if (grid) {
      console.warn(`Warning: template ${this.config.template.id} has no grid region; grid spec ignored`);
    }

    return doc;
  }

  private defaultGrid(region: GridRegionConfig): GridSpec {
    if (region.default_row_count === undefined) {
      throw new InvalidGridSpecError(
        'Missing row count',
        `Template ${this.config.template.id} declares a grid region but no default_row_count`
      );
    }
    return { rowCount: region.default_row_count };
  }

  private applyGrid(doc: Document, region: GridRegionConfig, grid: GridSpec): void {
    const generated = generateGrid(grid, toGridLayout(region.layout));
    const body = htmlEngine.requireElementById(doc, region.region_id, `grid:${region.region_id}`);

    // Generated rows go after heading rows and before the first fixed trailing row
    const anchor = region.trailing_row_class
      ? htmlEngine.findChildrenByClass(body, region.trailing_row_class)[0] ?? null
      : null;

    htmlEngine.insertRows(doc, body, generated.rows, anchor);

    if (region.layout.kind === 'calendar') {
      const headerRow = htmlEngine.requireElementById(
        doc,
        region.layout.header_row_id,
        `grid:${region.layout.header_row_id}`
      );
      htmlEngine.appendHeaderCells(doc, headerRow, generated.header);
    }
  }
}

export function createRenderer(template: LoadedTemplate): Renderer {
  return new Renderer(template);
}

/**
 * Render a template into a new working document
 */
export function renderTemplate(
  template: LoadedTemplate,
  bindings: BindingSet,
  grid?: GridSpec,
  options?: RenderOptions
): WorkingDocument {
  return createRenderer(template).render(bindings, grid, options);
}
