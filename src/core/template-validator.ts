// core/template-validator.ts
// Template validation: schema validation and document reference integrity checks

import * as fs from 'fs/promises';
import * as path from 'path';
import type { TemplateConfig } from '../types/index.js';
import { MalformedTokenError, PaperGridError } from '../types/index.js';
import * as htmlEngine from './html-engine.js';
import { getTemplateValidator } from './schema-registry.js';
import { TEMPLATE_DESCRIPTOR } from './template.js';
import { scanTokens } from './tokens.js';

const validateTemplate = getTemplateValidator();

export interface TemplateValidationReport {
  valid: boolean;
  schemaErrors: Array<{
    path: string;
    message: string;
  }>;
  documentErrors: Array<{
    type: 'file_not_found' | 'parse_error' | 'missing_region' | 'missing_header_row' | 'malformed_token';
    file: string;
    message: string;
  }>;
  warnings: string[];
  tokens: string[];
}

/**
 * Validate template.json against the schema and check the document it references
 */
export async function validateTemplateFull(templateDir: string): Promise<TemplateValidationReport> {
  const result: TemplateValidationReport = {
    valid: true,
    schemaErrors: [],
    documentErrors: [],
    warnings: [],
    tokens: [],
  };

  // Step 1: Schema validation
  const descriptorPath = path.join(templateDir, TEMPLATE_DESCRIPTOR);
  let content: string;
  try {
    content = await fs.readFile(descriptorPath, 'utf-8');
  } catch {
    result.valid = false;
    result.documentErrors.push({
      type: 'file_not_found',
      file: TEMPLATE_DESCRIPTOR,
      message: `${TEMPLATE_DESCRIPTOR} not found in ${templateDir}`,
    });
    return result;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    result.valid = false;
    result.schemaErrors.push({
      path: '',
      message: `Invalid JSON: ${error instanceof Error ? error.message : 'Parse error'}`,
    });
    return result;
  }

  if (!validateTemplate(data)) {
    result.valid = false;
    for (const err of validateTemplate.errors ?? []) {
      result.schemaErrors.push({
        path: err.instancePath || 'root',
        message: err.message || 'Validation error',
      });
    }
    return result;
  }

  const config: TemplateConfig = data;
  checkCatalogueLocation(config, templateDir, result);

  // Step 2: Document parse
  const documentPath = path.join(templateDir, config.document);
  let source: string;
  try {
    source = await fs.readFile(documentPath, 'utf-8');
  } catch {
    result.valid = false;
    result.documentErrors.push({
      type: 'file_not_found',
      file: config.document,
      message: `Document not found: ${config.document}`,
    });
    return result;
  }

  let doc: Document;
  try {
    doc = htmlEngine.parseDocument(source, config.document);
  } catch (error) {
    result.valid = false;
    result.documentErrors.push({
      type: 'parse_error',
      file: config.document,
      message: error instanceof PaperGridError ? `${error.message}: ${error.reason ?? ''}` : String(error),
    });
    return result;
  }

  // Step 3: Grid region references
  if (config.grid) {
    const { grid } = config;
    const region = htmlEngine.findById(doc, grid.region_id);

    if (!region) {
      result.valid = false;
      result.documentErrors.push({
        type: 'missing_region',
        file: config.document,
        message: `Grid region references missing ID: ${grid.region_id}`,
      });
    } else if (grid.trailing_row_class &&
      htmlEngine.findChildrenByClass(region, grid.trailing_row_class).length === 0) {
      result.warnings.push(
        `No row with class "${grid.trailing_row_class}" in #${grid.region_id}; generated rows will be appended`
      );
    }

    if (grid.layout.kind === 'calendar') {
      const headerRow = htmlEngine.findById(doc, grid.layout.header_row_id);
      if (!headerRow) {
        result.valid = false;
        result.documentErrors.push({
          type: 'missing_header_row',
          file: config.document,
          message: `Calendar header references missing ID: ${grid.layout.header_row_id}`,
        });
      } else if (htmlEngine.childElements(headerRow).length > 0) {
        result.warnings.push(
          `Header row #${grid.layout.header_row_id} already has cells; 12 month cells are appended after them`
        );
      }
    }

    if (grid.default_row_count === undefined) {
      result.warnings.push('No default_row_count: every job must give grid.row_count');
    }
  }

  // Step 4: Token syntax
  try {
    result.tokens = [...scanTokens(doc)];
  } catch (error) {
    if (!(error instanceof MalformedTokenError)) throw error;
    result.valid = false;
    result.documentErrors.push({
      type: 'malformed_token',
      file: config.document,
      message: `${error.message} ${error.reason ?? ''}`.trim(),
    });
  }

  return result;
}

/**
 * Templates live at <templates>/<id>/<version>/
 */
function checkCatalogueLocation(
  config: TemplateConfig,
  templateDir: string,
  result: TemplateValidationReport
): void {
  const resolved = path.resolve(templateDir);
  const version = path.basename(resolved);
  const id = path.basename(path.dirname(resolved));

  if (config.template.id !== id || config.template.version !== version) {
    result.warnings.push(
      `Template ${config.template.id}/${config.template.version} is stored at ${id}/${version}; loading by reference will fail`
    );
  }
}

/**
 * Print validation report to console
 */
export function printValidationReport(result: TemplateValidationReport): void {
  console.log('\n=== Template Validation Report ===');
  console.log(`Overall: ${result.valid ? '✓ VALID' : '✗ INVALID'}`);

  if (result.schemaErrors.length > 0) {
    console.log('\nSchema Errors:');
    for (const err of result.schemaErrors) {
      console.log(`  ✗ ${err.path}: ${err.message}`);
    }
  }

  if (result.documentErrors.length > 0) {
    console.log('\nDocument Errors:');
    for (const err of result.documentErrors) {
      console.log(`  ✗ [${err.type}] ${err.file}: ${err.message}`);
    }
  }

  if (result.warnings.length > 0) {
    console.log('\nWarnings:');
    for (const warn of result.warnings) {
      console.log(`  ⚠ ${warn}`);
    }
  }

  if (result.tokens.length > 0) {
    console.log(`\nTokens (${result.tokens.length}): ${result.tokens.join(', ')}`);
  }

  if (result.valid) {
    console.log('\n✓ All checks passed');
  }

  console.log('===================================\n');
}
