// core/template.ts
// Template descriptor loader and template catalogue

import * as fs from 'fs/promises';
import * as path from 'path';
import type { LoadedTemplate, TemplateConfig, TemplateRef } from '../types/index.js';
import { PaperGridError } from '../types/index.js';
import { getTemplateValidator, parseWithSchema } from './schema-registry.js';

export const TEMPLATE_DESCRIPTOR = 'template.json';

const validateTemplate = getTemplateValidator();

/**
 * Parse and validate template.json
 */
export function parseTemplate(content: string | Buffer): TemplateConfig {
  return parseWithSchema(content, validateTemplate, TEMPLATE_DESCRIPTOR);
}

export function templateDir(templatesDir: string, ref: TemplateRef): string {
  return path.join(templatesDir, ref.id, ref.version);
}

/**
 * Load a template directory: descriptor plus the raw document source
 */
export async function loadTemplateDir(dir: string): Promise<LoadedTemplate> {
  const descriptorPath = path.join(dir, TEMPLATE_DESCRIPTOR);

  let descriptor: string;
  try {
    descriptor = await fs.readFile(descriptorPath, 'utf-8');
  } catch (error) {
    throw new PaperGridError(
      'Template descriptor not found',
      descriptorPath,
      error instanceof Error ? error.message : String(error)
    );
  }

  const config = parseTemplate(descriptor);
  const documentPath = path.join(dir, config.document);

  let source: string;
  try {
    source = await fs.readFile(documentPath, 'utf-8');
  } catch (error) {
    throw new PaperGridError(
      `Template document not found: ${config.document}`,
      documentPath,
      error instanceof Error ? error.message : String(error)
    );
  }

  return { config, dir, source };
}

/**
 * Load a template from the catalogue and check it is the one requested
 */
export async function loadTemplate(templatesDir: string, ref: TemplateRef): Promise<LoadedTemplate> {
  const loaded = await loadTemplateDir(templateDir(templatesDir, ref));
  validateTemplateMatch(loaded.config, ref);
  return loaded;
}

/**
 * Validate template matches the job manifest reference
 */
export function validateTemplateMatch(
  template: TemplateConfig,
  expectedRef: TemplateRef
): void {
  if (template.template.id !== expectedRef.id) {
    throw new PaperGridError(
      `Template ID mismatch: expected ${expectedRef.id}, got ${template.template.id}`,
      TEMPLATE_DESCRIPTOR,
      'Template ID does not match manifest'
    );
  }

  if (template.template.version !== expectedRef.version) {
    throw new PaperGridError(
      `Template version mismatch: expected ${expectedRef.version}, got ${template.template.version}`,
      TEMPLATE_DESCRIPTOR,
      'Template version does not match manifest'
    );
  }
}

/**
 * List every <id>/<version> directory holding a template.json, sorted
 */
export async function listTemplates(templatesDir: string): Promise<TemplateRef[]> {
  const refs: TemplateRef[] = [];

  let ids: string[];
  try {
    ids = await fs.readdir(templatesDir);
  } catch (error) {
    throw new PaperGridError(
      'Templates directory not readable',
      templatesDir,
      error instanceof Error ? error.message : String(error)
    );
  }

  for (const id of ids.sort()) {
    const idDir = path.join(templatesDir, id);
    if (!(await isDirectory(idDir))) continue;

    const versions = (await fs.readdir(idDir)).sort();
    for (const version of versions) {
      if (await pathExists(path.join(idDir, version, TEMPLATE_DESCRIPTOR))) {
        refs.push({ id, version });
      }
    }
  }

  return refs;
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
