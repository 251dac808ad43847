// core/manifest.ts
// Job manifest validation and loader with AJV

import type {
  ConversionRequest,
  GridSpec,
  InputSpec,
  JobManifest,
  TemplateRef,
} from '../types/index.js';
import { getManifestValidator, parseWithSchema } from './schema-registry.js';

const validateManifest = getManifestValidator();

/**
 * Parse and validate job.json / manifest.json
 */
export function parseManifest(content: string | Buffer): JobManifest {
  return parseWithSchema(content, validateManifest, 'manifest.json');
}

/**
 * Get template reference from manifest
 */
export function getTemplateRef(manifest: JobManifest): TemplateRef {
  return manifest.template;
}

/**
 * Get all input specifications from manifest, in declaration order
 */
export function getInputSpecs(manifest: JobManifest): Map<string, InputSpec> {
  return new Map(Object.entries(manifest.inputs ?? {}));
}

export function getGridSpec(manifest: JobManifest): GridSpec | undefined {
  if (!manifest.grid) return undefined;
  return {
    rowCount: manifest.grid.row_count,
    monthCount: manifest.grid.month_count,
  };
}

export function getConversionRequest(manifest: JobManifest): ConversionRequest {
  return {
    targetFormats: manifest.output.target_formats,
    archivalProfile: manifest.output.archival_profile ?? false,
    pdfaVersion: manifest.output.pdfa_version,
  };
}
