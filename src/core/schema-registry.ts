// core/schema-registry.ts
// Centralized AJV schema registry for validation

import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { PAPERGRID_JOB_V0_1_SCHEMA } from '../schemas/papergrid-job-v0_1.js';
import { PAPERGRID_TEMPLATE_V0_1_SCHEMA } from '../schemas/papergrid-template-v0_1.js';
import type { JobManifest, TemplateConfig } from '../types/index.js';
import { PaperGridError } from '../types/index.js';

// ajv and ajv-formats are CommonJS; their classes sit on `default` under NodeNext
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

// Create singleton AJV instance
const ajv = new Ajv({ strict: true, allErrors: true });
addFormats(ajv);

ajv.addSchema(PAPERGRID_JOB_V0_1_SCHEMA, PAPERGRID_JOB_V0_1_SCHEMA.$id);
ajv.addSchema(PAPERGRID_TEMPLATE_V0_1_SCHEMA, PAPERGRID_TEMPLATE_V0_1_SCHEMA.$id);

function requireValidator<T>(id: string): ValidateFunction<T> {
  const validate = ajv.getSchema<T>(id);
  if (!validate) {
    throw new Error(`Failed to compile validator: ${id}`);
  }
  return validate;
}

/**
 * Compiled validator for the job manifest schema
 */
export function getManifestValidator(): ValidateFunction<JobManifest> {
  return requireValidator<JobManifest>(PAPERGRID_JOB_V0_1_SCHEMA.$id);
}

/**
 * Compiled validator for the template descriptor schema
 */
export function getTemplateValidator(): ValidateFunction<TemplateConfig> {
  return requireValidator<TemplateConfig>(PAPERGRID_TEMPLATE_V0_1_SCHEMA.$id);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(e => `${e.instancePath || 'root'}: ${e.message}`).join('; ');
}

/**
 * Parse JSON text and check it against a compiled schema
 */
export function parseWithSchema<T>(
  content: string | Buffer,
  validate: ValidateFunction<T>,
  label: string
): T {
  let json: unknown;

  try {
    json = JSON.parse(content.toString());
  } catch (error) {
    throw new PaperGridError(
      `Invalid JSON in ${label}`,
      label,
      error instanceof Error ? error.message : 'Parse error'
    );
  }

  if (!validate(json)) {
    throw new PaperGridError(`Schema validation failed for ${label}`, label, formatSchemaErrors(validate.errors));
  }

  return json;
}

export { PAPERGRID_JOB_V0_1_SCHEMA, PAPERGRID_TEMPLATE_V0_1_SCHEMA };
