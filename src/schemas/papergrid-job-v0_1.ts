// schemas/papergrid-job-v0_1.ts
// Job manifest schema v0.1 (job.json / manifest.json in a job zip)

export const PAPERGRID_JOB_V0_1_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'papergrid-job/v0.1.schema.json',
  title: 'papergrid Job v0.1',
  type: 'object',
  required: ['schema', 'job_id', 'template', 'output'],
  properties: {
    schema: {
      const: 'papergrid-job/v0.1',
    },
    job_id: { type: 'string', minLength: 1 },
    template: {
      type: 'object',
      required: ['id', 'version'],
      properties: {
        id: { type: 'string', minLength: 1 },
        version: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    bindings: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/bindingValue' },
    },
    inputs: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/input' },
    },
    grid: {
      type: 'object',
      required: ['row_count'],
      properties: {
        row_count: { type: 'integer' },
        month_count: { type: 'integer' },
      },
      additionalProperties: false,
    },
    derive: {
      type: 'array',
      uniqueItems: true,
      items: { enum: ['costs', 'date'] },
    },
    issued_on: {
      type: 'string',
      format: 'date',
      description: 'Issue date used for the derived "date" binding (YYYY-MM-DD).',
    },
    strict: { type: 'boolean' },
    output: {
      type: 'object',
      required: ['target_formats'],
      properties: {
        target_formats: {
          type: 'array',
          minItems: 1,
          uniqueItems: true,
          items: { enum: ['html', 'pdf', 'docx', 'odt'] },
        },
        archival_profile: { type: 'boolean' },
        pdfa_version: { enum: [1, 2, 3] },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
  $defs: {
    bindingValue: {
      anyOf: [{ type: 'string' }, { type: 'number' }, { type: 'null' }],
    },
    input: {
      type: 'object',
      required: ['type', 'path'],
      properties: {
        type: { enum: ['csv', 'json'] },
        path: { type: 'string', minLength: 1 },
        options: {
          type: 'object',
          properties: {
            has_header: { type: 'boolean' },
            delimiter: { type: 'string', minLength: 1 },
            quote: { type: 'string', minLength: 1 },
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
  },
} as const;
