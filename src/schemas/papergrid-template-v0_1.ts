// schemas/papergrid-template-v0_1.ts
// Template descriptor schema v0.1 (template.json)

export const PAPERGRID_TEMPLATE_V0_1_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'papergrid-template/v0.1.schema.json',
  title: 'papergrid Template v0.1',
  type: 'object',
  required: ['schema', 'template', 'document'],
  properties: {
    schema: {
      const: 'papergrid-template/v0.1',
    },
    template: {
      type: 'object',
      required: ['id', 'version'],
      properties: {
        id: { type: 'string', pattern: '^[a-zA-Z0-9_-]+$' },
        version: { type: 'string', pattern: '^[a-zA-Z0-9._-]+$' },
      },
      additionalProperties: false,
    },
    title: { type: 'string' },
    document: {
      type: 'string',
      minLength: 1,
      description: 'XHTML document filename relative to the template directory (e.g., template.xhtml)',
    },
    grid: { $ref: '#/$defs/grid' },
  },
  additionalProperties: false,
  $defs: {
    grid: {
      type: 'object',
      required: ['region_id', 'layout'],
      properties: {
        region_id: {
          type: 'string',
          pattern: '^[A-Za-z][A-Za-z0-9_-]*$',
          description: 'Id of the element (usually <tbody>) receiving generated rows.',
        },
        trailing_row_class: {
          type: 'string',
          pattern: '^[A-Za-z][A-Za-z0-9_-]*$',
          description: 'Class of fixed rows that must stay below the generated rows (e.g., total-row).',
        },
        default_row_count: {
          type: 'integer',
          description: 'Row count used when the job does not provide one.',
        },
        layout: {
          oneOf: [{ $ref: '#/$defs/tableLayout' }, { $ref: '#/$defs/calendarLayout' }],
        },
      },
      additionalProperties: false,
    },
    tableLayout: {
      type: 'object',
      required: ['kind'],
      properties: {
        kind: { const: 'table' },
        data_cells: { type: 'integer', minimum: 0 },
        shared_columns: {
          type: 'array',
          items: {
            type: 'object',
            required: ['text'],
            properties: {
              text: { type: 'string' },
            },
            additionalProperties: false,
          },
          description: 'Cells emitted on row 1 only, spanning every generated row.',
        },
      },
      additionalProperties: false,
    },
    calendarLayout: {
      type: 'object',
      required: ['kind', 'header_row_id'],
      properties: {
        kind: { const: 'calendar' },
        header_row_id: {
          type: 'string',
          pattern: '^[A-Za-z][A-Za-z0-9_-]*$',
          description: 'Id of the header <tr> receiving the month number cells.',
        },
      },
      additionalProperties: false,
    },
  },
} as const;
