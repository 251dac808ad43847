// core/datasource.ts
// Binding inputs: key/value CSV files and JSON objects

import { parse } from 'csv-parse/sync';
import type { BindingSet, CsvOptions, InputSpec } from '../types/index.js';
import { PaperGridError } from '../types/index.js';

const DEFAULT_CSV_OPTIONS: Required<CsvOptions> = {
  has_header: true,
  delimiter: ',',
  quote: '"',
};

/**
 * Parse an input file into bindings according to its spec
 */
export function parseInput(content: Buffer | string, spec: InputSpec): BindingSet {
  if (spec.type === 'json') {
    let json: unknown;
    try {
      json = JSON.parse(content.toString());
    } catch (error) {
      throw new PaperGridError(
        `Failed to parse JSON: ${spec.path}`,
        spec.path,
        error instanceof Error ? error.message : String(error)
      );
    }
    return parseJsonBindings(json);
  }
  return parseCsvBindings(content, spec);
}

/**
 * Parse key-value CSV format
 * Expected: rows of [key, value] pairs
 * First row is header: key,value (skipped if has_header=true)
 */
export function parseCsvBindings(content: Buffer | string, spec: InputSpec): BindingSet {
  const options = { ...DEFAULT_CSV_OPTIONS, ...spec.options };

  let records: unknown[];
  try {
    records = parse(content, {
      delimiter: options.delimiter,
      quote: options.quote,
      from_line: options.has_header ? 2 : 1,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new PaperGridError(
      `Failed to parse CSV: ${spec.path}`,
      spec.path,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result: BindingSet = {};

  for (const record of records) {
    if (!Array.isArray(record) || record.length < 2) {
      continue;
    }

    const [key, value] = record;
    if (typeof key === 'string' && key.trim()) {
      result[key.trim()] = String(value ?? '');
    }
  }

  return result;
}

/**
 * Parse JSON object into bindings with dot-notation keys.
 * Numbers and null are kept as they are; arrays are stored as JSON text.
 */
export function parseJsonBindings(input: unknown): BindingSet {
  if (Array.isArray(input)) {
    const result: BindingSet = {};
    for (const entry of input) {
      if (!isRecord(entry)) continue;
      if (typeof entry.key === 'string' && entry.key.trim()) {
        result[entry.key.trim()] = toBindingValue(entry.value);
      }
    }
    return result;
  }

  if (!isRecord(input)) {
    throw new PaperGridError('Invalid JSON bindings', 'inputs', 'Expected an object or array of {key,value}.');
  }

  const result: BindingSet = {};

  const visit = (value: unknown, prefix: string) => {
    if (Array.isArray(value)) {
      result[prefix] = JSON.stringify(value);
      return;
    }
    if (isRecord(value)) {
      const keys = Object.keys(value);
      if (keys.length === 0) {
        result[prefix] = '';
        return;
      }
      for (const key of keys) {
        visit(value[key], prefix ? `${prefix}.${key}` : key);
      }
      return;
    }
    result[prefix] = toBindingValue(value);
  };

  for (const key of Object.keys(input)) {
    visit(input[key], key);
  }

  return result;
}

/**
 * Merge binding sets left to right; later sets win
 */
export function mergeBindings(...sets: BindingSet[]): BindingSet {
  return Object.assign({}, ...sets);
}

function toBindingValue(value: unknown): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
