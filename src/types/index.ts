// types/index.ts

// ============================================
// Job Manifest Types
// ============================================

export interface JobManifest {
  schema: 'papergrid-job/v0.1';
  job_id: string;
  template: TemplateRef;
  bindings?: BindingSet;
  inputs?: Record<string, InputSpec>;
  grid?: GridSpecInput;
  derive?: DerivedBindingKind[];
  issued_on?: string;
  strict?: boolean;
  output: OutputSpec;
}

export interface TemplateRef {
  id: string;
  version: string;
}

export interface InputSpec {
  type: 'csv' | 'json';
  path: string;
  options?: CsvOptions;
}

export interface CsvOptions {
  has_header?: boolean;
  delimiter?: string;
  quote?: string;
}

export interface GridSpecInput {
  row_count: number;
  month_count?: number;
}

export interface OutputSpec {
  target_formats: TargetFormat[];
  archival_profile?: boolean;
  pdfa_version?: PdfaVersion;
}

export type DerivedBindingKind = 'costs' | 'date';

// ============================================
// Template Types
// ============================================

export interface TemplateConfig {
  schema: 'papergrid-template/v0.1';
  template: TemplateRef;
  title?: string;
  document: string;
  grid?: GridRegionConfig;
}

export interface GridRegionConfig {
  region_id: string;
  trailing_row_class?: string;
  default_row_count?: number;
  layout: GridLayoutConfig;
}

export type GridLayoutConfig = TableLayoutConfig | CalendarLayoutConfig;

export interface TableLayoutConfig {
  kind: 'table';
  data_cells?: number;
  shared_columns?: { text: string }[];
}

export interface CalendarLayoutConfig {
  kind: 'calendar';
  header_row_id: string;
}

export interface LoadedTemplate {
  config: TemplateConfig;
  dir: string;
  source: string;
}

// ============================================
// Binding and Grid Types
// ============================================

export type BindingValue = string | number | null;

export type BindingSet = Record<string, BindingValue>;

export interface GridSpec {
  rowCount: number;
  monthCount?: number;
}

export type GridLayout = TableLayout | CalendarLayout;

export interface TableLayout {
  kind: 'table';
  dataCells?: number;
  sharedColumns?: string[];
}

export interface CalendarLayout {
  kind: 'calendar';
}

export interface GridCell {
  text: string;
  rowSpan?: number;
}

export interface GridRow {
  index: number;
  cells: GridCell[];
}

export interface GeneratedGrid {
  header: GridCell[];
  rows: GridRow[];
}

// ============================================
// Runtime Types
// ============================================

export interface WorkingDocument {
  id: string;
  template: TemplateRef;
  document: Document;
  content: string;
  resolvedTokens: string[];
  blankTokens: string[];
}

export type TargetFormat = 'html' | 'pdf' | 'docx' | 'odt';

export type PdfaVersion = 1 | 2 | 3;

export type ArchivalProfile = 'pdfa-1b' | 'pdfa-2b' | 'pdfa-3b';

export interface ConversionRequest {
  targetFormats: TargetFormat[];
  archivalProfile?: boolean;
  pdfaVersion?: PdfaVersion;
}

export interface ConversionArtifact {
  requestId: string;
  documentId: string;
  format: TargetFormat;
  path: string;
  archival: boolean;
}

export type ValidationResult =
  | { status: 'pass' }
  | { status: 'fail'; reason: string };

/**
 * Type guard for a pass outcome
 */
export function isPass(result: ValidationResult): result is { status: 'pass' } {
  return result.status === 'pass';
}

// ============================================
// Error Types
// ============================================

export class PaperGridError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly reason?: string
  ) {
    super(message);
    this.name = 'PaperGridError';
  }
}

export class InvalidGridSpecError extends PaperGridError {
  constructor(message: string, reason?: string) {
    super(message, 'grid', reason);
    this.name = 'InvalidGridSpecError';
  }
}

export class MalformedTokenError extends PaperGridError {
  constructor(
    message: string,
    public readonly offset: number,
    public readonly excerpt: string
  ) {
    super(message, 'template', `at offset ${offset}: ${excerpt}`);
    this.name = 'MalformedTokenError';
  }
}

export class MissingBindingError extends PaperGridError {
  constructor(public readonly tokens: string[]) {
    super(
      `Missing binding${tokens.length === 1 ? '' : 's'}: ${tokens.join(', ')}`,
      'bindings',
      'Strict mode requires every token to be bound'
    );
    this.name = 'MissingBindingError';
  }
}

export class ConversionError extends PaperGridError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly engine: string,
    public readonly attempts: number,
    reason?: string
  ) {
    super(message, format, reason);
    this.name = 'ConversionError';
  }
}

export class ConversionTimeoutError extends ConversionError {
  constructor(
    format: string,
    engine: string,
    attempts: number,
    public readonly timeoutMs: number
  ) {
    super(
      `${engine} timed out converting to ${format}`,
      format,
      engine,
      attempts,
      `No result after ${timeoutMs}ms`
    );
    this.name = 'ConversionTimeoutError';
  }
}

export class PipelineCancelledError extends PaperGridError {
  constructor(stage: string) {
    super('Pipeline cancelled', stage, 'The caller aborted the request');
    this.name = 'PipelineCancelledError';
  }
}

export class ExternalToolError extends PaperGridError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly code?: string,
    reason?: string
  ) {
    super(message, command, reason);
    this.name = 'ExternalToolError';
  }
}
