// core/converter.ts
// Working document -> target formats via external engines, with PDF/A normalization

import * as fs from 'fs/promises';
import * as path from 'path';
import type {
  ConversionArtifact,
  ConversionRequest,
  PdfaVersion,
  TargetFormat,
} from '../types/index.js';
import {
  ConversionError,
  ConversionTimeoutError,
  ExternalToolError,
  PaperGridError,
} from '../types/index.js';
import type { ProcessRunner } from './process-runner.js';
import { expandArgs, runProcess } from './process-runner.js';
import type { ToolConfig } from './tool-config.js';
import { resolveToolConfig } from './tool-config.js';

export type EngineName = 'weasyprint' | 'libreoffice';

export interface ConversionEngine {
  name: string;
  command: string;
  /** Placeholders: {input} {output} {outdir} {filter} {profile} */
  args: string[];
  /** Target format -> value substituted for {filter} */
  filters: Partial<Record<TargetFormat, string>>;
}

export interface ConvertOptions {
  /** Request-private directory; every attempt gets its own subdirectory */
  workDir: string;
  requestId: string;
  documentId: string;
  engine?: EngineName | 'auto';
  tools?: ToolConfig;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  retries?: number;
}

interface StageContext {
  workDir: string;
  stem: string;
  timeoutMs: number;
  retries: number;
  runner: ProcessRunner;
  signal?: AbortSignal;
}

export const DEFAULT_PDFA_VERSION: PdfaVersion = 1;

const EXTENSIONS: Record<TargetFormat, string> = {
  html: 'html',
  pdf: 'pdf',
  docx: 'docx',
  odt: 'odt',
};

export function buildEngines(tools: ToolConfig): ConversionEngine[] {
  return [
    {
      name: 'weasyprint',
      command: tools.weasyprint,
      args: ['{input}', '{output}'],
      filters: { pdf: 'pdf' },
    },
    {
      name: 'libreoffice',
      command: tools.soffice,
      args: [
        '--headless',
        '--norestore',
        '-env:UserInstallation={profile}',
        '--convert-to',
        '{filter}',
        '--outdir',
        '{outdir}',
        '{input}',
      ],
      filters: {
        pdf: 'pdf:writer_web_pdf_Export',
        docx: 'docx:MS Word 2007 XML',
        odt: 'odt:writerweb8_writer',
      },
    },
  ];
}

/**
 * Ghostscript pass producing a PDF/A file (fonts embedded, transparency flattened)
 */
export function buildNormalizer(tools: ToolConfig, version: PdfaVersion): ConversionEngine {
  return {
    name: 'ghostscript',
    command: tools.ghostscript,
    args: [
      `-dPDFA=${version}`,
      '-dBATCH',
      '-dNOPAUSE',
      '-dPDFACompatibilityPolicy=1',
      '-dPDFSETTINGS=/prepress',
      '-dAutoRotatePages=/None',
      '-sDEVICE=pdfwrite',
      '-sOutputFile={output}',
      '{input}',
    ],
    filters: { pdf: 'pdf' },
  };
}

/**
 * Engines able to produce `format`, in the order they are tried
 */
export function selectEngines(
  engines: ConversionEngine[],
  format: TargetFormat,
  engine: EngineName | 'auto' = 'auto'
): ConversionEngine[] {
  return engines.filter(e => e.filters[format] !== undefined && (engine === 'auto' || e.name === engine));
}

/**
 * Convert a working document into every requested format.
 * Each format is converted independently; failures are retried once.
 */
export async function convertDocument(
  workingDocumentPath: string,
  request: ConversionRequest,
  options: ConvertOptions
): Promise<ConversionArtifact[]> {
  const tools = options.tools ?? resolveToolConfig();
  const engines = buildEngines(tools);
  const engineChoice = options.engine ?? 'auto';

  assertConversionRequest(request);

  // Reject unsupported combinations before spawning anything
  for (const format of request.targetFormats) {
    if (format !== 'html' && selectEngines(engines, format, engineChoice).length === 0) {
      throw new PaperGridError(
        `No conversion engine for ${format}`,
        format,
        `Engine "${engineChoice}" cannot produce ${format}`
      );
    }
  }

  const ctx: StageContext = {
    workDir: options.workDir,
    stem: path.basename(workingDocumentPath, path.extname(workingDocumentPath)),
    timeoutMs: tools.timeoutMs,
    retries: options.retries ?? 1,
    runner: options.runner ?? runProcess,
    signal: options.signal,
  };

  const artifacts: ConversionArtifact[] = [];
  const tag = { requestId: options.requestId, documentId: options.documentId };

  for (const format of request.targetFormats) {
    if (format === 'html') {
      const target = path.join(ctx.workDir, 'html', `${ctx.stem}.html`);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(workingDocumentPath, target);
      artifacts.push({ ...tag, format, path: target, archival: false });
      continue;
    }

    const primary = await convertFormat(
      selectEngines(engines, format, engineChoice),
      workingDocumentPath,
      format,
      ctx
    );

    if (format === 'pdf' && request.archivalProfile) {
      const version = request.pdfaVersion ?? DEFAULT_PDFA_VERSION;
      const archival = await normalizeToArchival(primary, buildNormalizer(tools, version), ctx);
      artifacts.push({ ...tag, format, path: archival, archival: true });
    } else {
      artifacts.push({ ...tag, format, path: primary, archival: false });
    }
  }

  return artifacts;
}

export function assertConversionRequest(request: ConversionRequest): void {
  if (request.targetFormats.length === 0) {
    throw new PaperGridError('No target formats requested', 'output', 'target_formats must not be empty');
  }
  if (request.archivalProfile && !request.targetFormats.includes('pdf')) {
    throw new PaperGridError(
      'Archival profile requires a pdf target',
      'output',
      'Add "pdf" to target_formats or disable archival_profile'
    );
  }
}

/**
 * Try engines in order; an engine that is not installed hands over to the next one
 */
async function convertFormat(
  candidates: ConversionEngine[],
  input: string,
  format: TargetFormat,
  ctx: StageContext
): Promise<string> {
  const missing: string[] = [];

  for (const engine of candidates) {
    try {
      console.log(`Trying conversion engine: ${engine.name} (${format})`);
      const output = await runStage(engine, input, format, ctx);
      console.log(`✓ Conversion successful with ${engine.name}`);
      return output;
    } catch (error) {
      if (error instanceof ExternalToolError && error.code === 'ENOENT') {
        console.log(`✗ ${engine.name} not available: ${engine.command}`);
        missing.push(engine.command);
        continue;
      }
      if (error instanceof ExternalToolError) {
        throw new ConversionError(
          `${engine.name} could not be started`,
          format,
          engine.name,
          1,
          error.reason ?? error.message
        );
      }
      throw error;
    }
  }

  throw new ConversionError(
    `No conversion engine available for ${format}`,
    format,
    candidates.map(e => e.name).join(', '),
    0,
    `Commands not found: ${missing.join(', ')}`
  );
}

async function normalizeToArchival(
  pdfPath: string,
  normalizer: ConversionEngine,
  ctx: StageContext
): Promise<string> {
  console.log(`Normalizing to PDF/A with ${normalizer.name}`);
  try {
    return await runStage(normalizer, pdfPath, 'pdf', { ...ctx, workDir: path.join(ctx.workDir, 'archival') });
  } catch (error) {
    if (error instanceof ExternalToolError) {
      throw new ConversionError(
        'PDF/A normalization unavailable',
        'pdf',
        normalizer.name,
        0,
        error.reason ?? error.message
      );
    }
    throw error;
  }
}

/**
 * Run one engine with retries. Only ConversionError is retried;
 * cancellation and spawn failures propagate at once.
 */
async function runStage(
  engine: ConversionEngine,
  input: string,
  format: TargetFormat,
  ctx: StageContext
): Promise<string> {
  const maxAttempts = 1 + ctx.retries;
  let lastError: ConversionError | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await attemptConversion(engine, input, format, attempt, ctx);
    } catch (error) {
      if (!(error instanceof ConversionError)) {
        throw error;
      }
      lastError = error;
      console.log(`✗ ${engine.name} attempt ${attempt}/${maxAttempts} failed: ${error.reason ?? error.message}`);
    }
  }

  throw lastError ?? new ConversionError(`${engine.name} was not run`, format, engine.name, 0);
}

async function attemptConversion(
  engine: ConversionEngine,
  input: string,
  format: TargetFormat,
  attempt: number,
  ctx: StageContext
): Promise<string> {
  const outdir = path.join(ctx.workDir, `${format}-${engine.name}-${attempt}`);
  await fs.mkdir(outdir, { recursive: true });

  const output = path.join(outdir, `${ctx.stem}.${EXTENSIONS[format]}`);
  const args = expandArgs(engine.args, {
    input,
    output,
    outdir,
    filter: engine.filters[format] ?? format,
    profile: `file://${path.join(outdir, 'profile')}`,
  });

  const result = await ctx.runner(engine.command, args, {
    cwd: outdir,
    timeoutMs: ctx.timeoutMs,
    signal: ctx.signal,
  });

  if (result.timedOut) {
    throw new ConversionTimeoutError(format, engine.name, attempt, ctx.timeoutMs);
  }

  if (result.exitCode !== 0) {
    const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
    throw new ConversionError(
      `${engine.name} exited with ${status}`,
      format,
      engine.name,
      attempt,
      result.stderr.trim() || result.stdout.trim()
    );
  }

  const size = await fileSize(output);
  if (size === null) {
    throw new ConversionError(`${engine.name} produced no output`, format, engine.name, attempt, `Expected ${output}`);
  }
  if (size === 0) {
    throw new ConversionError(`${engine.name} produced an empty file`, format, engine.name, attempt, output);
  }

  return output;
}

async function fileSize(target: string): Promise<number | null> {
  try {
    return (await fs.stat(target)).size;
  } catch {
    return null;
  }
}
