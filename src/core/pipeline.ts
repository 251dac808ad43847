// core/pipeline.ts
// Render -> Convert -> Validate for one request, with request-scoped paths

import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type {
  ArchivalProfile,
  BindingSet,
  ConversionArtifact,
  ConversionRequest,
  DerivedBindingKind,
  GridSpec,
  LoadedTemplate,
  TemplateRef,
  ValidationResult,
} from '../types/index.js';
import { PaperGridError, PipelineCancelledError } from '../types/index.js';
import { printValidationResult, validateArtifact } from './compliance-validator.js';
import type { EngineName } from './converter.js';
import { assertConversionRequest, convertDocument, DEFAULT_PDFA_VERSION } from './converter.js';
import { deriveBindings } from './formatter.js';
import { getConversionRequest, getGridSpec } from './manifest.js';
import type { ProcessRunner } from './process-runner.js';
import { renderTemplate } from './renderer.js';
import { listTemplates, loadTemplate } from './template.js';
import type { ToolConfig } from './tool-config.js';
import { profileForVersion, resolveToolConfig } from './tool-config.js';
import type { JobPackage } from './zip-handler.js';

export interface PipelineRequest {
  template: LoadedTemplate;
  bindings: BindingSet;
  grid?: GridSpec;
  conversion: ConversionRequest;
  strict?: boolean;
  derive?: DerivedBindingKind[];
  issuedOn?: string;
}

export interface PipelineOptions {
  /** Artifacts are published under <outputDir>/<requestId>/ */
  outputDir: string;
  engine?: EngineName | 'auto';
  tools?: ToolConfig;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  /** Parent of the private work directory (OS temp dir by default) */
  workRoot?: string;
  now?: () => Date;
}

export interface PipelineResult {
  requestId: string;
  artifacts: ConversionArtifact[];
  profile?: ArchivalProfile;
  validation?: ValidationResult;
  blankTokens: string[];
}

export async function runPipeline(
  request: PipelineRequest,
  options: PipelineOptions
): Promise<PipelineResult> {
  const requestId = randomUUID();
  const tools = options.tools ?? resolveToolConfig();
  const { signal } = options;

  // Request, grid, token and binding errors all surface before any process spawns
  throwIfAborted(signal, 'render');
  assertConversionRequest(request.conversion);

  const bindings = request.derive?.length
    ? deriveBindings(request.bindings, request.derive, { issuedOn: request.issuedOn, now: options.now })
    : request.bindings;

  const working = renderTemplate(request.template, bindings, request.grid, {
    strict: request.strict,
    requestId,
  });

  if (working.blankTokens.length > 0) {
    console.warn(`Warning: ${working.blankTokens.length} unbound token(s) left blank: ${working.blankTokens.join(', ')}`);
  }

  const workDir = await fs.mkdtemp(path.join(options.workRoot ?? os.tmpdir(), 'papergrid-'));
  const publishDir = path.join(options.outputDir, requestId);

  try {
    const documentPath = path.join(workDir, `${request.template.config.template.id}.html`);
    await fs.writeFile(documentPath, working.content, 'utf-8');

    const converted = await convertDocument(documentPath, request.conversion, {
      workDir: path.join(workDir, 'convert'),
      requestId,
      documentId: working.id,
      engine: options.engine,
      tools,
      runner: options.runner,
      signal,
    });

    let profile: ArchivalProfile | undefined;
    let validation: ValidationResult | undefined;

    if (request.conversion.archivalProfile) {
      profile = profileForVersion(request.conversion.pdfaVersion ?? DEFAULT_PDFA_VERSION);
      const archival = converted.find(artifact => artifact.archival);
      if (!archival) {
        throw new PaperGridError('Archival artifact missing', 'pdf', 'Normalization produced no artifact');
      }
      validation = await validateArtifact(archival.path, profile, { tools, runner: options.runner, signal });
    }

    throwIfAborted(signal, 'publish');
    const artifacts = await publishArtifacts(converted, publishDir);

    return { requestId, artifacts, profile, validation, blankTokens: working.blankTokens };
  } catch (error) {
    await fs.rm(publishDir, { recursive: true, force: true });
    throw error;
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}

export interface JobRunOptions extends PipelineOptions {
  templatesDir: string;
  /** Overrides the manifest's `strict` */
  strict?: boolean;
}

/**
 * Run a loaded job package: manifest -> template -> pipeline
 */
export async function runJob(job: JobPackage, options: JobRunOptions): Promise<PipelineResult> {
  const { manifest } = job;
  const template = await loadTemplate(options.templatesDir, manifest.template);

  return runPipeline(
    {
      template,
      bindings: job.bindings,
      grid: getGridSpec(manifest),
      conversion: getConversionRequest(manifest),
      strict: options.strict ?? manifest.strict ?? false,
      derive: manifest.derive,
      issuedOn: manifest.issued_on,
    },
    options
  );
}

export type CatalogueRunResult =
  | { template: TemplateRef; status: 'ok'; result: PipelineResult }
  | { template: TemplateRef; status: 'error'; error: PaperGridError };

/**
 * Run one job's bindings and output settings against every template in the
 * catalogue. A template that fails is reported and the others still run;
 * cancellation stops the whole run.
 */
export async function runCatalogue(job: JobPackage, options: JobRunOptions): Promise<CatalogueRunResult[]> {
  const refs = await listTemplates(options.templatesDir);
  if (refs.length === 0) {
    throw new PaperGridError('No templates found', options.templatesDir, 'Expected <id>/<version>/template.json');
  }

  const results: CatalogueRunResult[] = [];
  for (const ref of refs) {
    console.log(`\nTemplate: ${ref.id} ${ref.version}`);
    try {
      const result = await runJob({ ...job, manifest: { ...job.manifest, template: ref } }, options);
      results.push({ template: ref, status: 'ok', result });
    } catch (error) {
      if (error instanceof PipelineCancelledError || !(error instanceof PaperGridError)) {
        throw error;
      }
      console.error(`✗ ${ref.id} ${ref.version}: ${error.message}`);
      results.push({ template: ref, status: 'error', error });
    }
  }
  return results;
}

/**
 * Copy artifacts out of the work directory; returned paths point at the copies
 */
async function publishArtifacts(
  artifacts: ConversionArtifact[],
  publishDir: string
): Promise<ConversionArtifact[]> {
  await fs.mkdir(publishDir, { recursive: true });

  const published: ConversionArtifact[] = [];
  for (const artifact of artifacts) {
    const target = path.join(publishDir, path.basename(artifact.path));
    await fs.copyFile(artifact.path, target);
    published.push({ ...artifact, path: target });
  }
  return published;
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}

export function printPipelineResult(result: PipelineResult): void {
  console.log(`\nRequest: ${result.requestId}`);
  for (const artifact of result.artifacts) {
    console.log(`  ${artifact.format}${artifact.archival ? ' (archival)' : ''}: ${artifact.path}`);
  }
  if (result.validation && result.profile) {
    printValidationResult(result.validation, result.profile);
  }
}
