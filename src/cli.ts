#!/usr/bin/env node
// cli.ts
// CLI entry point for papergrid

import { Command } from 'commander';
import * as path from 'path';
import { loadJob, bundleArtifacts } from './core/zip-handler.js';
import { loadTemplateDir, listTemplates } from './core/template.js';
import { createRenderer } from './core/renderer.js';
import type { JobRunOptions, PipelineResult } from './core/pipeline.js';
import { printPipelineResult, runCatalogue, runJob } from './core/pipeline.js';
import type { EngineName } from './core/converter.js';
import { printValidationResult, validateArtifact } from './core/compliance-validator.js';
import { validateTemplateFull, printValidationReport } from './core/template-validator.js';
import { isArchivalProfile, parseTimeout, resolveToolConfig } from './core/tool-config.js';
import { validateRowCount } from './core/grid-generator.js';
import type { GridSpec } from './types/index.js';
import { PaperGridError } from './types/index.js';

interface RenderCommandOptions {
  templates: string;
  output: string;
  engine: string;
  timeout?: string;
  strict?: boolean;
  zip?: boolean;
  all?: boolean;
}

const ENGINES: ReadonlyArray<EngineName | 'auto'> = ['auto', 'weasyprint', 'libreoffice'];

const program = new Command();

program
  .name('papergrid')
  .description('Fill table and calendar templates and convert them to PDF/A, DOCX or ODT')
  .version('0.1.0');

program
  .command('render')
  .description('Render a job (job.json or job zip) and convert it')
  .argument('<job>', 'Path to job.json or job zip')
  .option('-t, --templates <path>', 'Templates directory', './templates')
  .option('-o, --output <path>', 'Output directory', './out')
  .option('-e, --engine <engine>', 'Conversion engine (weasyprint, libreoffice, auto)', 'auto')
  .option('--timeout <ms>', 'Timeout per external tool invocation (ms)')
  .option('--strict', 'Fail when a token has no binding')
  .option('--zip', 'Also bundle the artifacts into <job_id>.zip')
  .option('--all', 'Render the job against every template in the catalogue')
  .action(async (jobPath: string, options: RenderCommandOptions) => {
    try {
      console.log(`Processing job: ${jobPath}`);

      const engine = parseEngine(options.engine);
      const tools = resolveToolConfig(process.env, options.timeout === undefined
        ? {}
        : { timeoutMs: parseTimeout(options.timeout) });

      const job = await loadJob(jobPath);
      const { manifest } = job;
      console.log(`Loaded job: ${manifest.job_id}`);

      const runOptions: JobRunOptions = {
        templatesDir: options.templates,
        outputDir: options.output,
        engine,
        tools,
        strict: options.strict ? true : undefined,
      };

      if (options.all) {
        const results = await runCatalogue(job, runOptions);
        let failed = false;
        for (const entry of results) {
          if (entry.status === 'error') {
            failed = true;
            continue;
          }
          await report(entry.result, manifest.job_id, options);
          if (entry.result.validation?.status === 'fail') failed = true;
        }
        console.log(`\n${results.filter(entry => entry.status === 'ok').length}/${results.length} templates rendered`);
        if (failed) {
          process.exit(1);
        }
        return;
      }

      console.log(`Template: ${manifest.template.id} ${manifest.template.version}`);
      const result = await runJob(job, runOptions);
      await report(result, manifest.job_id, options);

      if (result.validation?.status === 'fail') {
        process.exit(1);
      }
    } catch (error) {
      handleError(error);
    }
  });

// tokens command: list the tokens a template expects
program
  .command('tokens')
  .description('List the tokens declared by a template')
  .argument('<template>', 'Template directory (contains template.json)')
  .option('-r, --rows <count>', 'Row count for the grid region')
  .action(async (templateDir: string, options: { rows?: string }) => {
    try {
      const template = await loadTemplateDir(templateDir);
      let grid: GridSpec | undefined;
      if (options.rows !== undefined) {
        const rowCount = Number(options.rows);
        validateRowCount(rowCount);
        grid = { rowCount };
      }

      const tokens = createRenderer(template).declaredTokens(grid);
      for (const token of tokens) {
        console.log(token);
      }
    } catch (error) {
      handleError(error);
    }
  });

// validate command: Template validation
program
  .command('validate')
  .description('Validate template.json against schema and document references')
  .argument('<template>', 'Template directory (contains template.json)')
  .action(async (templateDir: string) => {
    try {
      console.log(`Validating template: ${path.join(templateDir, 'template.json')}`);

      const result = await validateTemplateFull(templateDir);
      printValidationReport(result);

      process.exit(result.valid ? 0 : 1);
    } catch (error) {
      handleError(error);
    }
  });

// check command: conformance check of a converted file
program
  .command('check')
  .description('Run the compliance validator against an artifact')
  .argument('<artifact>', 'Converted file (PDF)')
  .option('-p, --profile <profile>', 'Archival profile (pdfa-1b, pdfa-2b, pdfa-3b)', 'pdfa-1b')
  .action(async (artifactPath: string, options: { profile: string }) => {
    try {
      const { profile } = options;
      if (!isArchivalProfile(profile)) {
        throw new PaperGridError(`Unknown profile: ${profile}`, 'profile', 'Expected pdfa-1b, pdfa-2b or pdfa-3b');
      }

      const result = await validateArtifact(artifactPath, profile);
      printValidationResult(result, profile);

      process.exit(result.status === 'pass' ? 0 : 1);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('list')
  .description('List templates in the catalogue')
  .option('-t, --templates <path>', 'Templates directory', './templates')
  .action(async (options: { templates: string }) => {
    try {
      const templates = await listTemplates(options.templates);
      if (templates.length === 0) {
        console.log(`No templates found in ${options.templates}`);
        return;
      }
      for (const ref of templates) {
        console.log(`${ref.id}\t${ref.version}`);
      }
    } catch (error) {
      handleError(error);
    }
  });

async function report(result: PipelineResult, jobId: string, options: RenderCommandOptions): Promise<void> {
  printPipelineResult(result);

  if (options.zip) {
    const zipPath = path.join(options.output, result.requestId, `${jobId.replace(/[:/]/g, '_')}.zip`);
    const bundle = await bundleArtifacts(result.artifacts, zipPath);
    console.log(`Written: ${bundle.path} (${bundle.entries.length} files)`);
  }
}

function parseEngine(value: string): EngineName | 'auto' {
  const engine = ENGINES.find(name => name === value);
  if (!engine) {
    throw new PaperGridError(`Unknown engine: ${value}`, 'engine', `Expected one of ${ENGINES.join(', ')}`);
  }
  return engine;
}

function handleError(error: unknown): never {
  if (error instanceof PaperGridError) {
    console.error(`\nError: ${error.message}`);
    if (error.path) console.error(`  Path: ${error.path}`);
    if (error.reason) console.error(`  Reason: ${error.reason}`);
  } else if (error instanceof Error) {
    console.error(`\nError: ${error.message}`);
    console.error(error.stack);
  } else {
    console.error('\nUnknown error:', error);
  }
  process.exit(1);
}

await program.parseAsync();
