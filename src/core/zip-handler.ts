// core/zip-handler.ts
// Job packages (zip or job.json on disk) and artifact bundles

import JSZip from 'jszip';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { BindingSet, ConversionArtifact, JobManifest } from '../types/index.js';
import { PaperGridError } from '../types/index.js';
import { parseManifest } from './manifest.js';
import { mergeBindings, parseInput } from './datasource.js';

export interface JobPackage {
  manifest: JobManifest;
  bindings: BindingSet;
}

export async function loadJobFromZip(zipPath: string): Promise<JobPackage> {
  const zipContent = await fs.readFile(zipPath);
  return loadJobFromBuffer(zipContent);
}

export async function loadJobFromBuffer(buffer: Buffer): Promise<JobPackage> {
  const zip = await JSZip.loadAsync(buffer);

  // Find manifest.json
  const manifestFile = zip.file('manifest.json');
  if (!manifestFile) {
    throw new PaperGridError(
      'manifest.json not found in zip',
      'zip',
      'Job zip must contain manifest.json'
    );
  }

  const manifest = parseManifest(await manifestFile.async('text'));

  return collectBindings(manifest, async (name, specPath) => {
    const file = zip.file(specPath);
    if (!file) {
      throw new PaperGridError(
        `Input file not found: ${specPath}`,
        'zip',
        `Required input "${name}" at path "${specPath}" not found in zip`
      );
    }
    return file.async('nodebuffer');
  });
}

/**
 * Load a job.json with its inputs resolved relative to the manifest
 */
export async function loadJobFromFile(manifestPath: string): Promise<JobPackage> {
  const manifest = parseManifest(await fs.readFile(manifestPath, 'utf-8'));
  const baseDir = path.dirname(manifestPath);

  return collectBindings(manifest, async (name, specPath) => {
    const inputPath = path.resolve(baseDir, specPath);
    try {
      return await fs.readFile(inputPath);
    } catch (error) {
      throw new PaperGridError(
        `Input file not found: ${specPath}`,
        inputPath,
        `Required input "${name}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  });
}

/**
 * job.json or job zip, chosen by extension
 */
export async function loadJob(jobPath: string): Promise<JobPackage> {
  return path.extname(jobPath).toLowerCase() === '.zip'
    ? loadJobFromZip(jobPath)
    : loadJobFromFile(jobPath);
}

async function collectBindings(
  manifest: JobManifest,
  read: (name: string, specPath: string) => Promise<Buffer>
): Promise<JobPackage> {
  const sets: BindingSet[] = [];

  for (const [name, spec] of Object.entries(manifest.inputs ?? {})) {
    const content = await read(name, spec.path);
    sets.push(parseInput(content, spec));
  }

  // Inline bindings take precedence over input files
  sets.push(manifest.bindings ?? {});

  return { manifest, bindings: mergeBindings(...sets) };
}

/**
 * Zip artifacts under their basenames. Missing or empty files are skipped.
 */
export async function bundleArtifacts(
  artifacts: ConversionArtifact[],
  zipPath: string
): Promise<{ path: string; entries: string[] }> {
  const zip = new JSZip();
  const entries: string[] = [];

  for (const artifact of artifacts) {
    let content: Buffer;
    try {
      content = await fs.readFile(artifact.path);
    } catch {
      console.warn(`Warning: artifact not found, skipped: ${artifact.path}`);
      continue;
    }
    if (content.length === 0) {
      console.warn(`Warning: artifact is empty, skipped: ${artifact.path}`);
      continue;
    }

    const name = path.basename(artifact.path);
    zip.file(name, content);
    entries.push(name);
  }

  if (entries.length === 0) {
    throw new PaperGridError('No artifacts to bundle', zipPath, 'Every artifact was missing or empty');
  }

  await fs.mkdir(path.dirname(zipPath), { recursive: true });
  const buffer = await zip.generateAsync({ type: 'nodebuffer' });
  await fs.writeFile(zipPath, buffer);

  return { path: zipPath, entries };
}
