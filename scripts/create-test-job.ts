#!/usr/bin/env node
// scripts/create-test-job.ts
// Create test job zip from example data

import JSZip from 'jszip';
import fs from 'fs/promises';
import path from 'path';
import { parseManifest } from '../src/core/manifest.js';

async function createJobZip(jobDir = 'examples/cost-sheet-job', outputName = 'test-job.zip') {
  const zip = new JSZip();

  // Add manifest
  const manifestContent = await fs.readFile(path.join(jobDir, 'manifest.json'), 'utf-8');
  const manifest = parseManifest(manifestContent);
  zip.file('manifest.json', manifestContent);

  // Add every declared input
  for (const spec of Object.values(manifest.inputs ?? {})) {
    zip.file(spec.path, await fs.readFile(path.join(jobDir, spec.path)));
  }

  // Generate zip
  const content = await zip.generateAsync({ type: 'nodebuffer' });
  await fs.writeFile(outputName, content);

  console.log(`Created: ${outputName}`);
}

createJobZip(process.argv[2], process.argv[3]).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
