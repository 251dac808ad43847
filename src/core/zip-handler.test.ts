import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import JSZip from 'jszip';
import * as os from 'os';
import * as path from 'path';
import test from 'node:test';
import type { ConversionArtifact } from '../types/index.js';
import { PaperGridError } from '../types/index.js';
import { getConversionRequest, getGridSpec, parseManifest } from './manifest.js';
import { bundleArtifacts, loadJob, loadJobFromBuffer, loadJobFromFile } from './zip-handler.js';

const MANIFEST = {
  schema: 'papergrid-job/v0.1',
  job_id: 'job-001',
  template: { id: 'cost-sheet', version: 'v1' },
  bindings: { client: 'Inline', qty: 2 },
  inputs: {
    costs: { type: 'csv', path: 'costs.csv' },
    project: { type: 'json', path: 'project.json' },
  },
  grid: { row_count: 4 },
  output: { target_formats: ['pdf'], archival_profile: true },
};

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'papergrid-zip-handler-'));
}

test('parseManifest accepts a complete manifest', () => {
  const manifest = parseManifest(JSON.stringify({ ...MANIFEST, issued_on: '2026-10-18', derive: ['costs'] }));
  assert.equal(manifest.job_id, 'job-001');
  assert.deepEqual(getGridSpec(manifest), { rowCount: 4, monthCount: undefined });
  assert.deepEqual(getConversionRequest(manifest), {
    targetFormats: ['pdf'],
    archivalProfile: true,
    pdfaVersion: undefined,
  });
});

test('parseManifest rejects unknown target formats', () => {
  const bad = { ...MANIFEST, output: { target_formats: ['png'] } };
  assert.throws(() => parseManifest(JSON.stringify(bad)), (error: unknown) => {
    assert.ok(error instanceof PaperGridError);
    assert.equal(error.message, 'Schema validation failed for manifest.json');
    return true;
  });
});

test('parseManifest checks the issued_on date format', () => {
  assert.throws(() => parseManifest(JSON.stringify({ ...MANIFEST, issued_on: '18/10/2026' })), PaperGridError);
});

test('parseManifest reports invalid JSON', () => {
  assert.throws(() => parseManifest('{'), /Invalid JSON in manifest.json/);
});

test('manifest without grid has no grid spec', () => {
  const { grid: _grid, ...rest } = MANIFEST;
  assert.equal(getGridSpec(parseManifest(JSON.stringify(rest))), undefined);
});

test('loadJobFromBuffer reads inputs from the zip and inline bindings win', async () => {
  const zip = new JSZip();
  zip.file('manifest.json', JSON.stringify(MANIFEST));
  zip.file('costs.csv', 'key,value\nqty,120\ncost_per_unit,15.5\n');
  zip.file('project.json', JSON.stringify({ client: 'From file', project_name: 'Obra' }));

  const job = await loadJobFromBuffer(await zip.generateAsync({ type: 'nodebuffer' }));

  assert.equal(job.manifest.job_id, 'job-001');
  assert.deepEqual(job.bindings, {
    qty: 2,
    cost_per_unit: '15.5',
    client: 'Inline',
    project_name: 'Obra',
  });
});

test('loadJobFromBuffer requires manifest.json', async () => {
  const zip = new JSZip();
  zip.file('other.json', '{}');
  await assert.rejects(
    loadJobFromBuffer(await zip.generateAsync({ type: 'nodebuffer' })),
    /manifest.json not found in zip/
  );
});

test('loadJobFromBuffer reports a missing input file', async () => {
  const zip = new JSZip();
  zip.file('manifest.json', JSON.stringify(MANIFEST));
  zip.file('costs.csv', 'key,value\n');
  await assert.rejects(
    loadJobFromBuffer(await zip.generateAsync({ type: 'nodebuffer' })),
    /Input file not found: project.json/
  );
});

test('loadJobFromFile resolves inputs beside the manifest', async () => {
  const dir = await tempDir();
  await fs.writeFile(path.join(dir, 'job.json'), JSON.stringify(MANIFEST));
  await fs.writeFile(path.join(dir, 'costs.csv'), 'key,value\ntable_row1,Pintura\n');
  await fs.writeFile(path.join(dir, 'project.json'), '{"project_name":"Obra"}');

  const job = await loadJobFromFile(path.join(dir, 'job.json'));
  assert.deepEqual(job.bindings, { table_row1: 'Pintura', project_name: 'Obra', client: 'Inline', qty: 2 });

  const same = await loadJob(path.join(dir, 'job.json'));
  assert.deepEqual(same.bindings, job.bindings);
});

test('loadJob picks the zip loader by extension', async () => {
  const dir = await tempDir();
  const zip = new JSZip();
  const { inputs: _inputs, ...withoutInputs } = MANIFEST;
  zip.file('manifest.json', JSON.stringify(withoutInputs));
  await fs.writeFile(path.join(dir, 'job.zip'), await zip.generateAsync({ type: 'nodebuffer' }));

  const job = await loadJob(path.join(dir, 'job.zip'));
  assert.deepEqual(job.bindings, { client: 'Inline', qty: 2 });
});

test('bundleArtifacts zips existing files and skips empty ones', async () => {
  const dir = await tempDir();
  const artifact = (name: string): ConversionArtifact => ({
    requestId: 'r1',
    documentId: 'r1',
    format: 'pdf',
    path: path.join(dir, name),
    archival: false,
  });

  await fs.writeFile(path.join(dir, 'a.pdf'), '%PDF-1.4 test');
  await fs.writeFile(path.join(dir, 'b.pdf'), '');

  const zipPath = path.join(dir, 'out', 'bundle.zip');
  const bundle = await bundleArtifacts([artifact('a.pdf'), artifact('b.pdf'), artifact('missing.pdf')], zipPath);
  assert.deepEqual(bundle.entries, ['a.pdf']);

  const zip = await JSZip.loadAsync(await fs.readFile(zipPath));
  assert.equal(await zip.file('a.pdf')?.async('text'), '%PDF-1.4 test');
});

test('bundleArtifacts fails when nothing can be bundled', async () => {
  const dir = await tempDir();
  await assert.rejects(bundleArtifacts([], path.join(dir, 'bundle.zip')), /No artifacts to bundle/);
});
