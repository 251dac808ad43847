import assert from 'node:assert/strict';
import test from 'node:test';
import { ExternalToolError, PipelineCancelledError } from '../types/index.js';
import { expandArgs, runProcess } from './process-runner.js';

test('expandArgs substitutes known placeholders only', () => {
  assert.deepEqual(
    expandArgs(['-sOutputFile={output}', '{input}', '{unknown}'], { input: 'in.pdf', output: 'out.pdf' }),
    ['-sOutputFile=out.pdf', 'in.pdf', '{unknown}']
  );
});

test('runProcess captures exit code, stdout and stderr', async () => {
  const result = await runProcess('sh', ['-c', 'printf out; printf err >&2; exit 3']);
  assert.deepEqual(result, { exitCode: 3, signal: null, stdout: 'out', stderr: 'err', timedOut: false });
});

test('runProcess keeps multi-byte characters split across chunks', async () => {
  const text = 'a' + 'ç'.repeat(200000);
  const result = await runProcess(process.execPath, ['-e', `process.stderr.write('a' + 'ç'.repeat(200000))`]);
  assert.equal(result.exitCode, 0);
  assert.equal(result.stderr.length, text.length);
  assert.equal(result.stderr, text);
});

test('runProcess timeout also stops the tool\'s children', async () => {
  const started = Date.now();
  const result = await runProcess('sh', ['-c', 'sleep 5; echo done'], { timeoutMs: 300 });
  const elapsed = Date.now() - started;

  assert.equal(result.timedOut, true);
  assert.equal(result.stdout, '');
  assert.ok(elapsed < 3000, `took ${elapsed}ms`);
});

test('runProcess rejects when cancelled mid-run', async () => {
  const controller = new AbortController();
  const started = Date.now();
  setTimeout(() => controller.abort(), 100);

  await assert.rejects(
    runProcess('sh', ['-c', 'sleep 5; echo done'], { signal: controller.signal }),
    PipelineCancelledError
  );
  assert.ok(Date.now() - started < 3000);
});

test('runProcess reports a missing command as ExternalToolError', async () => {
  await assert.rejects(runProcess('papergrid-command-that-does-not-exist', []), (error: unknown) => {
    assert.ok(error instanceof ExternalToolError);
    assert.equal(error.code, 'ENOENT');
    return true;
  });
});

test('runProcess does not start when already cancelled', async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(runProcess('papergrid-command-that-does-not-exist', [], { signal: controller.signal }), PipelineCancelledError);
});
