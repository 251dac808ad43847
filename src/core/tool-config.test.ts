import assert from 'node:assert/strict';
import test from 'node:test';
import { PaperGridError } from '../types/index.js';
import {
  BUNDLED_VALIDATOR,
  DEFAULT_TIMEOUT_MS,
  isArchivalProfile,
  profileForVersion,
  resolveToolConfig,
  validatorCommand,
  validatorEnvName,
} from './tool-config.js';

test('resolveToolConfig falls back to defaults', () => {
  assert.deepEqual(resolveToolConfig({}), {
    soffice: 'soffice',
    weasyprint: 'weasyprint',
    ghostscript: 'gs',
    validator: BUNDLED_VALIDATOR,
    validators: {},
    timeoutMs: DEFAULT_TIMEOUT_MS,
  });
  assert.equal(BUNDLED_VALIDATOR.endsWith('check-pdfa.sh'), true);
});

test('environment variables override defaults and options override both', () => {
  const env = {
    PAPERGRID_SOFFICE: '/opt/lo/soffice',
    PAPERGRID_GS: 'gswin',
    PAPERGRID_VALIDATOR: 'verapdf-wrapper',
    PAPERGRID_VALIDATOR_PDFA_3B: 'check-3b',
    PAPERGRID_TIMEOUT_MS: '30000',
  };

  const tools = resolveToolConfig(env, { ghostscript: 'gs-custom', timeoutMs: 5 });
  assert.equal(tools.soffice, '/opt/lo/soffice');
  assert.equal(tools.weasyprint, 'weasyprint');
  assert.equal(tools.ghostscript, 'gs-custom');
  assert.equal(tools.timeoutMs, 5);
  assert.equal(validatorCommand(tools, 'pdfa-3b'), 'check-3b');
  assert.equal(validatorCommand(tools, 'pdfa-1b'), 'verapdf-wrapper');
  assert.equal(resolveToolConfig(env).timeoutMs, 30000);
});

test('invalid timeouts are rejected', () => {
  for (const value of ['0', '-1', 'soon', '1.5']) {
    assert.throws(() => resolveToolConfig({ PAPERGRID_TIMEOUT_MS: value }), PaperGridError);
  }
});

test('profile helpers', () => {
  assert.equal(profileForVersion(2), 'pdfa-2b');
  assert.equal(validatorEnvName('pdfa-1b'), 'PAPERGRID_VALIDATOR_PDFA_1B');
  assert.equal(isArchivalProfile('pdfa-3b'), true);
  assert.equal(isArchivalProfile('pdfa-4'), false);
});
