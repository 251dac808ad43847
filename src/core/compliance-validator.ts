// core/compliance-validator.ts
// External conformance check of a converted artifact

import * as fs from 'fs/promises';
import type { ArchivalProfile, ValidationResult } from '../types/index.js';
import { ExternalToolError } from '../types/index.js';
import type { ProcessResult, ProcessRunner } from './process-runner.js';
import { runProcess } from './process-runner.js';
import type { ToolConfig } from './tool-config.js';
import { resolveToolConfig, validatorCommand } from './tool-config.js';

export interface ValidateArtifactOptions {
  tools?: ToolConfig;
  runner?: ProcessRunner;
  signal?: AbortSignal;
}

/**
 * Run `<tool> <artifact>`. Exit 0 is a pass; anything else is a fail
 * carrying the tool's output. Read-only and never retried.
 */
export async function validateArtifact(
  artifactPath: string,
  profile: ArchivalProfile,
  options: ValidateArtifactOptions = {}
): Promise<ValidationResult> {
  const tools = options.tools ?? resolveToolConfig();
  const runner = options.runner ?? runProcess;
  const command = validatorCommand(tools, profile);

  try {
    await fs.access(artifactPath);
  } catch {
    return { status: 'fail', reason: `Artifact not found: ${artifactPath}` };
  }

  console.log(`Validating ${profile}: ${artifactPath}`);

  let result: ProcessResult;
  try {
    result = await runner(command, [artifactPath], {
      timeoutMs: tools.timeoutMs,
      signal: options.signal,
    });
  } catch (error) {
    if (error instanceof ExternalToolError) {
      return { status: 'fail', reason: error.reason ?? error.message };
    }
    throw error;
  }

  if (result.timedOut) {
    return { status: 'fail', reason: `${command} timed out after ${tools.timeoutMs}ms` };
  }

  if (result.exitCode === 0) {
    return { status: 'pass' };
  }

  const output = [result.stderr, result.stdout].filter(text => text.length > 0).join('\n');
  return {
    status: 'fail',
    reason: output || `${command} exited with ${result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`}`,
  };
}

export function printValidationResult(result: ValidationResult, profile: ArchivalProfile): void {
  if (result.status === 'pass') {
    console.log(`✓ ${profile}: pass`);
    return;
  }
  console.log(`✗ ${profile}: fail`);
  for (const line of result.reason.split('\n')) {
    console.log(`  ${line}`);
  }
}
