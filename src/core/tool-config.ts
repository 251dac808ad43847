// core/tool-config.ts
// External tool commands and timeouts, from the environment with defaults

import { fileURLToPath } from 'url';
import type { ArchivalProfile, PdfaVersion } from '../types/index.js';
import { PaperGridError } from '../types/index.js';

export interface ToolConfig {
  soffice: string;
  weasyprint: string;
  ghostscript: string;
  validator: string;
  validators: Partial<Record<ArchivalProfile, string>>;
  timeoutMs: number;
}

export const DEFAULT_TIMEOUT_MS = 120_000;

export const ARCHIVAL_PROFILES: readonly ArchivalProfile[] = ['pdfa-1b', 'pdfa-2b', 'pdfa-3b'];

/** Conformance check shipped with the package: scripts/check-pdfa.sh */
export const BUNDLED_VALIDATOR = fileURLToPath(new URL('../../scripts/check-pdfa.sh', import.meta.url));

/**
 * Resolve tool commands. Explicit overrides (CLI options) win over the
 * environment, which wins over the defaults.
 */
export function resolveToolConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ToolConfig> = {}
): ToolConfig {
  const validators: Partial<Record<ArchivalProfile, string>> = {};
  for (const profile of ARCHIVAL_PROFILES) {
    const value = env[validatorEnvName(profile)];
    if (value) {
      validators[profile] = value;
    }
  }

  return {
    soffice: overrides.soffice ?? (env.PAPERGRID_SOFFICE || 'soffice'),
    weasyprint: overrides.weasyprint ?? (env.PAPERGRID_WEASYPRINT || 'weasyprint'),
    ghostscript: overrides.ghostscript ?? (env.PAPERGRID_GS || 'gs'),
    validator: overrides.validator ?? (env.PAPERGRID_VALIDATOR || BUNDLED_VALIDATOR),
    validators: { ...validators, ...overrides.validators },
    timeoutMs: overrides.timeoutMs ?? parseTimeout(env.PAPERGRID_TIMEOUT_MS),
  };
}

/** pdfa-2b -> PAPERGRID_VALIDATOR_PDFA_2B */
export function validatorEnvName(profile: ArchivalProfile): string {
  return `PAPERGRID_VALIDATOR_${profile.toUpperCase().replace('-', '_')}`;
}

export function validatorCommand(tools: ToolConfig, profile: ArchivalProfile): string {
  return tools.validators[profile] ?? tools.validator;
}

export function profileForVersion(version: PdfaVersion): ArchivalProfile {
  return `pdfa-${version}b`;
}

export function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new PaperGridError(`Invalid timeout: ${raw}`, 'PAPERGRID_TIMEOUT_MS', 'Expected a positive integer (milliseconds)');
  }
  return value;
}

export function isArchivalProfile(value: string): value is ArchivalProfile {
  return ARCHIVAL_PROFILES.some(profile => profile === value);
}
