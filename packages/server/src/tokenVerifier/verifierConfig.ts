import type { VerifierConfig } from './types.js';
import { TokenVerifierConfigurationError } from './errors.js';

export type VerifierConfigInit = Omit<VerifierConfig, 'articledShortName'>;

/**
 * Build a frozen verifier configuration
 */
export function createVerifierConfig(init: VerifierConfigInit): VerifierConfig {
  requireNonEmpty(init.shortName, 'shortName');
  requireNonEmpty(init.method, 'method');
  requireNonEmpty(init.docUrl, 'docUrl');
  requireNonEmpty(init.projectId, 'projectId');
  requireNonEmpty(init.expectedAudience, 'expectedAudience');
  if (init.tenantId !== undefined) {
    requireNonEmpty(init.tenantId, 'tenantId');
  }

  return Object.freeze({
    ...init,
    articledShortName: prefixWithIndefiniteArticle(init.shortName),
  });
}

/**
 * Copy of the configuration scoped to one tenant
 */
export function withTenant(config: VerifierConfig, tenantId: string): VerifierConfig {
  requireNonEmpty(tenantId, 'tenantId');
  return Object.freeze({ ...config, tenantId });
}

export function prefixWithIndefiniteArticle(word: string): string {
  return /^[aeiou]/i.test(word) ? `an ${word}` : `a ${word}`;
}

function requireNonEmpty(value: string, name: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new TokenVerifierConfigurationError(`${name} must be a non-empty string`);
  }
}
