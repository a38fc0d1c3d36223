import { SecretPolicyError } from '../errors.js';
import type { SecretMode } from '../types/config.js';
import type { ResourceObject } from '../types/k8s.js';
import type { Logger } from '../utils/logger.js';
import { getString } from '../utils/manifest.js';

export const SERVICE_ACCOUNT_TOKEN_TYPE = 'kubernetes.io/service-account-token';

export interface SecretFilterOptions {
  includeSecrets: boolean;
  includeServiceAccountSecrets: boolean;
  /** Secrets the operator picked by name; always kept. */
  selected?: ReadonlySet<string>;
}

/**
 * Decide which collected secrets take part in the export.
 *
 * Service-account tokens go first unless explicitly included. Without
 * `includeSecrets` only secrets named in the selection survive.
 */
export function filterSecrets(
  secrets: ResourceObject[],
  options: SecretFilterOptions,
  logger?: Logger,
): ResourceObject[] {
  const includeAll = options.includeSecrets || options.includeServiceAccountSecrets;
  const selected = options.selected ?? new Set<string>();

  return secrets.filter((secret) => {
    const name = secret.metadata.name;
    if (
      getString(secret, 'type') === SERVICE_ACCOUNT_TOKEN_TYPE &&
      !options.includeServiceAccountSecrets
    ) {
      logger?.debug(`Skipping service account token secret ${name}`);
      return false;
    }
    if (!includeAll && !selected.has(name)) {
      logger?.debug(`Skipping secret ${name}: not selected and secrets are not included`);
      return false;
    }
    return true;
  });
}

function externalReference(secret: ResourceObject): ResourceObject {
  const name = secret.metadata.name;
  return {
    apiVersion: secret.apiVersion || 'v1',
    kind: 'Secret',
    metadata: {
      name,
      annotations: {
        'helm.sh/external-secret': 'true',
        'helm.sh/external-secret-source': `External secret '${name}' - must be created separately`,
      },
    },
    type: getString(secret, 'type') ?? 'Opaque',
  };
}

/**
 * Apply the secret mode to one Secret. `null` means it is not exported.
 */
export function processSecret(
  secret: ResourceObject,
  mode: SecretMode,
  logger?: Logger,
): ResourceObject | null {
  switch (mode) {
    case 'include':
      return secret;
    case 'skip':
      logger?.debug(`Secret ${secret.metadata.name} skipped by secret mode`);
      return null;
    case 'external-ref':
      return externalReference(secret);
    case 'encrypt':
      throw new SecretPolicyError(
        'Secret mode "encrypt" is not implemented.',
        'Use --secret-mode external-ref and manage the values with sealed-secrets or an external secrets operator.',
      );
  }
}
