import { resourceTypeForKind } from './kinds.js';

/**
 * Convert a resource name to a filename-safe slug.
 * Lowercase, anything outside [a-z0-9.-] becomes '-', no leading/trailing hyphens.
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9.-]/g, '-')
    .replace(/^-+/, '')
    .replace(/-+$/, '');
}

/**
 * Template filename for a manifest: `{prefix}{pluralKind}-{slug}.yaml`.
 */
export function templateFilename(prefix: string, kind: string, name: string): string {
  const slug = slugify(name) || 'resource';
  return `${prefix}${resourceTypeForKind(kind)}-${slug}.yaml`;
}

/**
 * Key under which a resource's values live in values.yaml.
 * Must be usable as a Go template field name (`.Values.config.<key>`).
 */
export function valuesKey(resourceName: string): string {
  const key = resourceName.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(key) ? `_${key}` : key;
}

/**
 * Key for an environment variable under `.Values.env`.
 * Lowercased with underscores and hyphens stripped (`DB_HOST` → `dbhost`).
 */
export function envValuesKey(envName: string): string {
  const key = envName
    .toLowerCase()
    .replace(/[_-]/g, '')
    .replace(/[^a-z0-9]/g, '');
  return /^[0-9]/.test(key) ? `v${key}` : key;
}

/** Values group that toggles a kind on and off (`Deployment` → `deployment`). */
export function kindToggleKey(kind: string): string {
  return kind.toLowerCase();
}
