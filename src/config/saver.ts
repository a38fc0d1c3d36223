import { writeFile } from 'node:fs/promises';
import type { UnknownRecord } from '../utils/manifest.js';
import { toYaml } from '../utils/yaml.js';
import type { ExportConfig } from './schema.js';

/** Keys that only make sense for a single run. */
const TRANSIENT_KEYS = new Set(['force']);

/**
 * Convert an effective config back to the file format. Unset optional
 * fields are left out.
 */
export function exportConfigToFile(config: ExportConfig): UnknownRecord {
  const file: UnknownRecord = {};
  for (const [key, value] of Object.entries(config)) {
    if (TRANSIENT_KEYS.has(key) || value === undefined) continue;
    file[key] = value;
  }
  return file;
}

/**
 * Save the effective config as a YAML config file (round-trip compatible
 * with loadConfigFile).
 */
export async function saveConfigFile(config: ExportConfig, path: string): Promise<void> {
  await writeFile(path, toYaml(exportConfigToFile(config)), 'utf-8');
}
