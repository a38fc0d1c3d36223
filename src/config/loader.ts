import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { ExportError, errorMessage } from '../errors.js';
import { isRecord, type UnknownRecord } from '../utils/manifest.js';
import { exportConfigSchema, type ExportConfig, type ExportConfigInput } from './schema.js';

const NESTED_KEYS = new Set(['kubectl', 'cleaning']);

function formatZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Read a YAML config file. Unknown top-level keys are dropped with a
 * warning; the rest is validated when merged with CLI flags.
 */
export async function loadConfigFile(
  configPath: string,
): Promise<{ config: UnknownRecord; warnings: string[] }> {
  let parsed: unknown;
  try {
    parsed = parseYaml(await readFile(configPath, 'utf-8'));
  } catch (err) {
    throw new ExportError(`Failed to read config file ${configPath}: ${errorMessage(err)}`);
  }

  if (parsed == null) return { config: {}, warnings: [] };
  if (!isRecord(parsed)) {
    throw new ExportError(`Config file ${configPath} must contain a YAML mapping.`);
  }

  const known = new Set(Object.keys(exportConfigSchema.shape));
  const warnings: string[] = [];
  const config: UnknownRecord = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (known.has(key)) {
      config[key] = value;
    } else {
      warnings.push(`Unknown config key "${key}" in ${configPath}; ignoring.`);
    }
  }
  return { config, warnings };
}

/** Defined entries of `overrides` win; nested groups merge key by key. */
function mergeLayer(base: UnknownRecord, overrides: UnknownRecord): UnknownRecord {
  const merged: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      NESTED_KEYS.has(key) && isRecord(current) && isRecord(value)
        ? mergeLayer(current, value)
        : value;
  }
  return merged;
}

/**
 * Effective export config: schema defaults, then the config file, then
 * CLI flags.
 */
export function resolveExportConfig(
  fileConfig: UnknownRecord,
  overrides: ExportConfigInput = {},
): ExportConfig {
  const merged = mergeLayer(fileConfig, { ...overrides });
  try {
    return exportConfigSchema.parse(merged);
  } catch (err) {
    if (err instanceof ZodError) throw new ExportError(`Invalid configuration: ${formatZodError(err)}`);
    throw err;
  }
}
