import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseResourceObject } from '../cluster/schema.js';
import { ChartWriteError, errorMessage } from '../errors.js';
import { splitImage } from '../transform/placeholders.js';
import { valuesBase } from '../transform/templatize.js';
import type { ChartMetadata, ValuesScope } from '../types/config.js';
import type { ExportResult, ResourceObject } from '../types/k8s.js';
import type { Logger } from '../utils/logger.js';
import {
  getArray,
  getPath,
  getRecord,
  getRecords,
  getString,
  isRecord,
  type UnknownRecord,
} from '../utils/manifest.js';
import { envValuesKey, kindToggleKey, valuesKey } from '../utils/names.js';
import { toYaml } from '../utils/yaml.js';
import { chartYaml } from './skeleton.js';

export interface DeriveValuesOptions {
  /** Only the enabled switches are written when templating is off. */
  templatize: boolean;
  valuesScope: ValuesScope;
  logger?: Logger;
}

const ANY_ACTION = /\{\{[\s\S]*?\}\}/g;
const ESCAPED_DELIMITER = /\{\{ `(\{\{|\}\})` \}\}/g;
const UNRESOLVED = '__kube2helm_unresolved__';
const OPEN = '__kube2helm_open__';
const CLOSE = '__kube2helm_close__';

function dropUnresolved(value: unknown): unknown {
  if (typeof value === 'string') return value.includes(UNRESOLVED) ? undefined : value;
  if (Array.isArray(value)) return value.map(dropUnresolved).filter((v) => v !== undefined);
  if (isRecord(value)) {
    const out: UnknownRecord = {};
    for (const [key, child] of Object.entries(value)) {
      const kept = dropUnresolved(child);
      if (kept !== undefined) out[key] = kept;
    }
    return out;
  }
  return value;
}

/**
 * Literal part of a written template file. Guard lines are skipped,
 * escaped delimiters are restored and every value that held a Helm
 * action is dropped.
 */
export function parseTemplateFile(content: string): ResourceObject | null {
  const body = content
    .split('\n')
    .filter((line) => !/^\{\{-?\s*(if|end)\b.*\}\}\s*$/.test(line))
    .join('\n')
    .replace(ESCAPED_DELIMITER, (_match, delimiter: string) => (delimiter === '{{' ? OPEN : CLOSE))
    .replace(ANY_ACTION, UNRESOLVED)
    .replaceAll(OPEN, '{{')
    .replaceAll(CLOSE, '}}');

  let parsed: unknown;
  try {
    parsed = parseYaml(body);
  } catch {
    return null;
  }
  const result = parseResourceObject(dropUnresolved(parsed));
  return result.ok ? result.resource : null;
}

async function resolveSource(result: ExportResult, logger?: Logger): Promise<ResourceObject | null> {
  if (result.source) return result.source;
  try {
    return parseTemplateFile(await readFile(result.path, 'utf-8'));
  } catch (err) {
    logger?.warn(`Could not read ${result.path} for values: ${errorMessage(err)}`);
    return null;
  }
}

/** Record at `path`, created on the way down. */
function groupAt(root: UnknownRecord, path: string[]): UnknownRecord {
  let current = root;
  for (const key of path) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: UnknownRecord = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

function deploymentValues(source: ResourceObject, target: UnknownRecord): void {
  const spec = getRecord(source, 'spec');
  if (typeof spec?.replicas === 'number') target.replicaCount = spec.replicas;

  const containers = getRecords(getPath(spec, ['template', 'spec']), 'containers');
  const [first] = containers;
  if (first) {
    const image = getString(first, 'image');
    const parts = image ? splitImage(image) : null;
    if (parts) {
      const group = groupAt(target, ['image']);
      group.repository = parts.repository;
      group.tag = parts.tag;
    }
    const pullPolicy = getString(first, 'imagePullPolicy');
    if (pullPolicy) groupAt(target, ['image']).pullPolicy = pullPolicy;
    if (isRecord(first.resources)) target.resources = first.resources;

    const [port] = getRecords(first, 'ports');
    if (typeof port?.containerPort === 'number') target.containerPort = port.containerPort;
  }

  const env: Record<string, string> = {};
  for (const container of containers) {
    for (const entry of getRecords(container, 'env')) {
      if (typeof entry.name !== 'string' || typeof entry.value !== 'string') continue;
      const key = envValuesKey(entry.name);
      if (key) env[key] = entry.value;
    }
  }
  if (Object.keys(env).length > 0) target.env = env;
}

function serviceValues(source: ResourceObject, target: UnknownRecord): void {
  const spec = getRecord(source, 'spec');
  const group = groupAt(target, ['service']);
  const type = getString(spec, 'type');
  if (type) group.type = type;
  const [port] = getRecords(spec, 'ports');
  if (port?.port !== undefined) group.port = port.port;
  if (port?.targetPort !== undefined) group.targetPort = port.targetPort;
}

function persistenceValues(source: ResourceObject, target: UnknownRecord): void {
  const spec = getRecord(source, 'spec');
  const size = getPath(spec, ['resources', 'requests', 'storage']);
  if (size !== undefined) target.size = size;
  const storageClass = getString(spec, 'storageClassName');
  if (storageClass !== undefined) target.storageClass = storageClass;
  const [accessMode] = getArray(spec, 'accessModes');
  if (typeof accessMode === 'string') target.accessMode = accessMode;
}

/**
 * Values for the exported resources: an `enabled` switch per exported
 * kind plus, when templating, the live settings the placeholders read.
 */
export async function buildValues(
  results: ExportResult[],
  options: DeriveValuesOptions,
): Promise<UnknownRecord> {
  const values: UnknownRecord = {};
  for (const kind of [...new Set(results.map((r) => r.kind))].sort()) {
    groupAt(values, [kindToggleKey(kind)]).enabled = true;
  }
  if (!options.templatize) return values;

  const seenShared = new Set<string>();
  for (const result of results) {
    const source = await resolveSource(result, options.logger);
    if (!source) continue;
    const base = valuesBase(result.name, options.valuesScope);
    const key = valuesKey(result.name);

    switch (source.kind) {
      case 'Deployment':
      case 'Service': {
        if (base.length === 0) {
          if (seenShared.has(source.kind)) {
            options.logger?.warn(
              `${source.kind} ${result.name} shares values with an earlier ${source.kind}; ` +
                'use --values-scope per-resource to keep them apart',
            );
            continue;
          }
          seenShared.add(source.kind);
        }
        const target = groupAt(values, base);
        if (source.kind === 'Deployment') deploymentValues(source, target);
        else serviceValues(source, target);
        break;
      }
      case 'ConfigMap':
      case 'Secret': {
        const data = getRecord(source, 'data');
        if (data && Object.keys(data).length > 0) {
          groupAt(values, [source.kind === 'ConfigMap' ? 'config' : 'secrets'])[key] = data;
        }
        break;
      }
      case 'PersistentVolumeClaim':
        persistenceValues(source, groupAt(values, ['persistence', key]));
        break;
    }
  }
  return values;
}

/**
 * Write values.yaml for the exported resources and return the values.
 */
export async function deriveValues(
  results: ExportResult[],
  chartRoot: string,
  release: string,
  options: DeriveValuesOptions,
): Promise<UnknownRecord> {
  const values = await buildValues(results, options);
  const path = join(chartRoot, 'values.yaml');
  const content = `# Default values for ${release}.\n# Derived from the exported resources.\n\n${toYaml(values)}`;
  try {
    await writeFile(path, content, 'utf-8');
  } catch (err) {
    throw new ChartWriteError(`Failed to write values.yaml: ${errorMessage(err)}`, path, err);
  }
  return values;
}

/** Tag of the first exported Deployment's first container image. */
export function detectAppVersion(results: ExportResult[]): string | undefined {
  for (const result of results) {
    if (result.kind !== 'Deployment' || !result.source) continue;
    const [container] = getRecords(getPath(result.source, ['spec', 'template', 'spec']), 'containers');
    const image = getString(container, 'image');
    const parts = image ? splitImage(image) : null;
    if (parts) return parts.tag;
  }
  return undefined;
}

/**
 * Rewrite Chart.yaml with a description naming the exported kinds and
 * an appVersion taken from the first Deployment image when there is one.
 */
export async function finalizeChartMetadata(
  results: ExportResult[],
  chartRoot: string,
  meta: ChartMetadata,
): Promise<ChartMetadata & { description: string }> {
  const kinds = [...new Set(results.map((r) => r.kind))].sort();
  const description =
    kinds.length > 0
      ? `Helm chart with ${kinds.join(', ')} exported from Kubernetes`
      : 'Helm chart exported from Kubernetes';
  const finalMeta = { ...meta, appVersion: detectAppVersion(results) ?? meta.appVersion };

  const path = join(chartRoot, 'Chart.yaml');
  try {
    await writeFile(path, chartYaml(finalMeta, description), 'utf-8');
  } catch (err) {
    throw new ChartWriteError(`Failed to write Chart.yaml: ${errorMessage(err)}`, path, err);
  }
  return { ...finalMeta, description };
}
