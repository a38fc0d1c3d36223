import type { TemplateOptions, ValuesScope } from '../types/config.js';
import type { ResourceObject } from '../types/k8s.js';
import { getPath, getRecord, getRecords, isRecord } from '../utils/manifest.js';
import { envValuesKey, valuesKey } from '../utils/names.js';
import { hasTemplateDelimiters } from '../utils/yaml.js';
import {
  blockRef,
  imageRef,
  quotedValueRef,
  splitImage,
  valueRef,
  valueRefWithDefault,
} from './placeholders.js';

export const DEFAULT_TEMPLATE_OPTIONS: TemplateOptions = { valuesScope: 'shared' };

/**
 * Values path under which a workload or service keeps its settings.
 * Shared scope puts them at the top of values.yaml.
 */
export function valuesBase(resourceName: string, scope: ValuesScope): string[] {
  return scope === 'per-resource' ? [valuesKey(resourceName)] : [];
}

function templatizeDeployment(manifest: ResourceObject, base: string[]): void {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return;

  if (typeof spec.replicas === 'number') {
    spec.replicas = valueRefWithDefault([...base, 'replicaCount'], spec.replicas);
  }

  const containers = getRecords(getPath(spec, ['template', 'spec']), 'containers');
  const [first] = containers;
  if (first) {
    if (typeof first.image === 'string' && splitImage(first.image)) {
      first.image = imageRef(base);
    }
    if (typeof first.imagePullPolicy === 'string') {
      first.imagePullPolicy = valueRef([...base, 'image', 'pullPolicy']);
    }
    if (isRecord(first.resources)) {
      first.resources = blockRef([...base, 'resources']);
    }
  }

  for (const container of containers) {
    for (const env of getRecords(container, 'env')) {
      if (typeof env.name !== 'string' || typeof env.value !== 'string') continue;
      const key = envValuesKey(env.name);
      if (!key || hasTemplateDelimiters(env.value)) continue;
      env.value = quotedValueRef([...base, 'env', key], env.value);
    }
  }
}

function templatizeService(manifest: ResourceObject, base: string[]): void {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return;

  if (typeof spec.type === 'string') {
    spec.type = valueRef([...base, 'service', 'type']);
  }
  const [port] = getRecords(spec, 'ports');
  if (port) {
    if (port.port !== undefined) port.port = valueRef([...base, 'service', 'port']);
    if (port.targetPort !== undefined) {
      port.targetPort = valueRef([...base, 'service', 'targetPort']);
    }
  }
}

function templatizeData(manifest: ResourceObject, group: 'config' | 'secrets', key: string): void {
  const data = manifest.data;
  if (isRecord(data) && Object.keys(data).length > 0) {
    manifest.data = blockRef([group, key]);
  }
}

function templatizePvc(manifest: ResourceObject, key: string): void {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return;

  const requests = getPath(spec, ['resources', 'requests']);
  if (isRecord(requests) && requests.storage !== undefined) {
    requests.storage = valueRef(['persistence', key, 'size']);
  }
  if (typeof spec.storageClassName === 'string') {
    spec.storageClassName = valueRef(['persistence', key, 'storageClass']);
  }
}

/**
 * Replace selected literal fields with Helm placeholders. Works on a copy;
 * anything without a rule stays literal.
 */
export function templatizeManifest(
  manifest: ResourceObject,
  resourceName: string = manifest.metadata.name,
  options: TemplateOptions = DEFAULT_TEMPLATE_OPTIONS,
): ResourceObject {
  const templated = structuredClone(manifest);
  const base = valuesBase(resourceName, options.valuesScope);

  switch (templated.kind) {
    case 'Deployment':
      templatizeDeployment(templated, base);
      break;
    case 'Service':
      templatizeService(templated, base);
      break;
    case 'ConfigMap':
      templatizeData(templated, 'config', valuesKey(resourceName));
      break;
    case 'Secret':
      templatizeData(templated, 'secrets', valuesKey(resourceName));
      break;
    case 'PersistentVolumeClaim':
      templatizePvc(templated, valuesKey(resourceName));
      break;
  }

  return templated;
}
