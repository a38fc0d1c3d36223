/**
 * Typed accessors over untyped manifest data.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRecord(obj: unknown, key: string): UnknownRecord | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return isRecord(value) ? value : undefined;
}

export function getString(obj: unknown, key: string): string | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(obj: unknown, key: string): number | undefined {
  if (!isRecord(obj)) return undefined;
  const value = obj[key];
  return typeof value === 'number' ? value : undefined;
}

export function getArray(obj: unknown, key: string): unknown[] {
  if (!isRecord(obj)) return [];
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/** Records of an array field, non-record entries dropped. */
export function getRecords(obj: unknown, key: string): UnknownRecord[] {
  return getArray(obj, key).filter(isRecord);
}

/** Follow a path of record keys. */
export function getPath(obj: unknown, path: string[]): unknown {
  let current: unknown = obj;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** String values of a string→string map, other entries dropped. */
export function getStringMap(obj: unknown, key: string): Record<string, string> {
  const record = getRecord(obj, key);
  const result: Record<string, string> = {};
  if (!record) return result;
  for (const [k, v] of Object.entries(record)) {
    if (typeof v === 'string') result[k] = v;
  }
  return result;
}

/**
 * Pod spec of a workload: CronJob job template, then pod template,
 * then the bare spec (a Pod itself).
 */
export function getPodSpec(manifest: unknown): UnknownRecord | undefined {
  const jobTemplateSpec = getPath(manifest, ['spec', 'jobTemplate', 'spec', 'template', 'spec']);
  if (isRecord(jobTemplateSpec)) return jobTemplateSpec;
  const templateSpec = getPath(manifest, ['spec', 'template', 'spec']);
  if (isRecord(templateSpec)) return templateSpec;
  return getRecord(manifest, 'spec');
}

/** Labels the workload stamps on its pods. */
export function getPodTemplateLabels(manifest: unknown): Record<string, string> {
  const jobTemplate = getPath(manifest, ['spec', 'jobTemplate', 'spec', 'template', 'metadata']);
  if (isRecord(jobTemplate)) return getStringMap(jobTemplate, 'labels');
  return getStringMap(getPath(manifest, ['spec', 'template', 'metadata']), 'labels');
}

/** containers, initContainers and ephemeralContainers of a pod spec. */
export function getAllContainers(podSpec: unknown): UnknownRecord[] {
  return [
    ...getRecords(podSpec, 'containers'),
    ...getRecords(podSpec, 'initContainers'),
    ...getRecords(podSpec, 'ephemeralContainers'),
  ];
}
