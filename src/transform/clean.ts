import type { CleaningOptions } from '../types/config.js';
import type { ResourceObject } from '../types/k8s.js';
import { POD_CONTROLLER_KINDS } from '../utils/kinds.js';
import { getPath, getRecord, isRecord, type UnknownRecord } from '../utils/manifest.js';

/** Metadata the API server owns. */
export const METADATA_FIELDS_TO_DROP = [
  'creationTimestamp',
  'deletionGracePeriodSeconds',
  'deletionTimestamp',
  'generateName',
  'generation',
  'managedFields',
  'ownerReferences',
  'resourceVersion',
  'selfLink',
  'uid',
  'namespace',
];

const ANNOTATION_PREFIXES_TO_DROP = ['kubectl.kubernetes.io'];
const ANNOTATION_SUFFIXES_TO_DROP = ['last-applied-configuration'];
const LABELS_TO_DROP = ['pod-template-hash'];

const SERVICE_SPEC_FIELDS_TO_DROP = [
  'clusterIP',
  'clusterIPs',
  'ipFamilies',
  'ipFamilyPolicy',
  'sessionAffinityConfig',
];
const CONTROLLER_SPEC_FIELDS_TO_DROP = ['revisionHistoryLimit', 'progressDeadlineSeconds'];
const PVC_SPEC_FIELDS_TO_DROP = ['volumeName', 'dataSource', 'dataSourceRef'];
const PVC_ANNOTATIONS_TO_DROP = [
  'pv.kubernetes.io/bind-completed',
  'pv.kubernetes.io/bound-by-controller',
];

export const EMPTY_CLEANING_OPTIONS: CleaningOptions = {
  extraMetadataFields: [],
  extraAnnotationPrefixes: [],
  extraLabels: [],
};

function dropKeys(record: UnknownRecord, keys: readonly string[]): void {
  for (const key of keys) delete record[key];
}

function cleanAnnotations(meta: UnknownRecord, options: CleaningOptions, extra: string[] = []): void {
  const annotations = meta.annotations;
  if (!isRecord(annotations)) return;

  const prefixes = [...ANNOTATION_PREFIXES_TO_DROP, ...options.extraAnnotationPrefixes];
  for (const key of Object.keys(annotations)) {
    if (
      extra.includes(key) ||
      prefixes.some((p) => key.startsWith(p)) ||
      ANNOTATION_SUFFIXES_TO_DROP.some((s) => key.endsWith(s))
    ) {
      delete annotations[key];
    }
  }
  if (Object.keys(annotations).length === 0) delete meta.annotations;
}

function cleanLabels(meta: UnknownRecord, options: CleaningOptions): void {
  const labels = meta.labels;
  if (!isRecord(labels)) return;

  dropKeys(labels, [...LABELS_TO_DROP, ...options.extraLabels]);
  if (Object.keys(labels).length === 0) delete meta.labels;
}

function cleanTemplateMetadata(meta: unknown, options: CleaningOptions): void {
  if (!isRecord(meta)) return;
  delete meta.creationTimestamp;
  cleanAnnotations(meta, options);
  cleanLabels(meta, options);
}

function cleanPodController(manifest: ResourceObject, options: CleaningOptions): void {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return;

  cleanTemplateMetadata(getPath(spec, ['template', 'metadata']), options);
  if (manifest.kind === 'CronJob') {
    cleanTemplateMetadata(getPath(spec, ['jobTemplate', 'metadata']), options);
    cleanTemplateMetadata(getPath(spec, ['jobTemplate', 'spec', 'template', 'metadata']), options);
  }
  dropKeys(spec, CONTROLLER_SPEC_FIELDS_TO_DROP);
}

/**
 * Strip cluster-managed state so the manifest can be re-applied.
 * Returns a new object; the input is left untouched.
 */
export function cleanManifest(
  manifest: ResourceObject,
  options: CleaningOptions = EMPTY_CLEANING_OPTIONS,
): ResourceObject {
  const cleaned = structuredClone(manifest);
  delete cleaned.status;

  const meta = cleaned.metadata;
  dropKeys(meta, [
    ...METADATA_FIELDS_TO_DROP,
    ...options.extraMetadataFields.filter((field) => field !== 'name'),
  ]);
  const pvcAnnotations = cleaned.kind === 'PersistentVolumeClaim' ? PVC_ANNOTATIONS_TO_DROP : [];
  cleanAnnotations(meta, options, pvcAnnotations);
  cleanLabels(meta, options);

  const spec = getRecord(cleaned, 'spec');
  if (cleaned.kind === 'Service' && spec) {
    dropKeys(spec, SERVICE_SPEC_FIELDS_TO_DROP);
  } else if (POD_CONTROLLER_KINDS.has(cleaned.kind)) {
    cleanPodController(cleaned, options);
  } else if (cleaned.kind === 'PersistentVolumeClaim' && spec) {
    dropKeys(spec, PVC_SPEC_FIELDS_TO_DROP);
  }

  return cleaned;
}
