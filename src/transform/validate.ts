import type { ResourceObject } from '../types/k8s.js';
import { POD_CONTROLLER_KINDS } from '../utils/kinds.js';
import { getArray, getPath, getRecord, isRecord } from '../utils/manifest.js';
import { METADATA_FIELDS_TO_DROP } from './clean.js';

function validatePodController(manifest: ResourceObject): string[] {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return ['Missing or invalid spec'];

  const isCronJob = manifest.kind === 'CronJob';
  const templatePath = isCronJob ? ['jobTemplate', 'spec', 'template'] : ['template'];
  const label = isCronJob ? 'spec.jobTemplate.spec.template' : 'spec.template';

  const template = getPath(spec, templatePath);
  if (!isRecord(template)) return [`Missing or invalid ${label}`];
  const podSpec = getRecord(template, 'spec');
  if (!podSpec) return [`Missing or invalid ${label}.spec`];
  if (getArray(podSpec, 'containers').length === 0) {
    return [`Missing or empty ${label}.spec.containers`];
  }
  return [];
}

function validateService(manifest: ResourceObject): string[] {
  const spec = getRecord(manifest, 'spec');
  if (!spec) return ['Missing or invalid spec'];

  const issues: string[] = [];
  getArray(spec, 'ports').forEach((port, i) => {
    if (isRecord(port) && !port.port) issues.push(`Missing port in ports[${i}]`);
  });
  return issues;
}

/**
 * Report problems in a cleaned manifest. Never mutates it.
 */
export function validateManifest(manifest: ResourceObject): string[] {
  const issues: string[] = [];

  if (!manifest.apiVersion) issues.push('Missing apiVersion');
  if (!manifest.kind) issues.push('Missing kind');
  if (!isRecord(manifest.metadata)) {
    issues.push('Missing or invalid metadata');
  } else {
    if (!manifest.metadata.name) issues.push('Missing metadata.name');
    for (const field of METADATA_FIELDS_TO_DROP) {
      if (field in manifest.metadata) {
        issues.push(`Managed field ${field} still present in metadata`);
      }
    }
  }

  if (POD_CONTROLLER_KINDS.has(manifest.kind)) {
    issues.push(...validatePodController(manifest));
  } else if (manifest.kind === 'Service') {
    issues.push(...validateService(manifest));
  }

  return issues;
}
