import type { ResourceObject } from '../types/k8s.js';
import {
  getAllContainers,
  getPath,
  getPodSpec,
  getPodTemplateLabels,
  getRecord,
  getRecords,
  getString,
  getStringMap,
  isRecord,
} from '../utils/manifest.js';

export interface ResourceReferences {
  configMaps: Set<string>;
  secrets: Set<string>;
  serviceAccounts: Set<string>;
  pvcs: Set<string>;
}

function addName(target: Set<string>, name: unknown): void {
  if (typeof name === 'string' && name) target.add(name);
}

function collectVolumeReferences(podSpec: unknown, refs: ResourceReferences): void {
  for (const volume of getRecords(podSpec, 'volumes')) {
    addName(refs.configMaps, getPath(volume, ['configMap', 'name']));
    addName(refs.secrets, getPath(volume, ['secret', 'secretName']));
    addName(refs.pvcs, getPath(volume, ['persistentVolumeClaim', 'claimName']));

    for (const source of getRecords(getRecord(volume, 'projected'), 'sources')) {
      addName(refs.configMaps, getPath(source, ['configMap', 'name']));
      addName(refs.secrets, getPath(source, ['secret', 'name']));
    }
  }
}

function collectContainerReferences(podSpec: unknown, refs: ResourceReferences): void {
  for (const container of getAllContainers(podSpec)) {
    for (const source of getRecords(container, 'envFrom')) {
      addName(refs.configMaps, getPath(source, ['configMapRef', 'name']));
      addName(refs.secrets, getPath(source, ['secretRef', 'name']));
    }
    for (const env of getRecords(container, 'env')) {
      const valueFrom = getRecord(env, 'valueFrom');
      addName(refs.configMaps, getPath(valueFrom, ['configMapKeyRef', 'name']));
      addName(refs.secrets, getPath(valueFrom, ['secretKeyRef', 'name']));
    }
  }
}

/**
 * Names of the ConfigMaps, Secrets, ServiceAccounts and PVCs the
 * workloads' pods depend on.
 */
export function findReferences(workloads: Iterable<ResourceObject>): ResourceReferences {
  const refs: ResourceReferences = {
    configMaps: new Set(),
    secrets: new Set(),
    serviceAccounts: new Set(),
    pvcs: new Set(),
  };

  for (const workload of workloads) {
    const podSpec = getPodSpec(workload);
    if (!podSpec) continue;

    collectVolumeReferences(podSpec, refs);
    collectContainerReferences(podSpec, refs);

    for (const pullSecret of getRecords(podSpec, 'imagePullSecrets')) {
      addName(refs.secrets, pullSecret.name);
    }
    addName(
      refs.serviceAccounts,
      getString(podSpec, 'serviceAccountName') || getString(podSpec, 'serviceAccount'),
    );
  }

  return refs;
}

/** True when every selector pair is present in labels. */
export function labelsMatch(selector: Record<string, string>, labels: Record<string, string>): boolean {
  return Object.entries(selector).every(([key, value]) => labels[key] === value);
}

/**
 * Services whose non-empty selector matches the pod labels of any workload.
 */
export function findMatchingServices(
  workloads: Iterable<ResourceObject>,
  services: Iterable<ResourceObject>,
): Set<string> {
  const podLabels = [...workloads].map(getPodTemplateLabels);
  const matched = new Set<string>();

  for (const service of services) {
    const selector = getStringMap(getRecord(service, 'spec'), 'selector');
    if (Object.keys(selector).length === 0) continue;
    if (podLabels.some((labels) => labelsMatch(selector, labels))) {
      matched.add(service.metadata.name);
    }
  }
  return matched;
}

function backendServiceName(backend: unknown): string | undefined {
  if (!isRecord(backend)) return undefined;
  return getString(getRecord(backend, 'service'), 'name') ?? getString(backend, 'serviceName');
}

/**
 * Ingresses routing to any of the named services, through the default
 * backend or any rule path. Both networking/v1 and legacy backends count.
 */
export function findIngressesForServices(
  ingresses: Iterable<ResourceObject>,
  serviceNames: ReadonlySet<string>,
): Set<string> {
  const matched = new Set<string>();

  for (const ingress of ingresses) {
    const spec = getRecord(ingress, 'spec');
    const backends: unknown[] = [
      getRecord(spec, 'defaultBackend') ?? getRecord(spec, 'backend'),
    ];
    for (const rule of getRecords(spec, 'rules')) {
      for (const path of getRecords(getRecord(rule, 'http'), 'paths')) {
        backends.push(path.backend);
      }
    }

    const routesToService = backends.some((backend) => {
      const name = backendServiceName(backend);
      return name !== undefined && serviceNames.has(name);
    });
    if (routesToService) matched.add(ingress.metadata.name);
  }
  return matched;
}
