/** Resource kinds with dedicated cleaning, templating and reference rules. */
export const SUPPORTED_RESOURCE_TYPES = [
  'deployments',
  'statefulsets',
  'daemonsets',
  'cronjobs',
  'jobs',
  'services',
  'configmaps',
  'secrets',
  'serviceaccounts',
  'persistentvolumeclaims',
  'ingresses',
] as const;

export const WORKLOAD_RESOURCE_TYPES = [
  'deployments',
  'statefulsets',
  'daemonsets',
  'cronjobs',
  'jobs',
] as const;

export const POD_CONTROLLER_KINDS: ReadonlySet<string> = new Set([
  'Deployment',
  'StatefulSet',
  'DaemonSet',
  'ReplicaSet',
  'Job',
  'CronJob',
]);

const KIND_TO_RESOURCE_TYPE: Record<string, string> = {
  Deployment: 'deployments',
  StatefulSet: 'statefulsets',
  DaemonSet: 'daemonsets',
  ReplicaSet: 'replicasets',
  CronJob: 'cronjobs',
  Job: 'jobs',
  Service: 'services',
  ConfigMap: 'configmaps',
  Secret: 'secrets',
  ServiceAccount: 'serviceaccounts',
  PersistentVolumeClaim: 'persistentvolumeclaims',
  Ingress: 'ingresses',
};

/**
 * Plural lowercase resource type for a kind (`Ingress` → `ingresses`).
 * Unknown kinds follow English pluralization of the lowercased kind.
 */
export function resourceTypeForKind(kind: string): string {
  const known = KIND_TO_RESOURCE_TYPE[kind];
  if (known) return known;

  const lower = kind.toLowerCase();
  if (/(s|x|z|ch|sh)$/.test(lower)) return `${lower}es`;
  if (/[^aeiou]y$/.test(lower)) return `${lower.slice(0, -1)}ies`;
  return `${lower}s`;
}

export function isWorkloadResourceType(resourceType: string): boolean {
  return (WORKLOAD_RESOURCE_TYPES as readonly string[]).includes(resourceType);
}

/**
 * Normalize a user-supplied kind (`Deployment`, `deploy`, `deployments`)
 * to its plural resource type.
 */
export function normalizeResourceType(input: string): string {
  const lower = input.trim().toLowerCase();
  const aliases: Record<string, string> = {
    deploy: 'deployments',
    sts: 'statefulsets',
    ds: 'daemonsets',
    cj: 'cronjobs',
    svc: 'services',
    cm: 'configmaps',
    sa: 'serviceaccounts',
    pvc: 'persistentvolumeclaims',
    ing: 'ingresses',
  };
  if (aliases[lower]) return aliases[lower];

  for (const [kind, resourceType] of Object.entries(KIND_TO_RESOURCE_TYPE)) {
    if (kind.toLowerCase() === lower || resourceType === lower) return resourceType;
  }
  return lower.endsWith('s') ? lower : resourceTypeForKind(lower);
}
