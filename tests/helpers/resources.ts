import type { ResourceObject } from '../../src/types/k8s.js';

/** Deployment as kubectl returns it, server-managed fields included. */
export function liveDeployment(name: string, overrides: Record<string, unknown> = {}): ResourceObject {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name,
      namespace: 'shop',
      uid: '0f1e2d3c',
      resourceVersion: '4711',
      generation: 3,
      creationTimestamp: '2024-01-01T00:00:00Z',
      managedFields: [{ manager: 'kubectl' }],
      labels: { app: name },
      annotations: {
        'deployment.kubernetes.io/revision': '3',
        'kubectl.kubernetes.io/last-applied-configuration': '{}',
      },
    },
    spec: {
      replicas: 2,
      revisionHistoryLimit: 10,
      progressDeadlineSeconds: 600,
      selector: { matchLabels: { app: name } },
      template: {
        metadata: {
          labels: { app: name, 'pod-template-hash': '5d9f7' },
          annotations: { 'kubectl.kubernetes.io/restartedAt': '2024-01-02T00:00:00Z' },
        },
        spec: {
          serviceAccountName: `${name}-sa`,
          containers: [
            {
              name,
              image: `registry.local/${name}:1.4.2`,
              imagePullPolicy: 'IfNotPresent',
              ports: [{ containerPort: 8080 }],
              env: [{ name: 'LOG_LEVEL', value: 'info' }],
              envFrom: [{ configMapRef: { name: `${name}-config` } }],
              resources: { limits: { cpu: '500m' } },
            },
          ],
          volumes: [{ name: 'data', persistentVolumeClaim: { claimName: `${name}-data` } }],
        },
      },
      ...overrides,
    },
    status: { readyReplicas: 2 },
  };
}

export function liveService(name: string, selector: Record<string, string>): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name, namespace: 'shop', uid: 'abc', resourceVersion: '12' },
    spec: {
      type: 'ClusterIP',
      clusterIP: '10.0.0.12',
      clusterIPs: ['10.0.0.12'],
      selector,
      ports: [{ port: 80, targetPort: 8080, protocol: 'TCP' }],
    },
    status: { loadBalancer: {} },
  };
}

export function liveConfigMap(name: string, data: Record<string, string>): ResourceObject {
  return { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name, uid: 'c1' }, data };
}

export function liveSecret(name: string, type = 'Opaque'): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { name, uid: 's1' },
    type,
    data: { password: 'dGVzdC1zZWNyZXQ=' },
  };
}

export function livePvc(name: string): ResourceObject {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name,
      uid: 'p1',
      annotations: { 'pv.kubernetes.io/bind-completed': 'yes' },
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      storageClassName: 'standard',
      volumeName: 'pvc-1234',
      resources: { requests: { storage: '5Gi' } },
    },
    status: { phase: 'Bound' },
  };
}
