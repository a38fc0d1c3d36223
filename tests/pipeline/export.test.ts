import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { planFromRecord } from '../../src/analyzer/selection.js';
import { resolveExportConfig } from '../../src/config/loader.js';
import type { ExportConfigInput } from '../../src/config/schema.js';
import {
  ChartExistsError,
  ExportAbortedError,
  NothingToExportError,
  PrerequisiteError,
} from '../../src/errors.js';
import type { ChartLinter } from '../../src/output/lint.js';
import { runExport, type ExportDependencies } from '../../src/pipeline/export.js';
import type { ResourceObject } from '../../src/types/k8s.js';
import { createMemoryLogger, type MemoryLogger } from '../../src/utils/logger.js';
import { createFakeClient, type FakeClientOptions } from '../helpers/fake-client.js';
import { liveConfigMap, liveDeployment, liveService } from '../helpers/resources.js';

let tmpDir: string;
let chartDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'kube2helm-export-'));
  chartDir = join(tmpDir, 'chart');
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

const withKubectl = (name: string): string | null => (name === 'kubectl' ? '/usr/bin/kubectl' : null);

const brokenDeployment: ResourceObject = {
  apiVersion: 'apps/v1',
  kind: 'Deployment',
  metadata: { name: 'broken' },
  spec: { template: { spec: { containers: [] } } },
};

function setup(
  clientOptions: FakeClientOptions,
  overrides: ExportConfigInput = {},
  extra: Partial<ExportDependencies> = {},
): { run: () => ReturnType<typeof runExport>; logger: MemoryLogger } {
  const logger = createMemoryLogger();
  const config = resolveExportConfig({}, { namespace: 'shop', outputDir: chartDir, ...overrides });
  const deps: ExportDependencies = {
    client: createFakeClient({ namespaces: ['default', 'shop'], ...clientOptions }),
    logger,
    which: withKubectl,
    ...extra,
  };
  return { run: () => runExport({ config, release: 'shop', selection: undefined }, deps), logger };
}

const webResources = {
  deployments: [liveDeployment('web')],
  services: [liveService('web', { app: 'web' })],
  configmaps: [liveConfigMap('web-config', { LOG_FORMAT: 'json' })],
};

describe('runExport', () => {
  it('exports every collected resource and walks through all phases', async () => {
    const seen: string[] = [];
    const { run } = setup({ resources: webResources }, {}, { onPhase: (phase) => seen.push(phase) });

    const report = await run();

    expect(report.success).toBe(true);
    expect(report.exportedCount).toBe(3);
    expect(report.failedCount).toBe(0);
    expect(report.outputPath).toBe(chartDir);
    expect(report.lint).toBe('skipped');
    expect(report.phases).toEqual([
      'Init',
      'ValidatingPrerequisites',
      'CollectingResources',
      'Filtering',
      'CleaningAndTemplating',
      'Writing',
      'Finalizing',
      'Done',
    ]);
    expect(seen).toEqual(report.phases);
    expect((await readdir(join(chartDir, 'templates'))).sort()).toEqual([
      'configmaps-web-config.yaml',
      'deployments-web.yaml',
      'services-web.yaml',
    ]);
  });

  it('fails without kubectl and writes nothing', async () => {
    const { run } = setup({ resources: webResources }, {}, { which: () => null });

    await expect(run()).rejects.toThrow(new PrerequisiteError('kubectl was not found on PATH.'));
    await expect(access(chartDir)).rejects.toThrow();
  });

  it('requires helm for lint unless a linter is given', async () => {
    const { run } = setup({ resources: webResources }, { lint: true });
    await expect(run()).rejects.toThrow('helm was not found on PATH but --lint was requested.');
  });

  it('fails when the cluster is unreachable', async () => {
    const { run } = setup({ resources: webResources, connected: false });
    await expect(run()).rejects.toThrow('Cannot connect to the Kubernetes cluster.');
  });

  it('fails for a namespace that does not exist', async () => {
    const { run } = setup({ resources: webResources, namespaces: ['default'] });
    await expect(run()).rejects.toThrow('Namespace "shop" not found.');
  });

  it('continues when listing namespaces is forbidden', async () => {
    const { run, logger } = setup({
      resources: webResources,
      namespaces: new Error('namespaces is forbidden: User "dev" cannot list resource "namespaces"'),
    });

    expect((await run()).exportedCount).toBe(3);
    expect(logger.messages('warn')).toContain('Not allowed to list namespaces; assuming "shop" exists.');
  });

  it('rejects encrypt mode while secrets are in scope', async () => {
    const { run } = setup({ resources: webResources }, { secretMode: 'encrypt' });
    await expect(run()).rejects.toBeInstanceOf(PrerequisiteError);

    const withoutSecrets = setup({ resources: webResources }, { secretMode: 'encrypt', exclude: ['secrets'] });
    expect((await withoutSecrets.run()).exportedCount).toBe(3);
  });

  it('refuses to overwrite an existing chart without force', async () => {
    await setup({ resources: webResources }).run();

    const again = setup({ resources: webResources });
    await expect(again.run()).rejects.toBeInstanceOf(ChartExistsError);

    const forced = setup({ resources: webResources }, { force: true });
    expect((await forced.run()).success).toBe(true);
  });

  it('ends in Failed for prerequisite errors', async () => {
    const seen: string[] = [];
    const { run } = setup({ resources: webResources, connected: false }, {}, { onPhase: (p) => seen.push(p) });
    await expect(run()).rejects.toThrow();
    expect(seen).toEqual(['Init', 'ValidatingPrerequisites', 'Failed']);
  });

  it('reports an empty namespace without creating the chart', async () => {
    const { run } = setup({ resources: {} });
    await expect(run()).rejects.toBeInstanceOf(NothingToExportError);
    await expect(access(chartDir)).rejects.toThrow();
  });

  it('skips kinds that cannot be listed', async () => {
    const { run, logger } = setup({
      resources: webResources,
      failing: { configmaps: new Error('the server could not find the requested resource') },
      forbidden: ['configmaps'],
    });

    const report = await run();

    expect(report.skippedKinds).toEqual(['configmaps']);
    expect(report.exportedCount).toBe(2);
    expect(logger.messages('warn')).toContain('No access to list configmaps in namespace shop.');
  });

  it('warns about validation issues and exports anyway', async () => {
    const { run, logger } = setup({ resources: { deployments: [brokenDeployment] } });

    const report = await run();

    expect(report.exportedCount).toBe(1);
    expect(logger.messages('warn')).toContain(
      'Validation issues for Deployment/broken: Missing or empty spec.template.spec.containers',
    );
  });

  it('counts validation issues as failures in strict mode', async () => {
    const { run, logger } = setup(
      { resources: { deployments: [brokenDeployment, liveDeployment('web')] } },
      { strict: true },
    );

    const report = await run();

    expect(report.success).toBe(false);
    expect(report.exportedCount).toBe(1);
    expect(report.failures).toEqual([
      {
        kind: 'Deployment',
        name: 'broken',
        reason: 'Validation failed: Missing or empty spec.template.spec.containers',
      },
    ]);
    expect(logger.messages('error')).toEqual([
      'Failed to export Deployment/broken: Validation failed: Missing or empty spec.template.spec.containers',
    ]);
  });

  it('warns when two resources share a template file', async () => {
    const { run, logger } = setup({ resources: { deployments: [liveDeployment('web'), liveDeployment('Web')] } });

    await run();

    expect(logger.messages('warn')).toContain('templates/deployments-web.yaml: Deployment/web overwrites Deployment/Web');
  });

  it('limits the export to a selection plan', async () => {
    const logger = createMemoryLogger();
    const config = resolveExportConfig({}, { namespace: 'shop', outputDir: chartDir });
    const report = await runExport(
      { config, release: 'shop', selection: planFromRecord({ deployments: ['web', 'ghost'] }) },
      { client: createFakeClient({ namespaces: ['shop'], resources: webResources }), logger, which: withKubectl },
    );

    expect(report.results.map((r) => `${r.kind}/${r.name}`)).toEqual(['Deployment/web']);
    expect(logger.messages('warn')).toContain('Selected deployments/ghost was not found in the namespace');
  });

  it('exports only the kinds a name allow-list names', async () => {
    const ingress: ResourceObject = {
      apiVersion: 'networking.k8s.io/v1',
      kind: 'Ingress',
      metadata: { name: 'billing' },
      spec: { defaultBackend: { service: { name: 'billing', port: { number: 80 } } } },
    };
    const { run, logger } = setup(
      { resources: { ...webResources, ingresses: [ingress] } },
      { names: { deployments: ['web'], services: ['web', 'api'] } },
    );

    const report = await run();

    expect(report.results.map((r) => `${r.kind}/${r.name}`)).toEqual(['Deployment/web', 'Service/web']);
    expect(logger.messages('warn')).toContain('Selected services/api was not found in the namespace');
  });

  it('writes with a worker pool', async () => {
    const { run } = setup({ resources: webResources }, { parallel: true, workers: 2 });
    const report = await run();
    expect(report.results.map((r) => r.name)).toEqual(['web-config', 'web', 'web']);
  });

  it('runs the linter when asked', async () => {
    const linted: string[] = [];
    const linter: ChartLinter = {
      lint: async (root) => {
        linted.push(root);
        return { ok: true, output: '' };
      },
    };
    const { run } = setup({ resources: webResources }, { lint: true }, { linter });

    expect((await run()).lint).toBe('passed');
    expect(linted).toEqual([chartDir]);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const seen: string[] = [];
    const { run } = setup(
      { resources: webResources },
      {},
      { signal: controller.signal, onPhase: (p) => seen.push(p) },
    );

    await expect(run()).rejects.toBeInstanceOf(ExportAbortedError);
    expect(seen.at(-1)).toBe('Failed');
  });
});
