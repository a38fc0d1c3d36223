import { describe, it, expect } from 'vitest';
import { optionsToOverrides, parseResourceList, splitList } from '../../src/commands/export.js';
import { findRoots, formatResourcesFlag } from '../../src/commands/related.js';
import type { ResourceInventory } from '../../src/types/k8s.js';
import { liveDeployment } from '../helpers/resources.js';

describe('splitList', () => {
  it('splits and trims comma-separated values', () => {
    expect(splitList(' deployments, services ,,')).toEqual(['deployments', 'services']);
    expect(splitList(undefined)).toBeUndefined();
  });
});

describe('parseResourceList', () => {
  it('groups names under normalized resource types', () => {
    expect(parseResourceList('deploy/web,cm/settings,deployments/worker')).toEqual({
      deployments: ['web', 'worker'],
      configmaps: ['settings'],
    });
  });

  it('rejects entries without a name', () => {
    expect(() => parseResourceList('deploy/')).toThrow('Invalid resource "deploy/"');
    expect(() => parseResourceList('web')).toThrow('Invalid resource "web"');
  });
});

describe('optionsToOverrides', () => {
  it('leaves flags that were not given undefined', () => {
    const overrides = optionsToOverrides('shop', { templatize: true });
    expect(overrides.release).toBe('shop');
    expect(overrides.templatize).toBeUndefined();
    expect(overrides.only).toBeUndefined();
    expect(overrides.workers).toBeUndefined();
  });

  it('converts list and numeric flags', () => {
    const overrides = optionsToOverrides(undefined, {
      only: 'deploy,svc',
      workers: '8',
      templatize: false,
      secretMode: 'external-ref',
      valuesScope: 'per-resource',
    });
    expect(overrides.only).toEqual(['deploy', 'svc']);
    expect(overrides.workers).toBe(8);
    expect(overrides.templatize).toBe(false);
    expect(overrides.secretMode).toBe('external-ref');
    expect(overrides.valuesScope).toBe('per-resource');
  });

  it('rejects unknown enum values and bad worker counts', () => {
    expect(() => optionsToOverrides(undefined, { secretMode: 'plain' })).toThrow(
      'Invalid --secret-mode value "plain"',
    );
    expect(() => optionsToOverrides(undefined, { valuesScope: 'global' })).toThrow(
      'Invalid --values-scope value "global"',
    );
    expect(() => optionsToOverrides(undefined, { workers: '0' })).toThrow('Invalid --workers value "0"');
  });
});

describe('related helpers', () => {
  const inventory: ResourceInventory = new Map([['deployments', [liveDeployment('web')]]]);

  it('resolves kind/name references', () => {
    expect(findRoots(inventory, ['deploy/web']).map((r) => r.metadata.name)).toEqual(['web']);
  });

  it('reports malformed and missing workloads', () => {
    expect(() => findRoots(inventory, ['web'])).toThrow('Invalid workload "web"');
    expect(() => findRoots(inventory, ['deploy/api'])).toThrow('Workload deployments/api not found');
  });

  it('formats a selection as a --resources value', () => {
    expect(formatResourcesFlag({ configmaps: ['web-config'], deployments: ['web'] })).toBe(
      'configmaps/web-config,deployments/web',
    );
  });
});
