import { describe, it, expect } from 'vitest';
import {
  getAllContainers,
  getPath,
  getPodSpec,
  getPodTemplateLabels,
  getRecords,
  getStringMap,
} from '../../src/utils/manifest.js';

const deployment = {
  spec: {
    template: {
      metadata: { labels: { app: 'web', tier: 'front' } },
      spec: {
        containers: [{ name: 'web' }],
        initContainers: [{ name: 'migrate' }],
      },
    },
  },
};

const cronJob = {
  spec: {
    jobTemplate: {
      spec: {
        template: {
          metadata: { labels: { app: 'report' } },
          spec: { containers: [{ name: 'report' }] },
        },
      },
    },
  },
};

describe('getPath', () => {
  it('follows record keys', () => {
    expect(getPath(deployment, ['spec', 'template', 'metadata', 'labels', 'app'])).toBe('web');
  });

  it('returns undefined through non-records', () => {
    expect(getPath({ a: [1] }, ['a', '0'])).toBeUndefined();
    expect(getPath(null, ['a'])).toBeUndefined();
  });
});

describe('getRecords / getStringMap', () => {
  it('drops entries of the wrong shape', () => {
    expect(getRecords({ items: [{ a: 1 }, 'x', null, [1]] }, 'items')).toEqual([{ a: 1 }]);
    expect(getStringMap({ labels: { a: 'b', n: 1 } }, 'labels')).toEqual({ a: 'b' });
  });
});

describe('getPodSpec', () => {
  it('prefers the CronJob job template', () => {
    expect(getPodSpec(cronJob)).toEqual({ containers: [{ name: 'report' }] });
  });

  it('uses the pod template of controllers', () => {
    expect(getRecords(getPodSpec(deployment), 'containers')).toEqual([{ name: 'web' }]);
  });

  it('falls back to the bare spec', () => {
    expect(getPodSpec({ spec: { containers: [] } })).toEqual({ containers: [] });
  });
});

describe('getPodTemplateLabels', () => {
  it('reads template labels', () => {
    expect(getPodTemplateLabels(deployment)).toEqual({ app: 'web', tier: 'front' });
    expect(getPodTemplateLabels(cronJob)).toEqual({ app: 'report' });
    expect(getPodTemplateLabels({})).toEqual({});
  });
});

describe('getAllContainers', () => {
  it('includes init containers', () => {
    expect(getAllContainers(getPodSpec(deployment)).map((c) => c.name)).toEqual(['web', 'migrate']);
  });
});
