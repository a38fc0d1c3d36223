import { describe, it, expect } from 'vitest';
import { cleanManifest } from '../../src/transform/clean.js';
import { splitImage } from '../../src/transform/placeholders.js';
import { templatizeManifest } from '../../src/transform/templatize.js';
import { getPath } from '../../src/utils/manifest.js';
import { HelmAction } from '../../src/utils/yaml.js';
import { liveConfigMap, liveDeployment, livePvc, liveService } from '../helpers/resources.js';

describe('splitImage', () => {
  it('splits repository and tag', () => {
    expect(splitImage('registry.local:5000/team/web:1.2')).toEqual({
      repository: 'registry.local:5000/team/web',
      tag: '1.2',
    });
  });

  it('defaults the tag to latest', () => {
    expect(splitImage('registry.local:5000/web')).toEqual({ repository: 'registry.local:5000/web', tag: 'latest' });
  });

  it('leaves digests alone', () => {
    expect(splitImage('web@sha256:abc')).toBeNull();
  });
});

describe('templatizeManifest', () => {
  it('parameterizes deployments at the top of values in shared scope', () => {
    const templated = templatizeManifest(cleanManifest(liveDeployment('web')));

    expect(getPath(templated, ['spec', 'replicas'])).toEqual(
      new HelmAction('{{ .Values.replicaCount | default 2 }}'),
    );
    const spec = templated.spec;
    expect(spec).toHaveProperty(
      ['template', 'spec', 'containers', 0, 'image'],
      new HelmAction('{{ .Values.image.repository }}:{{ .Values.image.tag }}'),
    );
    expect(spec).toHaveProperty(
      ['template', 'spec', 'containers', 0, 'imagePullPolicy'],
      new HelmAction('{{ .Values.image.pullPolicy }}'),
    );
    expect(spec).toHaveProperty(
      ['template', 'spec', 'containers', 0, 'resources'],
      new HelmAction('{{ toYaml .Values.resources }}'),
    );
    expect(spec).toHaveProperty(['template', 'spec', 'containers', 0, 'env'], [
      { name: 'LOG_LEVEL', value: new HelmAction('{{ .Values.env.loglevel | default "info" | quote }}') },
    ]);
  });

  it('nests values under the resource key in per-resource scope', () => {
    const templated = templatizeManifest(cleanManifest(liveDeployment('my-api')), 'my-api', {
      valuesScope: 'per-resource',
    });
    expect(getPath(templated, ['spec', 'replicas'])).toEqual(
      new HelmAction('{{ .Values.my_api.replicaCount | default 2 }}'),
    );
  });

  it('keeps digest-pinned images and templated env values literal', () => {
    const live = liveDeployment('web');
    const templated = templatizeManifest({
      ...live,
      spec: {
        template: {
          spec: {
            containers: [
              {
                name: 'web',
                image: 'web@sha256:abc',
                env: [{ name: 'GREETING', value: 'hi {{ name }}' }],
              },
            ],
          },
        },
      },
    });
    expect(templated.spec).toEqual({
      template: {
        spec: {
          containers: [{ name: 'web', image: 'web@sha256:abc', env: [{ name: 'GREETING', value: 'hi {{ name }}' }] }],
        },
      },
    });
  });

  it('parameterizes service type and first port', () => {
    const templated = templatizeManifest(cleanManifest(liveService('web', { app: 'web' })));
    expect(templated.spec).toEqual({
      type: new HelmAction('{{ .Values.service.type }}'),
      selector: { app: 'web' },
      ports: [
        {
          port: new HelmAction('{{ .Values.service.port }}'),
          targetPort: new HelmAction('{{ .Values.service.targetPort }}'),
          protocol: 'TCP',
        },
      ],
    });
  });

  it('moves config data into values', () => {
    expect(templatizeManifest(liveConfigMap('app-config', { a: '1' })).data).toEqual(
      new HelmAction('{{ toYaml .Values.config.app_config }}'),
    );
    expect(templatizeManifest(liveConfigMap('empty', {})).data).toEqual({});
  });

  it('parameterizes claim size and storage class', () => {
    const templated = templatizeManifest(cleanManifest(livePvc('web-data')));
    expect(templated.spec).toEqual({
      accessModes: ['ReadWriteOnce'],
      storageClassName: new HelmAction('{{ .Values.persistence.web_data.storageClass }}'),
      resources: { requests: { storage: new HelmAction('{{ .Values.persistence.web_data.size }}') } },
    });
  });

  it('does not modify the input', () => {
    const cleaned = cleanManifest(liveDeployment('web'));
    templatizeManifest(cleaned);
    expect(getPath(cleaned, ['spec', 'replicas'])).toBe(2);
  });
});
