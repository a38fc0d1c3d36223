/**
 * Builders for the Helm actions placed into templated manifests.
 */

import { HelmAction } from '../utils/yaml.js';

/** `.Values.a.b` for path `['a', 'b']`. */
export function valuesPath(path: string[]): string {
  return ['.Values', ...path].join('.');
}

export function valueRef(path: string[]): HelmAction {
  return new HelmAction(`{{ ${valuesPath(path)} }}`);
}

/** Reference with a numeric or boolean fallback rendered as-is. */
export function valueRefWithDefault(path: string[], fallback: number | boolean): HelmAction {
  return new HelmAction(`{{ ${valuesPath(path)} | default ${fallback} }}`);
}

/** Quoted string reference falling back to the literal. */
export function quotedValueRef(path: string[], fallback: string): HelmAction {
  return new HelmAction(`{{ ${valuesPath(path)} | default ${JSON.stringify(fallback)} | quote }}`);
}

/** Whole subtree taken from values; rendered by the YAML writer with nindent. */
export function blockRef(path: string[]): HelmAction {
  return new HelmAction(`{{ toYaml ${valuesPath(path)} }}`);
}

export function imageRef(base: string[]): HelmAction {
  const repository = valueRef([...base, 'image', 'repository']).expression;
  const tag = valueRef([...base, 'image', 'tag']).expression;
  return new HelmAction(`${repository}:${tag}`);
}

export interface ImageParts {
  repository: string;
  tag: string;
}

/**
 * Split an image reference into repository and tag. Digest-pinned
 * references return null and stay literal.
 */
export function splitImage(image: string): ImageParts | null {
  if (image.includes('@')) return null;
  const colon = image.lastIndexOf(':');
  if (colon > image.lastIndexOf('/')) {
    return { repository: image.slice(0, colon), tag: image.slice(colon + 1) };
  }
  return { repository: image, tag: 'latest' };
}
