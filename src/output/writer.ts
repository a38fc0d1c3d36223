import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ChartWriteError, errorMessage } from '../errors.js';
import { templatizeManifest } from '../transform/templatize.js';
import type { TemplateOptions } from '../types/config.js';
import type { ExportResult, ResourceObject } from '../types/k8s.js';
import { kindToggleKey, templateFilename } from '../utils/names.js';
import { renderTemplateBody } from '../utils/yaml.js';

export interface WriteOptions {
  templatize: boolean;
  template: TemplateOptions;
}

/**
 * Template file content: the manifest wrapped in its kind's enabled guard.
 * A missing switch counts as enabled; `enabled: false` turns the kind off.
 */
export function renderTemplateFile(manifest: ResourceObject): string {
  const guard = `{{- if dig "enabled" true (.Values.${kindToggleKey(manifest.kind)} | default dict) }}`;
  return `${guard}\n---\n${renderTemplateBody(manifest)}{{- end }}\n`;
}

/**
 * Write one cleaned manifest to `templates/`, templated when requested.
 */
export async function writeManifest(
  manifest: ResourceObject,
  chartRoot: string,
  prefix: string,
  options: WriteOptions,
): Promise<ExportResult> {
  const { kind } = manifest;
  const { name } = manifest.metadata;
  const path = join(chartRoot, 'templates', templateFilename(prefix, kind, name));

  const body = options.templatize ? templatizeManifest(manifest, name, options.template) : manifest;

  try {
    await writeFile(path, renderTemplateFile(body), 'utf-8');
  } catch (err) {
    throw new ChartWriteError(`Failed to write ${kind}/${name}: ${errorMessage(err)}`, path, err);
  }

  return { kind, name, path, source: manifest };
}
