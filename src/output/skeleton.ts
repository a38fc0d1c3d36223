import { access, mkdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ChartExistsError, ChartWriteError, errorMessage } from '../errors.js';
import type { ChartMetadata } from '../types/config.js';
import type { Logger } from '../utils/logger.js';

/** Kinds that get an `enabled` switch in the starter values.yaml. */
const TOGGLED_KINDS = [
  'deployment',
  'statefulset',
  'daemonset',
  'cronjob',
  'job',
  'service',
  'configmap',
  'secret',
  'serviceaccount',
  'persistentvolumeclaim',
  'ingress',
];

export const DEFAULT_CHART_DESCRIPTION = 'Helm chart generated from existing Kubernetes resources';

export function chartYaml(meta: ChartMetadata, description = DEFAULT_CHART_DESCRIPTION): string {
  return `apiVersion: v2
name: ${meta.release}
description: ${JSON.stringify(description)}
type: application
version: ${meta.chartVersion}
appVersion: ${JSON.stringify(meta.appVersion)}
keywords:
  - kubernetes
  - helm
  - generated
`;
}

export function starterValuesYaml(release: string): string {
  const toggles = TOGGLED_KINDS.map((kind) => `${kind}:\n  enabled: true\n`).join('\n');
  return `# Default values for ${release}.
# Each kind can be switched off with <kind>.enabled=false.

${toggles}`;
}

export const HELMIGNORE = `# Patterns to ignore when building packages.
# This supports shell glob matching, relative path matching, and
# negation (prefixed with !). Only one pattern per line.
.DS_Store
# Common VCS dirs
.git/
.gitignore
.bzr/
.bzrignore
.hg/
.hgignore
.svn/
# Common backup files
*.swp
*.bak
*.tmp
*.orig
*~
# Various IDEs
.project
.idea/
*.tmproj
.vscode/
# Export notes
EXPORT.md
`;

export function chartReadme(release: string): string {
  return `# ${release}

This chart was exported from live Kubernetes resources.

## Installation

\`\`\`bash
helm install ${release} .
\`\`\`

## Configuration

Every kind has an \`enabled\` switch in \`values.yaml\`:

\`\`\`bash
helm install ${release} . --set deployment.enabled=false
\`\`\`

Templated fields (images, replicas, environment, service ports, config data,
storage sizes) read their values from \`values.yaml\`; override them with
\`--set\` or \`-f my-values.yaml\`.

## Upgrading

\`\`\`bash
helm upgrade ${release} .
\`\`\`

See \`EXPORT.md\` for the list of exported resources.
`;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Fail with ChartExistsError when the path exists and force is unset.
 * Touches nothing on disk.
 */
export async function assertChartPathAvailable(path: string, force: boolean): Promise<string> {
  const chartRoot = resolve(path);
  if (!force && (await pathExists(chartRoot))) {
    throw new ChartExistsError(chartRoot);
  }
  return chartRoot;
}

/**
 * Create the chart directory with Chart.yaml, starter values.yaml,
 * .helmignore, README.md and an empty templates/. With force an existing
 * directory is removed first.
 */
export async function createChartSkeleton(
  path: string,
  meta: ChartMetadata,
  force: boolean,
  logger?: Logger,
): Promise<string> {
  const chartRoot = await assertChartPathAvailable(path, force);

  try {
    if (await pathExists(chartRoot)) {
      logger?.info(`Removing existing chart directory ${chartRoot}`);
      await rm(chartRoot, { recursive: true, force: true });
    }
    await mkdir(join(chartRoot, 'templates'), { recursive: true });
    await writeFile(join(chartRoot, 'Chart.yaml'), chartYaml(meta), 'utf-8');
    await writeFile(join(chartRoot, 'values.yaml'), starterValuesYaml(meta.release), 'utf-8');
    await writeFile(join(chartRoot, '.helmignore'), HELMIGNORE, 'utf-8');
    await writeFile(join(chartRoot, 'README.md'), chartReadme(meta.release), 'utf-8');
  } catch (err) {
    throw new ChartWriteError(
      `Failed to create chart directory ${chartRoot}: ${errorMessage(err)}`,
      chartRoot,
      err,
    );
  }

  logger?.debug(`Created chart skeleton at ${chartRoot}`);
  return chartRoot;
}
