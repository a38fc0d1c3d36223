import { writeFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { ChartWriteError, errorMessage } from '../errors.js';
import type { ExportResult } from '../types/k8s.js';

/**
 * EXPORT.md content: exported resources grouped by kind, then usage.
 */
export function renderSummary(results: ExportResult[], chartRoot: string, release: string): string {
  const lines = [
    `# ${release} Chart Export Summary`,
    '',
    `Generated ${results.length} manifests from live Kubernetes resources.`,
    '',
    '## Exported Resources',
    '',
  ];

  const byKind = new Map<string, ExportResult[]>();
  for (const result of results) {
    const group = byKind.get(result.kind) ?? [];
    group.push(result);
    byKind.set(result.kind, group);
  }

  for (const kind of [...byKind.keys()].sort()) {
    lines.push(`### ${kind}`, '');
    const group = [...(byKind.get(kind) ?? [])].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const result of group) {
      const rel = relative(chartRoot, result.path).split(sep).join('/');
      lines.push(`- **${result.name}**: \`${rel}\``);
    }
    lines.push('');
  }

  lines.push(
    '## Usage',
    '',
    'Install this chart with:',
    '',
    '```bash',
    `helm install ${release} .`,
    '```',
    '',
    'To customize the installation, modify `values.yaml` or use `--set` flags:',
    '',
    '```bash',
    `helm install ${release} . --set deployment.enabled=false`,
    '```',
    '',
    '## Notes',
    '',
    '- This chart was generated from live Kubernetes resources',
    '- Review and customize the templates before production use',
    '- Consider parameterizing environment-specific values',
  );

  return `${lines.join('\n')}\n`;
}

/**
 * Write EXPORT.md. Nothing is written for an empty export.
 */
export async function writeSummary(
  results: ExportResult[],
  chartRoot: string,
  release: string,
): Promise<string | null> {
  if (results.length === 0) return null;

  const path = join(chartRoot, 'EXPORT.md');
  try {
    await writeFile(path, renderSummary(results, chartRoot, release), 'utf-8');
  } catch (err) {
    throw new ChartWriteError(`Failed to write EXPORT.md: ${errorMessage(err)}`, path, err);
  }
  return path;
}
