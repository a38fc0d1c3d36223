import * as p from '@clack/prompts';
import chalk from 'chalk';
import { planToRecord, suggestSelection } from '../analyzer/selection.js';
import { collectResources, resolveKinds } from '../cluster/collector.js';
import { ExportError } from '../errors.js';
import type { ResourceInventory, ResourceObject } from '../types/k8s.js';
import { normalizeResourceType } from '../utils/kinds.js';
import { createCliLogger } from '../utils/logger.js';
import { toResourceFilter } from '../pipeline/export.js';
import { clientFromConfig, loadConfig, reportError, type ExportOptions } from './export.js';

export type RelatedOptions = Pick<
  ExportOptions,
  'namespace' | 'kubeconfig' | 'context' | 'config' | 'verbose'
>;

/** Resolve `kind/name` arguments against the inventory. */
export function findRoots(inventory: ResourceInventory, refs: string[]): ResourceObject[] {
  return refs.map((ref) => {
    const slash = ref.indexOf('/');
    if (slash <= 0) {
      throw new ExportError(`Invalid workload "${ref}"`, 'Use the form <kind>/<name>, e.g. deploy/web.');
    }
    const type = normalizeResourceType(ref.slice(0, slash));
    const name = ref.slice(slash + 1);
    const found = (inventory.get(type) ?? []).find((r) => r.metadata.name === name);
    if (!found) throw new ExportError(`Workload ${type}/${name} not found`);
    return found;
  });
}

/** `--resources` value that reproduces a selection. */
export function formatResourcesFlag(record: Record<string, string[]>): string {
  return Object.entries(record)
    .flatMap(([kind, names]) => names.map((name) => `${kind}/${name}`))
    .join(',');
}

export async function related(workloads: string[], options: RelatedOptions): Promise<void> {
  const logger = createCliLogger(options.verbose);
  try {
    const config = await loadConfig(undefined, options, logger);
    const client = clientFromConfig(config, logger);
    const filter = toResourceFilter(config);

    const s = p.spinner();
    s.start(`Listing resources in ${config.namespace}...`);
    const { inventory } = await collectResources(client, resolveKinds(filter), filter, logger);
    s.stop('Resources listed');

    const record = planToRecord(suggestSelection(findRoots(inventory, workloads), inventory));

    console.log('');
    for (const [kind, names] of Object.entries(record)) {
      console.log(chalk.bold(kind));
      for (const name of names) console.log(`  ${chalk.cyan(name)}`);
    }
    console.log('');
    console.log(`Export with: ${chalk.bold(`kube2helm export <release> -n ${config.namespace} --resources ${formatResourcesFlag(record)}`)}`);
  } catch (err) {
    reportError(err);
  }
}
