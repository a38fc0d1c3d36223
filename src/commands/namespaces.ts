import * as p from '@clack/prompts';
import chalk from 'chalk';
import { createCliLogger } from '../utils/logger.js';
import { clientFromConfig, loadConfig, reportError, type ExportOptions } from './export.js';

export type NamespacesOptions = Pick<ExportOptions, 'kubeconfig' | 'context' | 'config' | 'verbose'>;

export async function namespaces(options: NamespacesOptions): Promise<void> {
  const logger = createCliLogger(options.verbose);
  try {
    const config = await loadConfig(undefined, options, logger);
    const client = clientFromConfig(config, logger);

    const context = await client.currentContext();
    if (context) p.log.info(`Context: ${chalk.bold(context)}`);

    const names = await client.listNamespaces();
    if (names.length === 0) {
      p.log.warn('No namespaces found');
      return;
    }
    for (const name of names) console.log(`  ${chalk.cyan(name)}`);
  } catch (err) {
    reportError(err);
  }
}
