#!/usr/bin/env node
import { Command } from 'commander';
import { exportChart } from './commands/export.js';
import { related } from './commands/related.js';
import { namespaces } from './commands/namespaces.js';
import { lint } from './commands/lint.js';

const program = new Command();

program
  .name('kube2helm')
  .description('Export live Kubernetes resources from a namespace as a Helm chart')
  .version('0.1.0');

// Default command: export
program
  .command('export [release]', { isDefault: true })
  .description('Export a namespace (or a selection of it) to a Helm chart')
  .option('-n, --namespace <ns>', 'Namespace to export (default: default)')
  .option('-o, --output <dir>', 'Chart output directory (default: ./generated-chart)')
  .option('-l, --selector <selector>', 'Label selector passed to kubectl')
  .option('--only <kinds>', 'Only export these kinds, comma-separated')
  .option('--exclude <kinds>', 'Skip these kinds, comma-separated')
  .option('--resources <list>', 'Only export these resources, e.g. deploy/web,cm/settings')
  .option('--kubeconfig <path>', 'Path to kubeconfig file')
  .option('--context <name>', 'kubeconfig context to use')
  .option('--prefix <prefix>', 'Prefix for template filenames')
  .option('--include-secrets', 'Export all Secrets, not only selected ones')
  .option('--include-service-account-secrets', 'Also export service account token Secrets')
  .option('--secret-mode <mode>', 'Secret handling: include, skip, external-ref or encrypt')
  .option('--force', 'Overwrite an existing output directory')
  .option('--lint', 'Run helm lint on the generated chart')
  .option('--strict', 'Fail resources with validation issues instead of warning')
  .option('--chart-version <version>', 'Chart version (default: 0.1.0)')
  .option('--app-version <version>', 'App version (default: 1.0.0)')
  .option('--no-templatize', 'Write manifests without values placeholders')
  .option('--values-scope <scope>', 'Values layout: shared or per-resource')
  .option('--parallel', 'Write manifests with a worker pool')
  .option('--workers <n>', 'Worker pool size (default: 4)')
  .option('-v, --verbose', 'Show debug output')
  .option('-i, --interactive', 'Pick workloads and related resources interactively')
  .option('-c, --config <path>', 'Path to config file')
  .option('--save-config <path>', 'Save the effective config as YAML file')
  .action(exportChart);

// Related command
program
  .command('related <workloads...>')
  .description('Show the resources related to workloads, e.g. deploy/web')
  .option('-n, --namespace <ns>', 'Namespace to inspect')
  .option('--kubeconfig <path>', 'Path to kubeconfig file')
  .option('--context <name>', 'kubeconfig context to use')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Show debug output')
  .action(related);

// Namespaces command
program
  .command('namespaces')
  .description('List the namespaces of the current cluster')
  .option('--kubeconfig <path>', 'Path to kubeconfig file')
  .option('--context <name>', 'kubeconfig context to use')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Show debug output')
  .action(namespaces);

// Lint command
program
  .command('lint [dir]')
  .description('Run helm lint on a generated chart')
  .option('-v, --verbose', 'Show debug output')
  .action(lint);

await program.parseAsync();
