import { resolve } from 'node:path';
import * as p from '@clack/prompts';
import chalk from 'chalk';
import { planToRecord } from '../analyzer/selection.js';
import { createKubectlClient, type ResourceClient } from '../cluster/client.js';
import { collectResources, resolveKinds } from '../cluster/collector.js';
import { loadConfigFile, resolveExportConfig } from '../config/loader.js';
import { saveConfigFile } from '../config/saver.js';
import { releaseNameSchema, type ExportConfig, type ExportConfigInput } from '../config/schema.js';
import { ExportError, errorMessage } from '../errors.js';
import { runPicker } from '../interactive/wizard.js';
import { runExport, toResourceFilter } from '../pipeline/export.js';
import type { SecretMode, SelectionPlan, ValuesScope } from '../types/config.js';
import type { ExportPhase, ExportReport } from '../types/k8s.js';
import type { UnknownRecord } from '../utils/manifest.js';
import { createCliLogger, type Logger } from '../utils/logger.js';
import { normalizeResourceType } from '../utils/kinds.js';

export interface ExportOptions {
  namespace?: string;
  output?: string;
  selector?: string;
  only?: string;
  exclude?: string;
  resources?: string;
  kubeconfig?: string;
  context?: string;
  prefix?: string;
  includeSecrets?: boolean;
  includeServiceAccountSecrets?: boolean;
  secretMode?: string;
  force?: boolean;
  lint?: boolean;
  strict?: boolean;
  chartVersion?: string;
  appVersion?: string;
  templatize?: boolean;
  valuesScope?: string;
  parallel?: boolean;
  workers?: string;
  verbose?: boolean;
  interactive?: boolean;
  config?: string;
  saveConfig?: string;
}

const PHASE_LABELS: Partial<Record<ExportPhase, string>> = {
  ValidatingPrerequisites: '[1/5] Checking prerequisites...',
  CollectingResources: '[2/5] Collecting resources...',
  CleaningAndTemplating: '[3/5] Cleaning and templating manifests...',
  Writing: '[4/5] Writing chart...',
  Finalizing: '[5/5] Deriving values and summary...',
};

export function splitList(value?: string): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * `deployments/web,cm/settings` → `{ deployments: ['web'], configmaps: ['settings'] }`.
 */
export function parseResourceList(value?: string): Record<string, string[]> | undefined {
  const entries = splitList(value);
  if (!entries) return undefined;
  const names: Record<string, string[]> = {};
  for (const entry of entries) {
    const slash = entry.indexOf('/');
    if (slash <= 0 || slash === entry.length - 1) {
      throw new ExportError(`Invalid resource "${entry}"`, 'Use the form <kind>/<name>, e.g. deploy/web.');
    }
    const kind = normalizeResourceType(entry.slice(0, slash));
    names[kind] = [...(names[kind] ?? []), entry.slice(slash + 1)];
  }
  return names;
}

function parseWorkers(value?: string): number | undefined {
  if (value === undefined) return undefined;
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ExportError(`Invalid --workers value "${value}"`, 'Pass a positive integer.');
  }
  return workers;
}

const SECRET_MODES: readonly SecretMode[] = ['include', 'skip', 'external-ref', 'encrypt'];
const VALUES_SCOPES: readonly ValuesScope[] = ['shared', 'per-resource'];

function pick<T extends string>(value: string | undefined, allowed: readonly T[], flag: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (!match) {
    throw new ExportError(`Invalid ${flag} value "${value}"`, `Expected one of: ${allowed.join(', ')}.`);
  }
  return match;
}

/** CLI flags as config overrides. Flags that were not given stay undefined. */
export function optionsToOverrides(release: string | undefined, options: ExportOptions): ExportConfigInput {
  return {
    release,
    namespace: options.namespace,
    outputDir: options.output,
    selector: options.selector,
    only: splitList(options.only),
    exclude: splitList(options.exclude),
    names: parseResourceList(options.resources),
    kubeconfig: options.kubeconfig,
    context: options.context,
    prefix: options.prefix,
    secretMode: pick(options.secretMode, SECRET_MODES, '--secret-mode'),
    includeSecrets: options.includeSecrets,
    includeServiceAccountSecrets: options.includeServiceAccountSecrets,
    force: options.force,
    lint: options.lint,
    strict: options.strict,
    chartVersion: options.chartVersion,
    appVersion: options.appVersion,
    // commander always sets the negatable flag; only an explicit --no-templatize counts
    templatize: options.templatize === false ? false : undefined,
    valuesScope: pick(options.valuesScope, VALUES_SCOPES, '--values-scope'),
    parallel: options.parallel,
    workers: parseWorkers(options.workers),
  };
}

/** Config file (if any) overridden by CLI flags. */
export async function loadConfig(release: string | undefined, options: ExportOptions, logger: Logger): Promise<ExportConfig> {
  let fileConfig: UnknownRecord = {};
  if (options.config) {
    const loaded = await loadConfigFile(resolve(options.config));
    fileConfig = loaded.config;
    for (const w of loaded.warnings) logger.warn(w);
  }
  return resolveExportConfig(fileConfig, optionsToOverrides(release, options));
}

export function clientFromConfig(config: ExportConfig, logger: Logger, signal?: AbortSignal): ResourceClient {
  return createKubectlClient({
    kubeconfig: config.kubeconfig,
    context: config.context,
    timeoutMs: config.kubectl.timeoutSeconds * 1000,
    retry: { maxRetries: config.kubectl.maxRetries, backoffBase: config.kubectl.backoffBase },
    logger,
    signal,
  });
}

function printReport(report: ExportReport, release: string): void {
  console.log('');
  if (report.success) {
    console.log(chalk.green('Export complete!'));
  } else {
    console.log(chalk.yellow('Export finished with errors.'));
  }
  console.log(`Exported: ${chalk.bold(String(report.exportedCount))}`);
  if (report.failedCount > 0) {
    console.log(`Failed:   ${chalk.red(String(report.failedCount))}`);
    for (const f of report.failures) {
      console.log(`  ${chalk.red('✗')} ${f.kind}/${f.name}: ${f.reason}`);
    }
  }
  if (report.skippedKinds.length > 0) {
    console.log(`Skipped kinds: ${chalk.yellow(report.skippedKinds.join(', '))}`);
  }
  if (report.lint !== 'skipped') {
    const lint = report.lint === 'passed' ? chalk.green('passed') : chalk.red('failed');
    console.log(`Helm lint: ${lint}`);
  }
  console.log(`Chart:    ${chalk.cyan(report.outputPath)}`);
  console.log('');
  console.log(`Install with: ${chalk.bold(`helm install ${release} ${report.outputPath}`)}`);
}

/** Print an error with its remediation hint and flag the process as failed. */
export function reportError(err: unknown): void {
  p.log.error(errorMessage(err));
  if (err instanceof ExportError && err.hint) {
    p.log.message(chalk.dim(err.hint));
  }
  process.exitCode = 1;
}

async function pickInteractively(
  config: ExportConfig,
  client: ResourceClient,
  logger: Logger,
  signal: AbortSignal,
): Promise<{ release: string; selection: SelectionPlan } | null> {
  const filter = toResourceFilter(config);
  const s = p.spinner();
  s.start('Listing resources...');
  const { inventory } = await collectResources(client, resolveKinds(filter), filter, logger, signal);
  s.stop('Resources listed');
  return runPicker(inventory, config.release);
}

export async function exportChart(release: string | undefined, options: ExportOptions): Promise<void> {
  const logger = createCliLogger(options.verbose);
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const config = await loadConfig(release, options, logger);
    const client = clientFromConfig(config, logger, controller.signal);

    let releaseName = config.release;
    let selection: SelectionPlan | undefined;
    if (options.interactive) {
      const picked = await pickInteractively(config, client, logger, controller.signal);
      if (!picked) return;
      releaseName = picked.release;
      selection = picked.selection;
    }

    if (!releaseName) {
      throw new ExportError('No release name given.', 'Pass it as the first argument, or use --interactive.');
    }
    const valid = releaseNameSchema.safeParse(releaseName);
    if (!valid.success) {
      throw new ExportError(`Invalid release name "${releaseName}": ${valid.error.issues[0]?.message}`);
    }

    const effective: ExportConfig = {
      ...config,
      release: releaseName,
      names: selection ? planToRecord(selection) : config.names,
    };

    if (options.saveConfig) {
      await saveConfigFile(effective, resolve(options.saveConfig));
      p.log.info(`Saved config to ${options.saveConfig}`);
    }

    const s = p.spinner();
    let spinning = false;
    const stopSpinner = (message: string): void => {
      if (spinning) s.stop(message);
      spinning = false;
    };
    const report = await runExport(
      { config: effective, release: releaseName, selection },
      {
        client,
        logger,
        signal: controller.signal,
        onPhase: (phase) => {
          stopSpinner(phase === 'Failed' ? 'Failed' : 'Done');
          const label = PHASE_LABELS[phase];
          if (label && !options.verbose) {
            s.start(label);
            spinning = true;
          }
        },
      },
    ).catch((err: unknown) => {
      stopSpinner('Failed');
      throw err;
    });

    printReport(report, releaseName);
    if (!report.success) process.exitCode = 1;
  } catch (err) {
    reportError(err);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
