import { planFromRecord, validateSelection } from '../analyzer/selection.js';
import type { ResourceClient } from '../cluster/client.js';
import { collectResources, resolveKinds } from '../cluster/collector.js';
import type { ExportConfig } from '../config/schema.js';
import {
  ExportAbortedError,
  ExportError,
  NothingToExportError,
  PrerequisiteError,
  errorDetail,
  errorMessage,
} from '../errors.js';
import {
  assertChartPathAvailable,
  createChartSkeleton,
  createHelmLinter,
  finalizeChart,
  lintChart,
  writeManifest,
  type ChartLinter,
} from '../output/index.js';
import { cleanManifest } from '../transform/clean.js';
import { processSecret } from '../transform/secrets.js';
import { validateManifest } from '../transform/validate.js';
import type { ChartMetadata, ResourceFilter, SelectionPlan } from '../types/config.js';
import type {
  ExportFailure,
  ExportPhase,
  ExportReport,
  ExportResult,
  LintOutcome,
  ResourceInventory,
  ResourceObject,
} from '../types/k8s.js';
import { findExecutable } from '../utils/detect.js';
import type { Logger } from '../utils/logger.js';
import { templateFilename } from '../utils/names.js';
import { runPool } from '../utils/pool.js';
import { applySelection, inventorySize } from './filter.js';

export interface ExportRequest {
  config: ExportConfig;
  release: string;
  /** Names picked interactively or by `related`; limits the export when set. */
  selection?: SelectionPlan;
}

export interface ExportDependencies {
  client: ResourceClient;
  logger: Logger;
  linter?: ChartLinter;
  /** Executable lookup, PATH by default. */
  which?: (name: string) => string | null;
  signal?: AbortSignal;
  onPhase?: (phase: ExportPhase) => void;
}

interface PreparedManifest {
  kind: string;
  name: string;
  manifest: ResourceObject;
}

export function toResourceFilter(config: ExportConfig): ResourceFilter {
  return {
    namespace: config.namespace,
    selector: config.selector,
    includeKinds: config.only,
    excludeKinds: config.exclude,
    names: config.names,
  };
}

async function validatePrerequisites(
  config: ExportConfig,
  kinds: string[],
  deps: ExportDependencies,
): Promise<void> {
  const { client, logger } = deps;
  const which = deps.which ?? ((name: string) => findExecutable(name));

  if (!which('kubectl')) {
    throw new PrerequisiteError(
      'kubectl was not found on PATH.',
      'Install kubectl and make sure it is on your PATH.',
    );
  }
  if (config.lint && !deps.linter && !which('helm')) {
    throw new PrerequisiteError(
      'helm was not found on PATH but --lint was requested.',
      'Install helm, or run without --lint.',
    );
  }
  if (config.secretMode === 'encrypt' && kinds.includes('secrets')) {
    throw new PrerequisiteError(
      'Secret mode "encrypt" is not implemented.',
      'Use --secret-mode external-ref, or exclude secrets with --exclude secrets.',
    );
  }

  if (!(await client.checkConnection())) {
    throw new PrerequisiteError(
      'Cannot connect to the Kubernetes cluster.',
      'Check your kubeconfig and context with "kubectl cluster-info".',
    );
  }

  let namespaces: string[] | null = null;
  try {
    namespaces = await client.listNamespaces();
  } catch (err) {
    if (err instanceof ExportAbortedError) throw err;
    if (!errorDetail(err).toLowerCase().includes('forbidden')) {
      throw new PrerequisiteError(`Failed to list namespaces: ${errorMessage(err)}`);
    }
    logger.warn(`Not allowed to list namespaces; assuming "${config.namespace}" exists.`);
  }
  if (namespaces && !namespaces.includes(config.namespace)) {
    throw new PrerequisiteError(
      `Namespace "${config.namespace}" not found.`,
      `Available namespaces: ${namespaces.join(', ') || '(none)'}`,
    );
  }

  await assertChartPathAvailable(config.outputDir, config.force);

  for (const kind of kinds) {
    if (!(await client.canList(kind, config.namespace))) {
      logger.warn(`No access to list ${kind} in namespace ${config.namespace}.`);
    }
  }
}

function prepare(
  kind: string,
  resource: ResourceObject,
  config: ExportConfig,
  logger: Logger,
): PreparedManifest | null {
  let manifest = cleanManifest(resource, config.cleaning);

  if (manifest.kind === 'Secret') {
    const processed = processSecret(manifest, config.secretMode, logger);
    if (!processed) return null;
    manifest = processed;
  }

  const issues = validateManifest(manifest);
  if (issues.length > 0) {
    const label = `${manifest.kind}/${manifest.metadata.name}`;
    if (config.strict) throw new ExportError(`Validation failed: ${issues.join('; ')}`);
    logger.warn(`Validation issues for ${label}: ${issues.join('; ')}`);
  }

  return { kind, name: manifest.metadata.name, manifest };
}

function warnOnCollisions(items: PreparedManifest[], prefix: string, logger: Logger): void {
  const owners = new Map<string, string>();
  for (const item of items) {
    const file = templateFilename(prefix, item.manifest.kind, item.name);
    const label = `${item.manifest.kind}/${item.name}`;
    const previous = owners.get(file);
    if (previous) {
      logger.warn(`templates/${file}: ${label} overwrites ${previous}`);
    }
    owners.set(file, label);
  }
}

/**
 * Prerequisites, collection and filtering. Any error here fails the export.
 */
async function gatherInventory(
  request: ExportRequest,
  deps: ExportDependencies,
  enter: (phase: ExportPhase) => void,
): Promise<{ inventory: ResourceInventory; skippedKinds: string[] }> {
  const { config } = request;
  const filter = toResourceFilter(config);
  const kinds = resolveKinds(filter);

  enter('ValidatingPrerequisites');
  await validatePrerequisites(config, kinds, deps);
  if (deps.signal?.aborted) throw new ExportAbortedError();

  enter('CollectingResources');
  const collected = await collectResources(deps.client, kinds, filter, deps.logger, deps.signal);
  if (inventorySize(collected.inventory) === 0) throw new NothingToExportError(config.namespace);

  enter('Filtering');
  // A name allow-list is a selection: kinds it does not name are left out.
  const selection = request.selection ?? planFromRecord(config.names);
  for (const warning of validateSelection(selection, collected.inventory)) deps.logger.warn(warning);
  const inventory = applySelection(
    collected.inventory,
    selection,
    {
      includeSecrets: config.includeSecrets,
      includeServiceAccountSecrets: config.includeServiceAccountSecrets,
      namedSecrets: config.names.secrets,
    },
    deps.logger,
  );
  if (inventorySize(inventory) === 0) throw new NothingToExportError(config.namespace);

  return { inventory, skippedKinds: collected.skippedKinds };
}

/**
 * Export one namespace to a Helm chart.
 *
 * Init → ValidatingPrerequisites → CollectingResources → Filtering →
 * CleaningAndTemplating → Writing → Finalizing → Done. Prerequisite and
 * collection errors end in Failed and are thrown; per-resource errors are
 * reported in `failures`.
 */
export async function runExport(request: ExportRequest, deps: ExportDependencies): Promise<ExportReport> {
  const { config, release } = request;
  const { logger, signal } = deps;
  const phases: ExportPhase[] = [];
  const enter = (phase: ExportPhase): void => {
    phases.push(phase);
    deps.onPhase?.(phase);
    logger.debug(`Export phase: ${phase}`);
  };
  const checkAborted = (): void => {
    if (signal?.aborted) throw new ExportAbortedError();
  };

  const failures: ExportFailure[] = [];

  enter('Init');
  const { inventory, skippedKinds } = await gatherInventory(request, deps, enter).catch(
    (err: unknown) => {
      enter('Failed');
      throw err;
    },
  );

  enter('CleaningAndTemplating');
  const prepared: PreparedManifest[] = [];
  for (const [kind, resources] of inventory) {
    for (const resource of resources) {
      checkAborted();
      try {
        const item = prepare(kind, resource, config, logger);
        if (item) prepared.push(item);
      } catch (err) {
        if (err instanceof ExportAbortedError) throw err;
        const failure = { kind: resource.kind, name: resource.metadata.name, reason: errorMessage(err) };
        logger.error(`Failed to export ${failure.kind}/${failure.name}: ${failure.reason}`);
        failures.push(failure);
      }
    }
  }

  enter('Writing');
  const meta: ChartMetadata = {
    release,
    chartVersion: config.chartVersion,
    appVersion: config.appVersion,
  };
  const chartRoot = await createChartSkeleton(config.outputDir, meta, config.force, logger);
  warnOnCollisions(prepared, config.prefix, logger);

  const writeOptions = { templatize: config.templatize, template: { valuesScope: config.valuesScope } };
  const written = await runPool(prepared, config.parallel ? config.workers : 1, async (item) => {
    checkAborted();
    try {
      const result = await writeManifest(item.manifest, chartRoot, config.prefix, writeOptions);
      logger.debug(`Wrote ${item.manifest.kind}/${item.name} to ${result.path}`);
      return result;
    } catch (err) {
      if (err instanceof ExportAbortedError) throw err;
      const failure = { kind: item.manifest.kind, name: item.name, reason: errorMessage(err) };
      logger.error(`Failed to export ${failure.kind}/${failure.name}: ${failure.reason}`);
      failures.push(failure);
      return null;
    }
  });
  const results = written.filter((r): r is ExportResult => r !== null);

  enter('Finalizing');
  await finalizeChart(results, chartRoot, {
    meta,
    templatize: config.templatize,
    valuesScope: config.valuesScope,
    logger,
  });

  let lint: LintOutcome = 'skipped';
  if (config.lint) {
    const linter = deps.linter ?? createHelmLinter();
    lint = (await lintChart(chartRoot, linter, logger)) ? 'passed' : 'failed';
  }

  enter('Done');
  return {
    success: failures.length === 0,
    exportedCount: results.length,
    failedCount: failures.length,
    results,
    failures,
    skippedKinds,
    outputPath: chartRoot,
    lint,
    phases,
  };
}
