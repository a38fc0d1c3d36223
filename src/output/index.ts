import type { ChartMetadata, ValuesScope } from '../types/config.js';
import type { ExportResult } from '../types/k8s.js';
import type { Logger } from '../utils/logger.js';
import { writeSummary } from './summary.js';
import { deriveValues, finalizeChartMetadata } from './values.js';

export { assertChartPathAvailable, createChartSkeleton } from './skeleton.js';
export { writeManifest, type WriteOptions } from './writer.js';
export { createHelmLinter, lintChart, type ChartLinter } from './lint.js';

export interface FinalizeOptions {
  meta: ChartMetadata;
  templatize: boolean;
  valuesScope: ValuesScope;
  logger: Logger;
}

/**
 * Write values.yaml, the final Chart.yaml and EXPORT.md for the
 * resources that made it into the chart.
 */
export async function finalizeChart(
  results: ExportResult[],
  chartRoot: string,
  options: FinalizeOptions,
): Promise<void> {
  await deriveValues(results, chartRoot, options.meta.release, {
    templatize: options.templatize,
    valuesScope: options.valuesScope,
    logger: options.logger,
  });
  const meta = await finalizeChartMetadata(results, chartRoot, options.meta);
  options.logger.debug(`Chart.yaml: appVersion ${meta.appVersion}, ${meta.description}`);

  const summary = await writeSummary(results, chartRoot, options.meta.release);
  if (summary) options.logger.info(`Wrote export summary to ${summary}`);
}
