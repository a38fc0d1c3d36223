import { ExportAbortedError, errorMessage } from '../errors.js';
import type { ResourceFilter } from '../types/config.js';
import type { ResourceInventory } from '../types/k8s.js';
import { normalizeResourceType, SUPPORTED_RESOURCE_TYPES } from '../utils/kinds.js';
import type { Logger } from '../utils/logger.js';
import type { ResourceClient } from './client.js';

export interface CollectionResult {
  inventory: ResourceInventory;
  skippedKinds: string[];
}

/**
 * Resource types to collect: supported (or explicitly included) types,
 * minus excluded ones, sorted. Exclusion always wins.
 */
export function resolveKinds(filter: Pick<ResourceFilter, 'includeKinds' | 'excludeKinds'>): string[] {
  const base = filter.includeKinds?.length
    ? filter.includeKinds.map(normalizeResourceType)
    : [...SUPPORTED_RESOURCE_TYPES];
  const excluded = new Set((filter.excludeKinds ?? []).map(normalizeResourceType));
  return [...new Set(base)].filter((kind) => !excluded.has(kind)).sort();
}

/**
 * List every kind from the cluster. A kind whose listing fails is
 * recorded in `skippedKinds` and collection carries on.
 */
export async function collectResources(
  client: ResourceClient,
  kinds: string[],
  filter: ResourceFilter,
  logger: Logger,
  signal?: AbortSignal,
): Promise<CollectionResult> {
  const inventory: ResourceInventory = new Map();
  const skippedKinds: string[] = [];

  for (const kind of kinds) {
    if (signal?.aborted) throw new ExportAbortedError();
    logger.debug(`Collecting ${kind}`);

    let resources;
    try {
      resources = await client.list(kind, filter.namespace, filter.selector);
    } catch (err) {
      if (err instanceof ExportAbortedError) throw err;
      logger.warn(`Failed to collect ${kind}: ${errorMessage(err)}`);
      skippedKinds.push(kind);
      continue;
    }

    const allowed = filter.names?.[kind];
    if (allowed && allowed.length > 0) {
      const names = new Set(allowed);
      resources = resources.filter((r) => names.has(r.metadata.name));
    }

    if (resources.length > 0) {
      inventory.set(kind, resources);
      logger.info(`Collected ${resources.length} ${kind}`);
    } else {
      logger.debug(`No ${kind} found matching filters`);
    }
  }

  return { inventory, skippedKinds };
}
