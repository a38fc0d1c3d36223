import { filterSecrets, type SecretFilterOptions } from '../transform/secrets.js';
import type { SelectionPlan } from '../types/config.js';
import type { ResourceInventory } from '../types/k8s.js';
import type { Logger } from '../utils/logger.js';

export function inventorySize(inventory: ResourceInventory): number {
  let size = 0;
  for (const resources of inventory.values()) size += resources.length;
  return size;
}

/**
 * Narrow the collected inventory to the selection plan (when one is given)
 * and apply the secret filters. Kinds left empty are removed.
 */
export function applySelection(
  inventory: ResourceInventory,
  selection: SelectionPlan | undefined,
  secretOptions: Omit<SecretFilterOptions, 'selected'> & { namedSecrets?: string[] },
  logger?: Logger,
): ResourceInventory {
  const result: ResourceInventory = new Map();

  for (const [kind, resources] of inventory) {
    let kept = resources;
    if (selection && selection.size > 0) {
      const names = selection.get(kind);
      kept = names ? kept.filter((r) => names.has(r.metadata.name)) : [];
    }

    if (kind === 'secrets') {
      const selected = new Set([...(selection?.get('secrets') ?? []), ...(secretOptions.namedSecrets ?? [])]);
      kept = filterSecrets(kept, { ...secretOptions, selected }, logger);
    }

    if (kept.length > 0) result.set(kind, kept);
  }
  return result;
}
