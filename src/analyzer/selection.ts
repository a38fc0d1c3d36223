import type { SelectionPlan } from '../types/config.js';
import type { ResourceInventory, ResourceObject } from '../types/k8s.js';
import { resourceTypeForKind } from '../utils/kinds.js';
import { findIngressesForServices, findMatchingServices, findReferences } from './references.js';

/**
 * Add names to a plan. Empty name lists leave the plan untouched so a
 * kind is only present with at least one name.
 */
export function addToPlan(plan: SelectionPlan, kind: string, names: Iterable<string>): void {
  const list = [...names];
  if (list.length === 0) return;
  const existing = plan.get(kind) ?? new Set<string>();
  for (const name of list) existing.add(name);
  plan.set(kind, existing);
}

export function planFromRecord(record: Record<string, string[]>): SelectionPlan {
  const plan: SelectionPlan = new Map();
  for (const [kind, names] of Object.entries(record)) addToPlan(plan, kind, names);
  return plan;
}

/** Plan as a plain object with sorted keys and names. */
export function planToRecord(plan: SelectionPlan): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const kind of [...plan.keys()].sort()) {
    record[kind] = [...(plan.get(kind) ?? [])].sort();
  }
  return record;
}

export function planSize(plan: SelectionPlan): number {
  let size = 0;
  for (const names of plan.values()) size += names.size;
  return size;
}

function existing(inventory: ResourceInventory, kind: string, names: Iterable<string>): string[] {
  const present = new Set((inventory.get(kind) ?? []).map((r) => r.metadata.name));
  return [...names].filter((name) => present.has(name));
}

/**
 * Selection for a set of root workloads: the roots, the ConfigMaps,
 * Secrets, ServiceAccounts and PVCs they reference, the Services
 * selecting their pods and the Ingresses routing to those Services.
 * Referenced names missing from the inventory are left out.
 */
export function suggestSelection(
  roots: ResourceObject[],
  inventory: ResourceInventory,
): SelectionPlan {
  const plan: SelectionPlan = new Map();

  for (const root of roots) {
    addToPlan(plan, resourceTypeForKind(root.kind), [root.metadata.name]);
  }

  const refs = findReferences(roots);
  addToPlan(plan, 'configmaps', existing(inventory, 'configmaps', refs.configMaps));
  addToPlan(plan, 'secrets', existing(inventory, 'secrets', refs.secrets));
  addToPlan(plan, 'serviceaccounts', existing(inventory, 'serviceaccounts', refs.serviceAccounts));
  addToPlan(plan, 'persistentvolumeclaims', existing(inventory, 'persistentvolumeclaims', refs.pvcs));

  const services = findMatchingServices(roots, inventory.get('services') ?? []);
  addToPlan(plan, 'services', services);
  addToPlan(plan, 'ingresses', findIngressesForServices(inventory.get('ingresses') ?? [], services));

  return plan;
}

/** Warnings for selected names that are not in the inventory. */
export function validateSelection(plan: SelectionPlan, inventory: ResourceInventory): string[] {
  const warnings: string[] = [];
  for (const [kind, names] of plan) {
    const present = new Set((inventory.get(kind) ?? []).map((r) => r.metadata.name));
    for (const name of names) {
      if (!present.has(name)) warnings.push(`Selected ${kind}/${name} was not found in the namespace`);
    }
  }
  return warnings;
}
