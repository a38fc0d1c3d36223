import * as p from '@clack/prompts';
import { addToPlan } from '../analyzer/selection.js';
import type { SelectionPlan } from '../types/config.js';
import type { ResourceInventory } from '../types/k8s.js';

const RELATED_TYPES = [
  'configmaps',
  'secrets',
  'serviceaccounts',
  'persistentvolumeclaims',
  'services',
  'ingresses',
];

/**
 * Step 2: review the resources related to the chosen workloads.
 * Everything the reference scan found starts out selected.
 */
export async function selectRelated(
  inventory: ResourceInventory,
  suggested: SelectionPlan,
): Promise<SelectionPlan | symbol> {
  const options = RELATED_TYPES.flatMap((type) =>
    (inventory.get(type) ?? []).map((r) => ({
      value: `${type}/${r.metadata.name}`,
      label: `${r.kind}/${r.metadata.name}`,
      hint: suggested.get(type)?.has(r.metadata.name) ? 'referenced' : undefined,
    })),
  );

  const plan: SelectionPlan = new Map();
  if (options.length === 0) return plan;

  const initialValues = options.filter((o) => o.hint).map((o) => o.value);
  const selected = await p.multiselect({
    message: 'Which related resources should go into the chart?',
    options,
    initialValues,
    required: false,
  });
  if (p.isCancel(selected)) return selected;

  for (const value of selected) {
    const slash = value.indexOf('/');
    addToPlan(plan, value.slice(0, slash), [value.slice(slash + 1)]);
  }
  return plan;
}
