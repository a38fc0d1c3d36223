import * as p from '@clack/prompts';
import { addToPlan, suggestSelection } from '../analyzer/selection.js';
import { releaseNameSchema } from '../config/schema.js';
import type { SelectionPlan } from '../types/config.js';
import type { ResourceInventory } from '../types/k8s.js';
import { resourceTypeForKind } from '../utils/kinds.js';
import { selectWorkloads } from './workloads.js';
import { selectRelated } from './related.js';

export interface PickerResult {
  release: string;
  selection: SelectionPlan;
}

/**
 * Ask for a release name. Returns the symbol on cancel.
 */
export async function promptReleaseName(initial?: string): Promise<string | symbol> {
  return p.text({
    message: 'Release name',
    placeholder: 'my-app',
    initialValue: initial ?? '',
    validate: (value) => {
      const parsed = releaseNameSchema.safeParse(value);
      return parsed.success ? undefined : parsed.error.issues[0]?.message;
    },
  });
}

/**
 * Run the interactive picker: workloads, then the resources related
 * to them, then the release name if it was not given.
 */
export async function runPicker(
  inventory: ResourceInventory,
  release?: string,
): Promise<PickerResult | null> {
  p.intro('kube2helm: Kubernetes namespace → Helm chart');

  // Step 1: Workloads
  const workloads = await selectWorkloads(inventory);
  if (p.isCancel(workloads)) {
    p.cancel('Export cancelled.');
    return null;
  }

  // Step 2: Related resources
  const suggested = suggestSelection(workloads, inventory);
  const related = await selectRelated(inventory, suggested);
  if (p.isCancel(related)) {
    p.cancel('Export cancelled.');
    return null;
  }

  const selection: SelectionPlan = new Map(related);
  for (const workload of workloads) {
    addToPlan(selection, resourceTypeForKind(workload.kind), [workload.metadata.name]);
  }

  // Step 3: Release name
  let name = release;
  if (!name) {
    const answer = await promptReleaseName();
    if (p.isCancel(answer)) {
      p.cancel('Export cancelled.');
      return null;
    }
    name = answer;
  }

  p.outro(`Selected ${workloads.length} workload(s) for release ${name}`);
  return { release: name, selection };
}
