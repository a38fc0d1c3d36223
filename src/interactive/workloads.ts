import * as p from '@clack/prompts';
import type { ResourceInventory, ResourceObject } from '../types/k8s.js';
import { WORKLOAD_RESOURCE_TYPES } from '../utils/kinds.js';
import { getPath, getRecords, getString } from '../utils/manifest.js';

function imageHint(workload: ResourceObject): string | undefined {
  const podSpec =
    getPath(workload, ['spec', 'jobTemplate', 'spec', 'template', 'spec']) ??
    getPath(workload, ['spec', 'template', 'spec']);
  const [container] = getRecords(podSpec, 'containers');
  return getString(container, 'image');
}

/**
 * Step 1: pick the workloads the chart is built around.
 */
export async function selectWorkloads(
  inventory: ResourceInventory,
): Promise<ResourceObject[] | symbol> {
  const workloads = WORKLOAD_RESOURCE_TYPES.flatMap((type) => inventory.get(type) ?? []);
  const byKey = new Map(workloads.map((w) => [`${w.kind}/${w.metadata.name}`, w]));

  const selected = await p.multiselect<{ value: string; label: string; hint: string | undefined }[], string>({
    message: 'Which workloads do you want to export?',
    options: [...byKey.entries()].map(([key, workload]) => ({
      value: key,
      label: key,
      hint: imageHint(workload),
    })),
    required: true,
  });
  if (p.isCancel(selected)) return selected;

  return selected.flatMap((key) => {
    const workload = byKey.get(key);
    return workload ? [workload] : [];
  });
}
