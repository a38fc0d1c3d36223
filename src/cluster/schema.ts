import { z } from 'zod';
import type { ResourceObject } from '../types/k8s.js';

const stringMapSchema = z.record(z.string(), z.string());

export const resourceObjectSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().optional(),
        labels: stringMapSchema.optional(),
        annotations: stringMapSchema.optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const resourceListSchema = z
  .object({
    items: z.array(z.unknown()).default([]),
  })
  .passthrough();

export function isResourceObject(value: unknown): value is ResourceObject {
  return resourceObjectSchema.safeParse(value).success;
}

/**
 * Validate one decoded object, or return the reason it is not a resource.
 * The object itself is returned, not zod's copy, so keys keep the order
 * kubectl printed them in.
 */
export function parseResourceObject(
  value: unknown,
): { ok: true; resource: ResourceObject } | { ok: false; reason: string } {
  if (isResourceObject(value)) return { ok: true, resource: value };
  const issue = resourceObjectSchema.safeParse(value).error?.issues[0];
  return {
    ok: false,
    reason: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'Invalid resource',
  };
}
