import { z } from 'zod';

/** Helm release names: lowercase DNS label, at most 53 characters. */
export const releaseNameSchema = z
  .string()
  .max(53, 'Release name must be at most 53 characters')
  .regex(
    /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/,
    'Release name must be lowercase alphanumerics and "-", starting and ending alphanumeric',
  );

const kubectlSchema = z.object({
  timeoutSeconds: z.number().positive().default(30),
  maxRetries: z.number().int().min(0).default(3),
  backoffBase: z.number().min(1).default(2),
});

const cleaningSchema = z.object({
  extraMetadataFields: z.array(z.string()).default([]),
  extraAnnotationPrefixes: z.array(z.string()).default([]),
  extraLabels: z.array(z.string()).default([]),
});

export const exportConfigSchema = z.object({
  release: releaseNameSchema.optional(),
  namespace: z.string().min(1).default('default'),
  outputDir: z.string().min(1).default('./generated-chart'),
  selector: z.string().optional(),
  only: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  /** Resource type → names to export. */
  names: z.record(z.string(), z.array(z.string())).default({}),
  kubeconfig: z.string().optional(),
  context: z.string().optional(),
  prefix: z.string().default(''),
  secretMode: z.enum(['include', 'skip', 'external-ref', 'encrypt']).default('include'),
  includeSecrets: z.boolean().default(false),
  includeServiceAccountSecrets: z.boolean().default(false),
  force: z.boolean().default(false),
  lint: z.boolean().default(false),
  strict: z.boolean().default(false),
  chartVersion: z.string().min(1).default('0.1.0'),
  appVersion: z.string().min(1).default('1.0.0'),
  templatize: z.boolean().default(true),
  valuesScope: z.enum(['shared', 'per-resource']).default('shared'),
  parallel: z.boolean().default(false),
  workers: z.number().int().min(1).default(4),
  kubectl: kubectlSchema.default({}),
  cleaning: cleaningSchema.default({}),
});

export type ExportConfig = z.infer<typeof exportConfigSchema>;
export type ExportConfigInput = z.input<typeof exportConfigSchema>;
