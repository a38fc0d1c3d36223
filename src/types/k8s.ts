export interface ResourceMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  [key: string]: unknown;
}

/**
 * A live Kubernetes object as decoded from `kubectl -o json`.
 * Only the identity fields are typed; everything else is read through
 * the accessors in `utils/manifest.ts`.
 */
export interface ResourceObject {
  apiVersion: string;
  kind: string;
  metadata: ResourceMetadata;
  [key: string]: unknown;
}

export interface ExportResult {
  kind: string;
  name: string;
  /** Absolute path of the written template file. */
  path: string;
  /** Cleaned manifest before templating, kept for values derivation. */
  source?: ResourceObject;
}

export interface ExportFailure {
  kind: string;
  name: string;
  reason: string;
}

export type LintOutcome = 'passed' | 'failed' | 'skipped';

export type ExportPhase =
  | 'Init'
  | 'ValidatingPrerequisites'
  | 'CollectingResources'
  | 'Filtering'
  | 'CleaningAndTemplating'
  | 'Writing'
  | 'Finalizing'
  | 'Done'
  | 'Failed';

export interface ExportReport {
  success: boolean;
  exportedCount: number;
  failedCount: number;
  results: ExportResult[];
  failures: ExportFailure[];
  skippedKinds: string[];
  outputPath: string;
  lint: LintOutcome;
  phases: ExportPhase[];
}

/** Resources grouped by plural resource type, e.g. `deployments`. */
export type ResourceInventory = Map<string, ResourceObject[]>;
