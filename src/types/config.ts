export type SecretMode = 'include' | 'skip' | 'external-ref' | 'encrypt';

export type ValuesScope = 'shared' | 'per-resource';

export interface ResourceFilter {
  namespace: string;
  selector?: string;
  includeKinds?: string[];
  excludeKinds?: string[];
  /** Explicit allow-list of names per resource type. */
  names?: Record<string, string[]>;
}

/**
 * Resource type → names the operator wants exported.
 * A type is only present when at least one name is selected.
 */
export type SelectionPlan = Map<string, Set<string>>;

export interface CleaningOptions {
  extraMetadataFields: string[];
  extraAnnotationPrefixes: string[];
  extraLabels: string[];
}

export interface TemplateOptions {
  valuesScope: ValuesScope;
}

export interface ChartMetadata {
  release: string;
  chartVersion: string;
  appVersion: string;
}
