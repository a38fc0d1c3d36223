/**
 * Base class for every failure the export pipeline raises on purpose.
 * `hint` is printed by the CLI beneath the message.
 */
export class ExportError extends Error {
  constructor(
    message: string,
    public hint?: string,
  ) {
    super(message);
    this.name = 'ExportError';
  }
}

/** A tool, the cluster or the target namespace is not usable. */
export class PrerequisiteError extends ExportError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'PrerequisiteError';
  }
}

/** An external command failed, timed out or exhausted its retries. */
export class CommandError extends ExportError {
  constructor(
    message: string,
    public command: string,
    public timedOut = false,
    public stderr = '',
    public cause?: unknown,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export class ChartExistsError extends ExportError {
  constructor(public chartPath: string) {
    super(
      `Output path "${chartPath}" already exists; exporting would overwrite it.`,
      'Pass --force to replace it, or choose a different --output directory.',
    );
    this.name = 'ChartExistsError';
  }
}

export class ChartWriteError extends ExportError {
  constructor(
    message: string,
    public path: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = 'ChartWriteError';
  }
}

export class NothingToExportError extends ExportError {
  constructor(namespace: string) {
    super(
      `No resources found to export in namespace "${namespace}".`,
      'Check --namespace, --selector, --only and --exclude.',
    );
    this.name = 'NothingToExportError';
  }
}

export class SecretPolicyError extends ExportError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'SecretPolicyError';
  }
}

export class ExportAbortedError extends ExportError {
  constructor() {
    super('Export aborted.');
    this.name = 'ExportAbortedError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * What went wrong, without the command line a CommandError message
 * carries. Classify failures on this, not on the message.
 */
export function errorDetail(err: unknown): string {
  return err instanceof CommandError ? err.stderr : errorMessage(err);
}
