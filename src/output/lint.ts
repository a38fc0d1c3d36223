import { runCommand, type CommandRunner } from '../cluster/exec.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export const HELM_LINT_TIMEOUT_MS = 60_000;

export interface LintResult {
  ok: boolean;
  output: string;
}

export interface ChartLinter {
  lint(chartRoot: string): Promise<LintResult>;
}

/** Linter running `helm lint <chart>`. */
export function createHelmLinter(
  runner: CommandRunner = runCommand,
  timeoutMs = HELM_LINT_TIMEOUT_MS,
): ChartLinter {
  return {
    async lint(chartRoot) {
      try {
        const { stdout } = await runner('helm', ['lint', chartRoot], { timeoutMs });
        return { ok: true, output: stdout };
      } catch (err) {
        return { ok: false, output: errorMessage(err) };
      }
    },
  };
}

/**
 * Lint the chart. Advisory: failures are logged, never thrown.
 */
export async function lintChart(chartRoot: string, linter: ChartLinter, logger: Logger): Promise<boolean> {
  logger.info(`Running helm lint on ${chartRoot}`);
  let result: LintResult;
  try {
    result = await linter.lint(chartRoot);
  } catch (err) {
    logger.error(`Unexpected error running helm lint: ${errorMessage(err)}`);
    return false;
  }

  if (result.ok) {
    logger.info('Helm lint passed');
    if (result.output) logger.debug(`Lint output: ${result.output.trim()}`);
  } else {
    logger.error(`Helm lint failed: ${result.output.trim()}`);
  }
  return result.ok;
}
