import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import * as p from '@clack/prompts';
import { PrerequisiteError } from '../errors.js';
import { createHelmLinter, lintChart } from '../output/index.js';
import { findExecutable } from '../utils/detect.js';
import { createCliLogger } from '../utils/logger.js';
import { reportError } from './export.js';

export interface LintOptions {
  verbose?: boolean;
}

export async function lint(dir: string | undefined, options: LintOptions): Promise<void> {
  const logger = createCliLogger(options.verbose);
  const chartRoot = resolve(dir ?? './generated-chart');

  try {
    if (!findExecutable('helm')) {
      throw new PrerequisiteError('helm was not found on PATH.', 'Install helm to lint charts.');
    }
    try {
      await access(join(chartRoot, 'Chart.yaml'));
    } catch {
      p.log.warn(`No Chart.yaml found in ${chartRoot}`);
      process.exitCode = 1;
      return;
    }

    if (!(await lintChart(chartRoot, createHelmLinter(), logger))) process.exitCode = 1;
  } catch (err) {
    reportError(err);
  }
}
