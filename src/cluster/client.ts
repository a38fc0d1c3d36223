import { CommandError, errorDetail, errorMessage } from '../errors.js';
import type { ResourceObject } from '../types/k8s.js';
import type { Logger } from '../utils/logger.js';
import { getPath, getRecords } from '../utils/manifest.js';
import { DEFAULT_COMMAND_TIMEOUT_MS, formatCommand, runCommand, type CommandRunner } from './exec.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryHooks, type RetryPolicy } from './retry.js';
import { parseResourceObject, resourceListSchema } from './schema.js';

/**
 * Read access to one cluster.
 */
export interface ResourceClient {
  /** Objects of a kind in a namespace, sorted by name. */
  list(kind: string, namespace: string, selector?: string): Promise<ResourceObject[]>;
  /** One object, or null when it does not exist. */
  get(kind: string, name: string, namespace: string): Promise<ResourceObject | null>;
  checkConnection(): Promise<boolean>;
  listNamespaces(): Promise<string[]>;
  /** Whether the caller may list `kind` in `namespace`. */
  canList(kind: string, namespace: string): Promise<boolean>;
  currentContext(): Promise<string | null>;
}

export interface KubectlClientOptions {
  kubeconfig?: string;
  context?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  runner?: CommandRunner;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: RetryHooks['sleep'];
  random?: RetryHooks['random'];
}

function byName(a: ResourceObject, b: ResourceObject): number {
  const x = a.metadata.name;
  const y = b.metadata.name;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * ResourceClient backed by the kubectl binary.
 */
export function createKubectlClient(options: KubectlClientOptions = {}): ResourceClient {
  const runner = options.runner ?? runCommand;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const logger = options.logger;
  // Connection and access checks retry at most once; a lower configured count still applies.
  const checkRetries = Math.min(1, policy.maxRetries);

  const globalArgs: string[] = [];
  if (options.kubeconfig) globalArgs.push('--kubeconfig', options.kubeconfig);
  if (options.context) globalArgs.push('--context', options.context);

  async function kubectl(args: string[], maxRetries = policy.maxRetries): Promise<string> {
    const fullArgs = [...globalArgs, ...args];
    const line = formatCommand('kubectl', fullArgs);
    logger?.debug(`Running ${line}`);

    const { stdout } = await withRetry(
      async (attempt) => {
        const result = await runner('kubectl', fullArgs, { timeoutMs, signal: options.signal });
        if (attempt > 0) logger?.debug(`${line} succeeded after ${attempt} retries`);
        return result;
      },
      { ...policy, maxRetries },
      {
        signal: options.signal,
        sleep: options.sleep,
        random: options.random,
        onRetry: (attempt, err, delayMs) =>
          logger?.debug(
            `Retrying ${line} in ${(delayMs / 1000).toFixed(2)}s (attempt ${attempt}/${maxRetries}): ${errorMessage(err)}`,
          ),
      },
    );
    return stdout;
  }

  function parseJson(stdout: string, args: string[]): unknown {
    try {
      return JSON.parse(stdout);
    } catch (err) {
      const line = formatCommand('kubectl', [...globalArgs, ...args]);
      throw new CommandError(
        `Failed to parse kubectl output as JSON: ${errorMessage(err)}`,
        line,
        false,
        '',
        err,
      );
    }
  }

  return {
    async list(kind, namespace, selector) {
      const args = ['get', kind, '-n', namespace];
      if (selector) args.push('-l', selector);
      args.push('-o', 'json');

      const list = resourceListSchema.safeParse(parseJson(await kubectl(args), args));
      if (!list.success) {
        throw new CommandError(
          `Expected a list from kubectl get ${kind}`,
          formatCommand('kubectl', [...globalArgs, ...args]),
        );
      }

      const resources: ResourceObject[] = [];
      list.data.items.forEach((item, index) => {
        const parsed = parseResourceObject(item);
        if (parsed.ok) {
          resources.push(parsed.resource);
        } else {
          logger?.warn(`Skipping malformed ${kind} item #${index}: ${parsed.reason}`);
        }
      });
      return resources.sort(byName);
    },

    async get(kind, name, namespace) {
      const args = ['get', kind, name, '-n', namespace, '-o', 'json'];
      let stdout: string;
      try {
        stdout = await kubectl(args);
      } catch (err) {
        if (errorDetail(err).toLowerCase().includes('not found')) return null;
        throw err;
      }
      const parsed = parseResourceObject(parseJson(stdout, args));
      if (!parsed.ok) {
        throw new CommandError(
          `Unexpected ${kind} "${name}" from kubectl: ${parsed.reason}`,
          formatCommand('kubectl', [...globalArgs, ...args]),
        );
      }
      return parsed.resource;
    },

    async checkConnection() {
      try {
        await kubectl(['cluster-info'], checkRetries);
        return true;
      } catch (err) {
        logger?.debug(`Cluster connection check failed: ${errorMessage(err)}`);
        return false;
      }
    },

    async currentContext() {
      try {
        const out = await kubectl(['config', 'current-context'], checkRetries);
        return out.trim() || null;
      } catch (err) {
        logger?.debug(`Could not read current context: ${errorMessage(err)}`);
        return null;
      }
    },

    async listNamespaces() {
      const args = ['get', 'namespaces', '-o', 'json'];
      try {
        const data = parseJson(await kubectl(args), args);
        return getRecords(data, 'items')
          .map((item) => getPath(item, ['metadata', 'name']))
          .filter((name): name is string => typeof name === 'string' && name.length > 0);
      } catch (err) {
        logger?.debug(`Namespace listing as JSON failed, retrying by name: ${errorMessage(err)}`);
        const out = await kubectl(['get', 'namespaces', '-o', 'name']);
        return out
          .split('\n')
          .map((l) => l.trim())
          .filter((l) => l.includes('/'))
          .map((l) => l.slice(l.indexOf('/') + 1));
      }
    },

    async canList(kind, namespace) {
      try {
        await kubectl(['get', kind, '-n', namespace, '--limit=1', '-o', 'name'], checkRetries);
        return true;
      } catch (err) {
        logger?.debug(`Cannot list ${kind} in ${namespace}: ${errorMessage(err)}`);
        return false;
      }
    },
  };
}
