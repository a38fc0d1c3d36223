import { stringify } from 'yaml';
import type { ResourceObject } from '../types/k8s.js';
import { isRecord } from './manifest.js';

const STRINGIFY_OPTIONS = {
  indent: 2,
  lineWidth: 0,
  defaultStringType: 'PLAIN',
  defaultKeyType: 'PLAIN',
  nullStr: '',
} as const;

const TOKEN_PATTERN = /__kube2helm_tpl_(\d+)__/g;
const KEYED_TOKEN_LINE = /^((?:\s|- )*)(\S.*?): __kube2helm_tpl_(\d+)__$/;
const BLOCK_ACTION = /^\{\{-?\s*toYaml\s+(.+?)\s*-?\}\}$/;

/**
 * Serialize a value to YAML the way every chart file is written.
 * Keys keep their insertion order.
 */
export function toYaml(value: unknown): string {
  return stringify(value, STRINGIFY_OPTIONS);
}

/**
 * A Helm action placed into a manifest by the templater. Only instances
 * of this class are written as template code; every other string is
 * literal text.
 */
export class HelmAction {
  constructor(readonly expression: string) {}
}

const DELIMITERS = /\{\{|\}\}/g;

/** Literal text that Helm would read as template syntax. */
export function hasTemplateDelimiters(value: string): boolean {
  return value.includes('{{') || value.includes('}}');
}

/** Write each `{{` and `}}` as an action that prints it back. */
export function escapeTemplateDelimiters(value: string): string {
  return value.replace(DELIMITERS, (delimiter) => `{{ \`${delimiter}\` }}`);
}

/** True when the whole string is exactly one `{{ … }}` action. */
function isSingleAction(value: string): boolean {
  return value.startsWith('{{') && value.endsWith('}}') && value.indexOf('}}') === value.length - 2;
}

function renderInline(action: string): string {
  if (isSingleAction(action)) return action;
  if (!action.includes('"')) return `"${action}"`;
  return `'${action.replace(/'/g, "''")}'`;
}

/**
 * Serialize a manifest whose values may be HelmAction placeholders.
 *
 * An action that is one `{{ … }}` is emitted unquoted so Helm can produce
 * numbers and booleans. `{{ toYaml X }}` under a key becomes
 * `key: {{- toYaml X | nindent N }}`. Actions mixing literal text and
 * `{{ … }}` are quoted. Delimiters in plain strings are escaped.
 */
export function renderTemplateBody(manifest: ResourceObject): string {
  const actions: string[] = [];

  const tokenize = (value: unknown): unknown => {
    if (value instanceof HelmAction) {
      actions.push(value.expression);
      return `__kube2helm_tpl_${actions.length - 1}__`;
    }
    if (typeof value === 'string') {
      return hasTemplateDelimiters(value) ? escapeTemplateDelimiters(value) : value;
    }
    if (Array.isArray(value)) return value.map(tokenize);
    if (isRecord(value)) {
      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        out[key] = tokenize(child);
      }
      return out;
    }
    return value;
  };

  const yaml = toYaml(tokenize(manifest));
  if (actions.length === 0) return yaml;

  return yaml
    .split('\n')
    .map((line) => {
      const keyed = KEYED_TOKEN_LINE.exec(line);
      if (keyed) {
        const [, prefix, key, index] = keyed;
        const block = BLOCK_ACTION.exec(actions[Number(index)]);
        if (block) {
          return `${prefix}${key}: {{- toYaml ${block[1]} | nindent ${prefix.length + 2} }}`;
        }
      }
      return line.replace(TOKEN_PATTERN, (_match, index: string) =>
        renderInline(actions[Number(index)]),
      );
    })
    .join('\n');
}
