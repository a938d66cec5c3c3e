/**
 * Command logging
 *
 * Renders a structured command for log output. Values pass through an
 * allow-list: `-e key=value` pairs and environment variables outside it are
 * printed with their value replaced by `<redacted>`.
 *
 * @example
 * formatCommandForLog({
 *   command: 'ansible-playbook',
 *   args: ['-i', 'inventory.yml', 'site.yml', '-e', 'rke2_version=v1.28.3', '-e', 'token=abc'],
 * });
 * // Returns: "ansible-playbook -i inventory.yml site.yml -e rke2_version=v1.28.3 -e token=<redacted>"
 */

import { LOG_ALLOW_LIST } from '@/config/constants';

export const REDACTED = '<redacted>';

/**
 * A command to run without a shell
 */
export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Variables added to the inherited environment */
  env?: Readonly<Record<string, string>>;
}

export interface LogAllowList {
  /** Extra-var keys whose values may be logged */
  extraVars: readonly string[];
  /** Environment variable names whose values may be logged */
  environment: readonly string[];
}

const EXTRA_VARS_FLAGS = new Set(['-e', '--extra-vars']);
const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=([\s\S]*)$/;

/**
 * Redact the value of one extra-vars argument unless its key is allowed.
 * `@file` references carry no value and are kept; anything that is not a
 * `key=value` pair (inline JSON or YAML) is redacted whole.
 */
export function sanitizeExtraVar(assignment: string, allowed: readonly string[]): string {
  if (assignment.startsWith('@')) return assignment;

  const match = ASSIGNMENT.exec(assignment);
  if (!match) return REDACTED;

  const [, key = ''] = match;
  return allowed.includes(key) ? assignment : `${key}=${REDACTED}`;
}

export function sanitizeArgs(args: readonly string[], allowList: LogAllowList): string[] {
  const sanitized: string[] = [];
  let expectExtraVars = false;

  for (const arg of args) {
    if (expectExtraVars) {
      sanitized.push(sanitizeExtraVar(arg, allowList.extraVars));
      expectExtraVars = false;
    } else if (EXTRA_VARS_FLAGS.has(arg)) {
      sanitized.push(arg);
      expectExtraVars = true;
    } else if (arg.startsWith('--extra-vars=')) {
      const value = arg.slice('--extra-vars='.length);
      sanitized.push(`--extra-vars=${sanitizeExtraVar(value, allowList.extraVars)}`);
    } else {
      sanitized.push(arg);
    }
  }

  return sanitized;
}

export function sanitizeEnvironment(
  env: Readonly<Record<string, string>>,
  allowList: LogAllowList,
): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    sanitized[name] = allowList.environment.includes(name) ? value : REDACTED;
  }
  return sanitized;
}

function quote(word: string): string {
  return /[\s'"]/.test(word) ? `'${word.replace(/'/g, `'\\''`)}'` : word;
}

/**
 * Single-line rendering: environment assignments, then the command and its
 * arguments
 */
export function formatCommandForLog(
  spec: CommandSpec,
  allowList: LogAllowList = LOG_ALLOW_LIST,
): string {
  const env = Object.entries(sanitizeEnvironment(spec.env ?? {}, allowList)).map(
    ([name, value]) => `${name}=${quote(value)}`,
  );
  const args = sanitizeArgs(spec.args, allowList).map(quote);
  return [...env, spec.command, ...args].join(' ');
}
