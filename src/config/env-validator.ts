/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for missing required keys
 * and malformed values. No secret value is ever included in the output.
 */

import cron from 'node-cron';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeyFormat, ConfigKeySpec } from './env-schema.js';
import { ConfigurationError } from '../core/errors.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the relay is configured well enough to start. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  /** ISO-8601 timestamp of the validation run. */
  validatedAt: string;
}

export type EnvSource = Record<string, string | undefined>;

// ── Internal helpers ─────────────────────────────────────────────────────────

const CHAT_PATTERN = /^(-?\d+|@[A-Za-z][A-Za-z0-9_]{3,31})$/;
const BOOLEAN_VALUES = new Set(['true', 'false', '1', '0', 'yes', 'no']);

function readValue(env: EnvSource, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Returns a problem description, or null when the value has the expected shape. */
function checkFormat(format: ConfigKeyFormat, value: string): string | null {
  switch (format) {
    case 'chat':
      return CHAT_PATTERN.test(value) ? null : 'must be a numeric chat id or an @username';
    case 'boolean':
      return BOOLEAN_VALUES.has(value.toLowerCase()) ? null : "must be 'true' or 'false'";
    case 'non_negative_number': {
      const parsed = Number(value);
      return Number.isFinite(parsed) && parsed >= 0 ? null : 'must be a non-negative number';
    }
    case 'positive_integer': {
      const parsed = Number(value);
      return Number.isInteger(parsed) && parsed > 0 ? null : 'must be a positive integer';
    }
    case 'non_negative_integer': {
      const parsed = Number(value);
      return Number.isInteger(parsed) && parsed >= 0 ? null : 'must be a non-negative integer';
    }
    case 'cron':
      return cron.validate(value) ? null : 'must be a valid cron expression';
    case 'text':
      return null;
  }
}

function describeValue(spec: ConfigKeySpec, value: string): string {
  return spec.type === 'secret' ? '' : `, got '${value}'`;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate an environment against {@link CONFIG_SCHEMA}.
 *
 * @param env - Environment to inspect. Defaults to `process.env`.
 * @param now - Injectable clock for `validatedAt`.
 */
export function validateRuntimeConfig(
  env: EnvSource = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const value = readValue(env, spec.key);

    if (value === undefined) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is missing. ${spec.description}`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);

    const problem = checkFormat(spec.format, value);
    if (problem) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: `${spec.key} ${problem}${describeValue(spec, value)}.`,
        remediation: spec.remediation,
      });
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Validate and throw when the relay must not start.
 *
 * @throws ConfigurationError listing every issue; never exposes secret values.
 */
export function assertRuntimeConfig(
  env: EnvSource = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(env, now);
  if (!result.ok) {
    throw new ConfigurationError(result.issues.map((issue) => issue.message));
  }
  return result;
}
