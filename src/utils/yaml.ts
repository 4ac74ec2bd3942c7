import * as yaml from 'js-yaml';

/**
 * Plain YAML mapping (not a list, not a scalar).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Parse a YAML document. Uses the JSON-compatible core schema so that
 * values like `2024-01-01` stay strings.
 */
export function parseYaml(content: string): unknown {
  return yaml.load(content, { schema: yaml.CORE_SCHEMA });
}
