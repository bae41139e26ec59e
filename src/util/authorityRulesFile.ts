import { readFile } from 'node:fs/promises';

import { createConfigurationError } from '../errors.js';
import type { AuthorityRulesOverride } from '../types.js';

const LIST_KEYS = ['tldSuffixes', 'domains', 'keywords'] as const;

/**
 * Reads an authority rules override from JSON, e.g.
 * `{ "domains": ["nature.com"], "keywords": ["university"], "replace": false }`.
 */
export async function loadAuthorityRules(path: string): Promise<AuthorityRulesOverride> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read authority rules file: ${path}`, { path }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createConfigurationError(`Authority rules file is not valid JSON: ${path}`, { path }, { cause: error });
  }

  return parseAuthorityRules(parsed, path);
}

export function parseAuthorityRules(value: unknown, source = 'authority rules'): AuthorityRulesOverride {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw createConfigurationError(`${source} must be a JSON object.`, { source });
  }

  const override: AuthorityRulesOverride = {};

  for (const key of LIST_KEYS) {
    const entry: unknown = Reflect.get(value, key);
    if (entry === undefined) {
      continue;
    }
    if (!Array.isArray(entry) || !entry.every((item): item is string => typeof item === 'string')) {
      throw createConfigurationError(`${source}: "${key}" must be an array of strings.`, { source, key });
    }
    override[key] = entry;
  }

  const replace: unknown = Reflect.get(value, 'replace');
  if (replace !== undefined) {
    if (typeof replace !== 'boolean') {
      throw createConfigurationError(`${source}: "replace" must be a boolean.`, { source });
    }
    override.replace = replace;
  }

  return override;
}
