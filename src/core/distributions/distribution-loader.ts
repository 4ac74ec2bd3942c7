import type { Distribution, DistributionTable } from '../../types/distribution.js';
import { DistributionConfigError, DistributionConfigNotFoundError, getErrorMessage } from '../../utils/errors.js';
import { isFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isRecord, parseYaml } from '../../utils/yaml.js';

/**
 * Load config/distributions.yaml.
 *
 * Every failure here is fatal: a missing file, unreadable YAML, an empty
 * document, a non-mapping root or a malformed entry all throw before any
 * resolution starts.
 */
export async function loadDistributions(yamlPath: string): Promise<DistributionTable> {
  if (!(await isFile(yamlPath))) {
    throw new DistributionConfigNotFoundError(yamlPath);
  }

  const content = await readTextFile(yamlPath);
  const table = parseDistributionsYaml(content, yamlPath);
  logger.debug(`Loaded ${Object.keys(table).length} distributions from ${yamlPath}`);
  return table;
}

/**
 * Parse and validate distributions YAML text. `source` only appears in messages.
 */
export function parseDistributionsYaml(content: string, source: string): DistributionTable {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new DistributionConfigError(
      `Error parsing ${source}: ${getErrorMessage(error)}`,
      { source },
      { cause: error }
    );
  }

  return parseDistributionTable(raw, source);
}

/**
 * Validate an already-parsed document into a typed table.
 */
export function parseDistributionTable(raw: unknown, source: string): DistributionTable {
  if (raw === null || raw === undefined || (isRecord(raw) && Object.keys(raw).length === 0)) {
    throw new DistributionConfigError(`${source} is empty or invalid.`, { source });
  }
  if (!isRecord(raw)) {
    throw new DistributionConfigError(
      `${source} must contain a mapping of distribution names to definitions.`,
      { source }
    );
  }

  const table: Record<string, Distribution> = {};
  for (const [name, entry] of Object.entries(raw)) {
    // `name:` with nothing under it defines nothing; lookups treat it as missing
    if (entry === null || entry === undefined) {
      logger.debug(`Skipping empty distribution entry '${name}' in ${source}`);
      continue;
    }
    table[name] = parseDistributionEntry(name, entry);
  }
  return Object.freeze(table);
}

function parseDistributionEntry(name: string, entry: unknown): Distribution {
  if (!isRecord(entry)) {
    throw new DistributionConfigError(
      `Invalid entry for distribution '${name}': Must be a mapping.`,
      { distribution: name }
    );
  }

  const distribution: Distribution = {
    name,
    buildtags: parseBuildTags(name, entry.buildtags, 'buildtags' in entry)
  };

  const base = entry.base;
  if (base !== undefined && base !== null && base !== '') {
    if (typeof base !== 'string') {
      throw new DistributionConfigError(
        `Invalid 'base' value for distribution '${name}': Must be a string.`,
        { distribution: name, field: 'base' }
      );
    }
    distribution.base = base;
  }

  const configFile = entry['config-file'];
  if (configFile !== undefined && configFile !== null) {
    if (typeof configFile !== 'string') {
      throw new DistributionConfigError(
        `Invalid 'config-file' value for distribution '${name}': Must be a string.`,
        { distribution: name, field: 'config-file' }
      );
    }
    distribution.configFile = configFile;
  }

  const description = entry.description;
  if (description !== undefined && description !== null) {
    distribution.description = String(description);
  }

  return distribution;
}

function parseBuildTags(name: string, value: unknown, declared: boolean): string[] {
  if (!declared) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DistributionConfigError(
      `Invalid 'buildtags' value for distribution '${name}': Must be a list.`,
      { distribution: name, field: 'buildtags' }
    );
  }

  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag !== 'string') {
      throw new DistributionConfigError(
        `Invalid 'buildtags' value for distribution '${name}': Must be a list of strings.`,
        { distribution: name, field: 'buildtags' }
      );
    }
    tags.push(tag);
  }
  return tags;
}
