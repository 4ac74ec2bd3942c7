import type { DistributionSummary, DistributionTable } from '../../types/distribution.js';
import {
  CircularDistributionError,
  DistributionError,
  DistributionNotFoundError
} from '../../utils/errors.js';

/**
 * Resolve the final build tags of a distribution, following its `base` chain.
 *
 * The result is the sorted, deduplicated union of the base's resolved tags
 * and the distribution's own tags. `visited` holds the names being resolved
 * on the current chain; each level works on its own copy, so resolving one
 * branch never marks names for another.
 *
 * @throws DistributionError with code CIRCULAR_DEPENDENCY when the chain
 *   revisits a name, DISTRIBUTION_NOT_FOUND when a name is missing. A failure
 *   in a base is re-thrown with the name of every distribution on the way up.
 */
export function resolveBuildTags(
  distributionName: string,
  table: DistributionTable,
  visited: ReadonlySet<string> = new Set()
): string[] {
  if (visited.has(distributionName)) {
    throw new CircularDistributionError(distributionName);
  }

  const distribution = Object.hasOwn(table, distributionName) ? table[distributionName] : undefined;
  if (!distribution) {
    throw new DistributionNotFoundError(distributionName);
  }

  const chain = new Set(visited);
  chain.add(distributionName);

  let baseTags: string[] = [];
  if (distribution.base) {
    try {
      baseTags = resolveBuildTags(distribution.base, table, chain);
    } catch (error) {
      if (error instanceof DistributionError) {
        throw DistributionError.wrapBase(error, distributionName, distribution.base);
      }
      throw error;
    }
  }

  return [...new Set([...baseTags, ...distribution.buildtags])].sort();
}

/**
 * Distribution names, sorted, for CLI choices.
 */
export function getDistributionChoices(table: DistributionTable): string[] {
  return Object.keys(table).sort();
}

/**
 * Comma-joined tag string as passed to `make package` via BUILDTAGS.
 */
export function formatBuildTagsString(tags: readonly string[]): string {
  return tags.filter(Boolean).join(',');
}

/**
 * Split a comma-separated tag string (from --build-tags or BUILD_TAGS_STRING).
 */
export function parseBuildTagsString(value: string): string[] {
  return value
    .split(',')
    .map(tag => tag.trim())
    .filter(Boolean);
}

export function describeDistribution(distributionName: string, table: DistributionTable): DistributionSummary {
  const buildTags = resolveBuildTags(distributionName, table);
  const { base, description, configFile } = table[distributionName];
  const summary: DistributionSummary = { name: distributionName, buildTags };
  if (base !== undefined) summary.base = base;
  if (description !== undefined) summary.description = description;
  if (configFile !== undefined) summary.configFile = configFile;
  return summary;
}
