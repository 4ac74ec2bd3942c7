import type { ComponentTag, DependencyMapping } from '../../types/distribution.js';
import { WarningCodes } from '../../types/index.js';
import { COMPONENT_DOMAIN, WILDCARD_NAME } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { type DiagnosticsPort, loggerDiagnostics } from '../ports/diagnostics.js';

/**
 * Split `<domain>.<category>.<name>` into its parts.
 * Returns null for tags with fewer than three segments. Anything past the
 * third segment stays part of the name.
 */
export function parseComponentTag(tag: string): ComponentTag | null {
  const parts = tag.split('.');
  if (parts.length < 3 || parts.some(part => part === '')) {
    return null;
  }
  const [domain, category, ...rest] = parts;
  return {
    tag,
    domain,
    category,
    name: rest.join('.'),
    prefix: `${domain}.${category}`
  };
}

/**
 * Wildcards present in a set of active tags.
 */
interface ActiveWildcards {
  /** Domains with `<domain>.all` active. */
  globalDomains: Set<string>;
  /** `<domain>.<category>` prefixes with `<prefix>.all` active. */
  categoryPrefixes: Set<string>;
}

function collectWildcards(activeTags: Iterable<string>): ActiveWildcards {
  const globalDomains = new Set<string>();
  const categoryPrefixes = new Set<string>();

  for (const tag of activeTags) {
    const parts = tag.split('.');
    if (parts.length < 2 || parts[parts.length - 1] !== WILDCARD_NAME) {
      continue;
    }
    const prefix = parts.slice(0, -1).join('.');
    if (parts.length === 2) {
      globalDomains.add(prefix);
    } else {
      categoryPrefixes.add(prefix);
    }
  }

  return { globalDomains, categoryPrefixes };
}

/**
 * Decide which components of `dependencyMapping` are active under `activeTags`.
 *
 * A component is included when any of these hold:
 *   - its tag is itself active (direct match)
 *   - `lambdacomponents.all` is active (global wildcard, every key), or
 *     `<domain>.all` is active for the component's own domain
 *   - `<domain>.<category>.all` is active and the component's tag does not itself end in `.all`
 *     (category wildcard)
 *
 * Output order follows the mapping's key order. Keys that are not
 * `<domain>.<category>.<name>` are skipped and reported as warnings.
 */
export function resolveComponentsByTags(
  activeTags: Iterable<string>,
  dependencyMapping: DependencyMapping,
  diagnostics: DiagnosticsPort = loggerDiagnostics
): string[] {
  const active = new Set(activeTags);
  if (active.size === 0) {
    return [];
  }

  const { globalDomains, categoryPrefixes } = collectWildcards(active);
  const includeAll = globalDomains.has(COMPONENT_DOMAIN);
  const included: string[] = [];

  for (const componentTag of Object.keys(dependencyMapping)) {
    const parsed = parseComponentTag(componentTag);
    if (!parsed) {
      diagnostics.warn(
        WarningCodes.UNKNOWN_COMPONENT_TAG_FORMAT,
        `Invalid component tag format: ${componentTag}`,
        { tag: componentTag }
      );
      continue;
    }

    if (active.has(componentTag)) {
      logger.debug(`Including component (direct match): ${componentTag}`);
      included.push(componentTag);
    } else if (includeAll || globalDomains.has(parsed.domain)) {
      logger.debug(`Including component (global '${WILDCARD_NAME}' tag): ${componentTag}`);
      included.push(componentTag);
    } else if (categoryPrefixes.has(parsed.prefix) && !componentTag.endsWith(`.${WILDCARD_NAME}`)) {
      logger.debug(`Including component (category '${WILDCARD_NAME}' tag): ${componentTag} from ${parsed.prefix}.${WILDCARD_NAME}`);
      included.push(componentTag);
    }
  }

  return included;
}

/**
 * Union of the Go modules required by the included components, deduplicated
 * and sorted. This is the exact set of modules to add to the collector.
 */
export function collectModules(includedComponents: Iterable<string>, dependencyMapping: DependencyMapping): string[] {
  const modules = new Set<string>();
  for (const componentTag of includedComponents) {
    const required = Object.hasOwn(dependencyMapping, componentTag) ? dependencyMapping[componentTag] : [];
    for (const module of required) {
      modules.add(module);
    }
  }
  return [...modules].sort();
}
