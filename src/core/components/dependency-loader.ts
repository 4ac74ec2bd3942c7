import type { DependencyMapping } from '../../types/distribution.js';
import { WarningCodes } from '../../types/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { isFile, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isRecord, isStringArray, parseYaml } from '../../utils/yaml.js';
import { type DiagnosticsPort, loggerDiagnostics } from '../ports/diagnostics.js';

/**
 * Load config/component_dependencies.yaml.
 *
 * Unlike the distributions file this one is optional: a missing file, bad
 * YAML or a missing `dependencies` mapping yields an empty mapping plus a
 * DEPENDENCY_CONFIG_DEGRADED warning. It never throws.
 */
export async function loadComponentDependencies(
  yamlPath: string,
  diagnostics: DiagnosticsPort = loggerDiagnostics
): Promise<DependencyMapping> {
  if (!(await isFile(yamlPath))) {
    diagnostics.warn(
      WarningCodes.DEPENDENCY_CONFIG_DEGRADED,
      `Component dependency file not found at ${yamlPath}; no dependencies will be added`,
      { path: yamlPath }
    );
    return {};
  }

  let content: string;
  try {
    content = await readTextFile(yamlPath);
  } catch (error) {
    diagnostics.warn(
      WarningCodes.DEPENDENCY_CONFIG_DEGRADED,
      `Could not read ${yamlPath}: ${getErrorMessage(error)}`,
      { path: yamlPath }
    );
    return {};
  }

  return parseComponentDependencies(content, yamlPath, diagnostics);
}

/**
 * Parse dependency YAML text. Values may be a single module path or a list
 * of them; both become lists. A value of any other shape keeps the component
 * (so it can still be selected) with no modules, and is reported.
 */
export function parseComponentDependencies(
  content: string,
  source: string,
  diagnostics: DiagnosticsPort = loggerDiagnostics
): DependencyMapping {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    diagnostics.warn(
      WarningCodes.DEPENDENCY_CONFIG_DEGRADED,
      `Error parsing component dependency file ${source}: ${getErrorMessage(error)}`,
      { path: source }
    );
    return {};
  }

  if (!isRecord(raw) || !isRecord(raw.dependencies)) {
    diagnostics.warn(
      WarningCodes.DEPENDENCY_CONFIG_DEGRADED,
      `Invalid format in ${source}: expected a 'dependencies' mapping`,
      { path: source }
    );
    return {};
  }

  const mapping: Record<string, readonly string[]> = {};
  for (const [componentTag, value] of Object.entries(raw.dependencies)) {
    if (typeof value === 'string') {
      mapping[componentTag] = value ? [value] : [];
    } else if (isStringArray(value)) {
      mapping[componentTag] = value.filter(Boolean);
    } else if (value === null || value === undefined) {
      mapping[componentTag] = [];
    } else {
      diagnostics.warn(
        WarningCodes.DEPENDENCY_CONFIG_DEGRADED,
        `Invalid format for tag '${componentTag}' in dependency config: expected list or string`,
        { path: source, tag: componentTag }
      );
      mapping[componentTag] = [];
    }
  }

  logger.debug(`Loaded dependency mappings for ${Object.keys(mapping).length} components from ${source}`);
  return Object.freeze(mapping);
}
