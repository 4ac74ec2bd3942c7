import { join, resolve } from 'path';
import { DIR_PATTERNS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Locations inside the tools repository, all derived from its root.
 */
export interface ProjectPaths {
  root: string;
  configDir: string;
  distributionsFile: string;
  dependenciesFile: string;
  collectorConfigsDir: string;
  componentDir: string;
  buildDir: string;
}

export function resolveProjectPaths(projectRoot: string): ProjectPaths {
  const root = resolve(projectRoot);
  const configDir = join(root, DIR_PATTERNS.CONFIG);
  return {
    root,
    configDir,
    distributionsFile: join(configDir, FILE_PATTERNS.DISTRIBUTIONS_YAML),
    dependenciesFile: join(configDir, FILE_PATTERNS.COMPONENT_DEPENDENCIES_YAML),
    collectorConfigsDir: join(configDir, DIR_PATTERNS.COLLECTOR_CONFIGS),
    componentDir: join(root, DIR_PATTERNS.COMPONENTS),
    buildDir: join(root, DIR_PATTERNS.BUILD)
  };
}
