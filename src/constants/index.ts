/**
 * Shared constants for the otel-layer CLI.
 * Single source of truth for config locations, component layout and build defaults.
 */

import type { Architecture } from '../types/index.js';

export const DIR_PATTERNS = {
  CONFIG: 'config',
  COLLECTOR_CONFIGS: 'collector-configs',
  COMPONENTS: 'components',
  COMMON: 'common',
  BUILD: 'build',
  // Inside the upstream clone
  COLLECTOR: 'collector',
  LAMBDA_COMPONENTS: 'lambdacomponents'
} as const;

export const FILE_PATTERNS = {
  DISTRIBUTIONS_YAML: 'distributions.yaml',
  COMPONENT_DEPENDENCIES_YAML: 'component_dependencies.yaml',
  COLLECTOR_CONFIG_YAML: 'config.yaml',
  VERSION: 'VERSION',
  MAKEFILE: 'Makefile'
} as const;

/**
 * Namespace of the custom components; `lambdacomponents.all` switches on
 * every component in the dependency mapping.
 */
export const COMPONENT_DOMAIN = 'lambdacomponents';

/**
 * Last segment of a wildcard build tag (`lambdacomponents.all`,
 * `lambdacomponents.exporter.all`).
 */
export const WILDCARD_NAME = 'all';

/**
 * Component tag prefix -> directory under components/ and
 * collector/lambdacomponents/.
 */
export const COMPONENT_TYPE_DIRS: Readonly<Record<string, string>> = {
  'lambdacomponents.connector': 'connector',
  'lambdacomponents.exporter': 'exporter',
  'lambdacomponents.processor': 'processor',
  'lambdacomponents.receiver': 'receiver',
  'lambdacomponents.extension': 'extension'
};

export const ARCHITECTURES: readonly Architecture[] = ['amd64', 'arm64'];

export const BUILD_DEFAULTS = {
  UPSTREAM_REPO: 'open-telemetry/opentelemetry-lambda',
  UPSTREAM_REF: 'main',
  DISTRIBUTION: 'default',
  ARCHITECTURE: 'amd64'
} as const satisfies Record<string, string>;

/**
 * Regions a release fans out to when `--aws-region all` is requested.
 */
export const DEFAULT_RELEASE_REGIONS: readonly string[] = [
  'ca-central-1',
  'ca-west-1',
  'eu-central-1',
  'eu-central-2',
  'eu-north-1',
  'eu-south-1',
  'eu-south-2',
  'eu-west-1',
  'eu-west-2',
  'eu-west-3',
  'us-east-1',
  'us-east-2',
  'us-west-2'
];

export const ENV_VARS = {
  VERBOSE: 'LAYER_TOOLS_VERBOSE',
  INJECT_ERROR: 'LAYER_TOOLS_INJECT_ERROR',
  UPSTREAM_VERSION: 'UPSTREAM_VERSION',
  BUILD_TAGS: 'BUILD_TAGS_STRING'
} as const;
