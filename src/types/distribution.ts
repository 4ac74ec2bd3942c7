/**
 * Distribution and component types.
 *
 * A distribution is a named, inheritable bundle of Go build tags describing
 * one buildable flavor of the collector layer. Components are the custom
 * collector extensions those tags switch on.
 */

/**
 * One validated entry of config/distributions.yaml.
 */
export interface Distribution {
  name: string;
  /** Name of the distribution this one inherits tags from (single parent). */
  base?: string;
  /** Tags declared directly on this entry, in file order. */
  buildtags: string[];
  /** Collector config filename under config/collector-configs/. */
  configFile?: string;
  description?: string;
}

/**
 * All distributions keyed by name. Never mutated after load.
 */
export type DistributionTable = Readonly<Record<string, Distribution>>;

/**
 * Component tag -> Go modules the component needs.
 * Key order follows the YAML file and drives selector output order.
 */
export type DependencyMapping = Readonly<Record<string, readonly string[]>>;

/**
 * A dotted component tag split into its parts,
 * e.g. `lambdacomponents.exporter.clickhouse`.
 */
export interface ComponentTag {
  tag: string;
  domain: string;
  category: string;
  /** Component name, or `all` for a category wildcard. */
  name: string;
  /** `<domain>.<category>` */
  prefix: string;
}

/**
 * Summary of a distribution for display.
 */
export interface DistributionSummary {
  name: string;
  base?: string;
  description?: string;
  configFile?: string;
  buildTags: string[];
}
