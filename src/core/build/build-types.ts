import type { Architecture } from '../../types/index.js';

export const BUILD_STEPS = [
  'resolve-build-tags',
  'clone-upstream',
  'determine-upstream-version',
  'overlay-components',
  'copy-collector-config',
  'add-dependencies',
  'package-layer',
  'collect-output'
] as const;

export type BuildStepName = (typeof BUILD_STEPS)[number];

export const BUILD_STEP_TITLES: Record<BuildStepName, string> = {
  'resolve-build-tags': 'Resolve build tags',
  'clone-upstream': 'Clone upstream repository',
  'determine-upstream-version': 'Determine upstream version',
  'overlay-components': 'Overlay custom components',
  'copy-collector-config': 'Apply collector config',
  'add-dependencies': 'Add dependencies',
  'package-layer': 'Build collector',
  'collect-output': 'Prepare output'
};

export function isBuildStepName(value: string): value is BuildStepName {
  return BUILD_STEPS.some(step => step === value);
}

export interface BuildOptions {
  distribution: string;
  architecture: Architecture;
  /** `owner/name` on GitHub. */
  upstreamRepo: string;
  upstreamRef: string;
  /** Where the finished zip is copied; relative paths resolve against the project root. */
  outputDir?: string;
  /** Skips `make set-otelcol-version` when given. */
  upstreamVersion?: string;
  /** Explicit tags; when set the distributions file is not consulted. */
  buildTags?: string[];
  /** Overrides the distribution's `config-file`. */
  configFile?: string;
  keepTemp?: boolean;
  /** Parent of the temporary upstream clone. Defaults to the OS temp dir. */
  tempParent?: string;
  /** Fail the named step with a simulated error. */
  injectErrorAt?: BuildStepName;
}

export interface BuildResult {
  distribution: string;
  architecture: Architecture;
  upstreamVersion: string;
  buildTags: string[];
  includedComponents: string[];
  modules: string[];
  configFile?: string;
  layerFile: string;
  layerFileSize: number;
  /** Set when --keep-temp left the clone in place. */
  tempDir?: string;
}
