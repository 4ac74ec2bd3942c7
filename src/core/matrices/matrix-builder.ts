import { ARCHITECTURES, DEFAULT_RELEASE_REGIONS } from '../../constants/index.js';
import type { Architecture } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

export type ArchitectureSelection = Architecture | 'all';

export interface BuildMatrix {
  architecture: Architecture[];
}

export interface ReleaseMatrix {
  architecture: Architecture[];
  'aws-region': string[];
}

export interface JobMatrices {
  build: BuildMatrix;
  release: ReleaseMatrix;
}

export function isArchitecture(value: string): value is Architecture {
  return ARCHITECTURES.some(architecture => architecture === value);
}

export function parseArchitectureSelection(value: string): ArchitectureSelection {
  if (value === 'all' || isArchitecture(value)) {
    return value;
  }
  throw new ValidationError(`Unsupported architecture '${value}'. Expected one of: all, ${ARCHITECTURES.join(', ')}`);
}

/**
 * Expand the CI inputs into build and release job matrices.
 * `all` expands to every architecture / every region in `regions`.
 */
export function prepareMatrices(
  architecture: ArchitectureSelection,
  awsRegion: string,
  regions: readonly string[] = DEFAULT_RELEASE_REGIONS
): JobMatrices {
  const architectures = architecture === 'all' ? [...ARCHITECTURES] : [architecture];

  const region = awsRegion.trim();
  if (!region) {
    throw new ValidationError('AWS region must not be empty');
  }
  const releaseRegions = region === 'all' ? [...regions] : [region];

  return {
    build: { architecture: architectures },
    release: { architecture: [...architectures], 'aws-region': releaseRegions }
  };
}
