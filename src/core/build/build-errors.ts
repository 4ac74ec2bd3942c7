import { ErrorCodes, LayerToolError } from '../../types/index.js';
import type { BuildStepName } from './build-types.js';

/**
 * A build pipeline step failed. Carries the step so the CLI can say where
 * the build stopped.
 */
export class BuildStepError extends LayerToolError {
  readonly step: BuildStepName;

  constructor(step: BuildStepName, message: string, options?: ErrorOptions) {
    super(message, ErrorCodes.BUILD_FAILED, { step }, options);
    this.name = 'BuildStepError';
    this.step = step;
  }
}
