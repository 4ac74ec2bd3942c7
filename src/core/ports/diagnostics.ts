/**
 * Diagnostics Port
 *
 * Carries non-fatal conditions (a degraded dependency file, a component tag
 * that cannot be placed) from core logic up to whoever drives it. Core code
 * recovers locally and reports here; it never throws for these.
 *
 * Implementations:
 *   - loggerDiagnostics (default): forwards to the logger at WARN level
 *   - createCollectingDiagnostics: records warnings for later display or assertions
 *   - createOutputDiagnostics: prints warnings through an OutputPort
 */

import type { WarningCodes } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from './output.js';

export interface Diagnostic {
  code: WarningCodes;
  message: string;
  details?: Record<string, unknown>;
}

export interface DiagnosticsPort {
  warn(code: WarningCodes, message: string, details?: Record<string, unknown>): void;
}

export const loggerDiagnostics: DiagnosticsPort = {
  warn(code, message, details) {
    logger.warn(message, { code, ...details });
  },
};

export interface CollectingDiagnostics extends DiagnosticsPort {
  readonly warnings: Diagnostic[];
}

export function createCollectingDiagnostics(): CollectingDiagnostics {
  const warnings: Diagnostic[] = [];
  return {
    warnings,
    warn(code, message, details) {
      warnings.push(details ? { code, message, details } : { code, message });
    },
  };
}

export function createOutputDiagnostics(output: OutputPort): DiagnosticsPort {
  return {
    warn(code, message, details) {
      logger.debug(message, { code, ...details });
      output.warn(message);
    },
  };
}

export function resolveDiagnostics(ctx?: { diagnostics?: DiagnosticsPort }): DiagnosticsPort {
  return ctx?.diagnostics ?? loggerDiagnostics;
}
