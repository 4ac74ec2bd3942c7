import { join } from 'path';
import { minimatch, escape as escapeGlob } from 'minimatch';

import { COMPONENT_TYPE_DIRS, DIR_PATTERNS, WILDCARD_NAME } from '../../constants/index.js';
import { WarningCodes } from '../../types/index.js';
import { copyDirectory, copyFile, ensureDir, isDirectory, listFiles } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { type DiagnosticsPort, loggerDiagnostics } from '../ports/diagnostics.js';
import { parseComponentTag } from './component-selector.js';

export type OverlayMode = 'category' | 'files';

/**
 * One unit of work for the overlay: either a whole category directory
 * (for `<domain>.<category>.all`) or the files of one named component.
 */
export interface OverlayItem {
  tag: string;
  /** Directory name under components/ and collector/lambdacomponents/. */
  categoryDir: string;
  componentName: string;
  mode: OverlayMode;
}

export interface ApplyOverlayOptions {
  /** components/ in the tools repository. */
  componentDir: string;
  /** Root of the upstream clone. */
  upstreamDir: string;
  plan: readonly OverlayItem[];
  diagnostics?: DiagnosticsPort;
}

export interface OverlayResult {
  /** Tags whose files were actually copied. */
  copied: string[];
  /** Whether components/common was copied. */
  commonCopied: boolean;
}

/**
 * Glob selecting the Go sources of a named component,
 * e.g. `*clickhouse*.go` matches clickhouse.go and clickhouse_factory.go.
 */
export function componentFilePattern(componentName: string): string {
  return `*${escapeGlob(componentName)}*.go`;
}

/**
 * Turn included component tags into overlay work items. Tags that do not
 * parse or whose category has no known directory are skipped with a warning.
 */
export function planOverlay(
  includedComponents: readonly string[],
  diagnostics: DiagnosticsPort = loggerDiagnostics
): OverlayItem[] {
  const plan: OverlayItem[] = [];

  for (const tag of includedComponents) {
    const parsed = parseComponentTag(tag);
    if (!parsed) {
      diagnostics.warn(WarningCodes.UNKNOWN_COMPONENT_TAG_FORMAT, `Invalid component tag format: ${tag}`, { tag });
      continue;
    }

    const categoryDir = Object.hasOwn(COMPONENT_TYPE_DIRS, parsed.prefix) ? COMPONENT_TYPE_DIRS[parsed.prefix] : undefined;
    if (!categoryDir) {
      diagnostics.warn(WarningCodes.UNKNOWN_COMPONENT_TAG_FORMAT, `Unknown component type: ${parsed.prefix}`, { tag });
      continue;
    }

    plan.push({
      tag,
      categoryDir,
      componentName: parsed.name,
      mode: parsed.name === WILDCARD_NAME ? 'category' : 'files'
    });
  }

  return plan;
}

/**
 * Copy planned components into the upstream clone under
 * collector/lambdacomponents/<category>/. components/common, when present,
 * always goes to collector/common. Re-running with the same plan produces
 * the same tree.
 */
export async function applyOverlay(options: ApplyOverlayOptions): Promise<OverlayResult> {
  const { componentDir, upstreamDir, plan } = options;
  const diagnostics = options.diagnostics ?? loggerDiagnostics;
  const result: OverlayResult = { copied: [], commonCopied: false };

  if (!(await isDirectory(componentDir))) {
    diagnostics.warn(
      WarningCodes.OVERLAY_SKIPPED,
      `Custom components directory not found at ${componentDir}; proceeding without overlay`,
      { path: componentDir }
    );
    return result;
  }

  const collectorDir = join(upstreamDir, DIR_PATTERNS.COLLECTOR);

  const commonDir = join(componentDir, DIR_PATTERNS.COMMON);
  if (await isDirectory(commonDir)) {
    await copyDirectory(commonDir, join(collectorDir, DIR_PATTERNS.COMMON));
    result.commonCopied = true;
  }

  for (const item of plan) {
    const sourceDir = join(componentDir, item.categoryDir);
    if (!(await isDirectory(sourceDir))) {
      diagnostics.warn(
        WarningCodes.OVERLAY_SKIPPED,
        `Component type directory not found: ${sourceDir}`,
        { tag: item.tag, path: sourceDir }
      );
      continue;
    }

    const destDir = join(collectorDir, DIR_PATTERNS.LAMBDA_COMPONENTS, item.categoryDir);

    if (item.mode === 'category') {
      await copyDirectory(sourceDir, destDir);
      logger.debug(`Copied all ${item.categoryDir} components to ${destDir}`);
      result.copied.push(item.tag);
      continue;
    }

    const pattern = componentFilePattern(item.componentName);
    const files = (await listFiles(sourceDir)).filter(file => minimatch(file, pattern));
    if (files.length === 0) {
      diagnostics.warn(
        WarningCodes.OVERLAY_SKIPPED,
        `No files found for component: ${item.tag}`,
        { tag: item.tag, pattern }
      );
      continue;
    }

    await ensureDir(destDir);
    for (const file of files) {
      await copyFile(join(sourceDir, file), join(destDir, file));
    }
    logger.debug(`Copied ${item.componentName} component files`, { files, destDir });
    result.copied.push(item.tag);
  }

  return result;
}
