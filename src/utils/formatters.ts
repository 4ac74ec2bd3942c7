import { relative, isAbsolute } from 'path';
import type { OutputPort } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display: relative to `cwd` when inside it,
 * absolute otherwise.
 *
 * @example
 * formatPathForDisplay('/repo/build/collector-amd64-default.zip', '/repo') // => 'build/collector-amd64-default.zip'
 * formatPathForDisplay('/tmp/otel-upstream-x1', '/repo') // => '/tmp/otel-upstream-x1'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return path;
}

/**
 * Generic table formatter for custom column layouts
 */
export function displayCustomTable<T>(
  items: T[],
  columns: Array<{
    header: string;
    width: number;
    accessor: (item: T) => string;
  }>,
  title?: string,
  output?: OutputPort
): void {
  const out = output ?? consoleOutput;
  if (title) {
    out.message(title);
    out.message('');
  }

  if (items.length === 0) {
    out.message('No items found.');
    return;
  }

  const headerLine = columns.map(col => col.header.padEnd(col.width)).join('');
  const separatorLine = columns.map(col => '-'.repeat(col.header.length).padEnd(col.width)).join('');

  out.message(headerLine);
  out.message(separatorLine);

  for (const item of items) {
    const row = columns.map(col => col.accessor(item).padEnd(col.width)).join('');
    out.message(row.trimEnd());
  }

  out.message('');
  out.message(`Total: ${items.length} items`);
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format a `label: value` block with labels padded to a common width.
 */
export function formatPropertyList(properties: Record<string, string>): string {
  const labels = Object.keys(properties);
  const width = Math.max(0, ...labels.map(label => label.length)) + 1;
  return labels.map(label => `${`${label}:`.padEnd(width)} ${properties[label]}`).join('\n');
}

/**
 * Format a count with a singular/plural noun
 */
export function formatCount(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Format file size in appropriate units (KB or MB)
 */
export function formatFileSize(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  if (mb >= 1) {
    return `${mb.toFixed(2)}MB`;
  }
  const kb = bytes / 1024;
  return `${kb.toFixed(2)}KB`;
}
