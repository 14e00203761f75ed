/**
 * @module pipeline/extensions
 *
 * Maps file extensions to the commands that execute them.
 *
 * Key exports:
 * - {@link defaultExtensions} - Built-in extension table
 * - {@link mergeExtensions} - Defaults overridden key-by-key
 * - {@link buildInvocation} - Command tokens for one file
 */

import { UnknownExtensionError } from '../../errors.js';
import type { ExtensionMap } from '../kernel/contracts.js';

const DEFAULT_EXTENSIONS: ExtensionMap = {
  '.hql': ['hive', '-f'],
  '.py': ['python'],
  '.R': ['Rscript'],
  '.scala': ['scala'],
  '.sh': ['bash'],
};

/** Returns a fresh copy of the built-in extension table. */
export function defaultExtensions(): Record<string, string[]> {
  const copy: Record<string, string[]> = {};
  for (const [extension, tokens] of Object.entries(DEFAULT_EXTENSIONS)) {
    copy[extension] = [...tokens];
  }
  return copy;
}

/**
 * Starts from `base` (the defaults when omitted) and replaces each key that
 * `overrides` names. Keys are compared exactly; `.R` and `.r` stay distinct.
 */
export function mergeExtensions(
  overrides: ExtensionMap = {},
  base: ExtensionMap = DEFAULT_EXTENSIONS,
): Record<string, string[]> {
  const merged: Record<string, string[]> = {};
  for (const [extension, tokens] of Object.entries({ ...base, ...overrides })) {
    merged[extension] = [...tokens];
  }
  return merged;
}

/**
 * Extension of a filename: everything from its last dot, dot included.
 * Names without a dot, or whose only dot leads the name, have none.
 *
 *   extensionOf('2-build.tables.hql') → '.hql'
 *   extensionOf('3-Makefile')         → ''
 */
export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0) {
    return '';
  }
  return fileName.slice(dot);
}

/** Command tokens for `fileName`; throws {@link UnknownExtensionError} when unmapped. */
export function resolveCommand(fileName: string, extensions: ExtensionMap): readonly string[] {
  const extension = extensionOf(fileName);
  if (!Object.prototype.hasOwnProperty.call(extensions, extension)) {
    throw new UnknownExtensionError(fileName, extension);
  }
  return extensions[extension];
}

/**
 * Full invocation for a step: the extension's command followed by `target`
 * (defaults to the filename itself).
 */
export function buildInvocation(fileName: string, extensions: ExtensionMap, target: string = fileName): string[] {
  return [...resolveCommand(fileName, extensions), target];
}
