import * as path from 'path';
import { fileExtension } from '../utils/fs';
import { HIDDEN_FILE_PREFIX, OS_DEFAULT_IGNORED_NAMES } from './constants';

export interface IgnoreSpec {
  useOsDefaults: boolean;
  /** Base names ignored on exact match */
  exactNames: string[];
  /** Extensions with the leading dot, compared case-insensitively; a dotfile such as `.env` is its own extension */
  extensions: string[];
  /** Matched anywhere in the full path, not per segment */
  pathSubstrings: string[];
}

export const EMPTY_IGNORE_SPEC: IgnoreSpec = {
  useOsDefaults: false,
  exactNames: [],
  extensions: [],
  pathSubstrings: [],
};

/**
 * Decide whether a new path is skipped before classification.
 * Any single criterion is enough.
 */
export function shouldIgnore(filePath: string, spec: IgnoreSpec): boolean {
  const name = path.basename(filePath);

  if (name.startsWith(HIDDEN_FILE_PREFIX)) {
    return true;
  }

  if (spec.useOsDefaults && OS_DEFAULT_IGNORED_NAMES.includes(name)) {
    return true;
  }

  if (spec.exactNames.includes(name)) {
    return true;
  }

  const ext = fileExtension(name).toLowerCase();
  if (spec.extensions.some((e) => e.toLowerCase() === ext)) {
    return true;
  }

  return spec.pathSubstrings.some((needle) => filePath.includes(needle));
}
