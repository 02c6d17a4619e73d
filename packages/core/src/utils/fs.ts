import * as fs from 'fs';
import * as path from 'path';

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * False for anything that is not a directory, including paths that do not exist.
 */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether anything (file, directory, dangling symlink) sits at the path.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.lstat(target);
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Extension of a base name, leading dot included.
 * A dotfile with no other dot (`.env`) is all extension, unlike `path.extname`.
 */
export function fileExtension(name: string): string {
  const ext = path.extname(name);
  if (ext === '' && name.startsWith('.') && name.length > 1) {
    return name;
  }
  return ext;
}
