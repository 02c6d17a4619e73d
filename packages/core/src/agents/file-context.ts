import * as fs from 'fs';
import * as path from 'path';
import { fileExtension } from '../utils/fs';

/**
 * Extension and byte size of a file, as shown to the model.
 * A file that is gone by now yields an empty string.
 */
export async function describeFileMetadata(filePath: string): Promise<string> {
  try {
    const stats = await fs.promises.stat(filePath);
    return `Extension: ${fileExtension(path.basename(filePath))}, Size: ${stats.size} bytes`;
  } catch {
    return '';
  }
}

/**
 * Every subdirectory under root, relative to it, one per line.
 * Depth-first, entries sorted by name within each directory. Unreadable directories are skipped.
 * Never cached: folders created by earlier moves show up on the next call.
 */
export async function snapshotFolders(root: string): Promise<string> {
  const lines: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      lines.push(path.relative(root, fullPath));
      await walk(fullPath);
    }
  };

  await walk(root);
  return lines.map((line) => `${line}\n`).join('');
}
