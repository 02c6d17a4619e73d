import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../errors';
import { isDirectory, pathExists } from '../utils/fs';

export type PlacementOutcome =
  | { status: 'moved'; destinationPath: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

/**
 * Mover - puts a file into `<root>/<destination>`.
 *
 * Never overwrites: a name already taken at the destination gets a ` (n)` suffix.
 * A failure leaves the source where it was.
 */
export class Mover {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async place(sourcePath: string, destination: string, preserveStructure: boolean): Promise<PlacementOutcome> {
    const name = path.basename(sourcePath);
    // join, not resolve: a leading slash stays inside the root
    const destDir = path.join(this.root, destination);
    const relative = path.relative(this.root, destDir);

    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      const reason = `destination "${destination}" is outside the watched root`;
      console.warn(`[Mover] Skipping ${name}: ${reason}`);
      return { status: 'skipped', reason };
    }

    if (preserveStructure) {
      if (!(await isDirectory(destDir))) {
        const reason = `folder ${relative} does not exist (preserve structure)`;
        console.log(`[Mover] Skipping ${name} → ${relative}: ${reason}`);
        return { status: 'skipped', reason };
      }
    } else {
      try {
        await fs.promises.mkdir(destDir, { recursive: true });
      } catch (error) {
        console.error(`[Mover] Failed to create ${destDir}: ${errorMessage(error)}`);
        return { status: 'failed', error: errorMessage(error) };
      }
    }

    try {
      const destinationPath = await freeTarget(destDir, name);
      await fs.promises.rename(sourcePath, destinationPath);
      console.log(`[Mover] Moved ${name} → ${path.relative(this.root, destinationPath)}`);
      return { status: 'moved', destinationPath };
    } catch (error) {
      console.error(`[Mover] Failed to move ${name}: ${errorMessage(error)}`);
      return { status: 'failed', error: errorMessage(error) };
    }
  }
}

/**
 * First of `name`, `stem (1).ext`, `stem (2).ext`, ... not present in dir.
 */
export async function freeTarget(dir: string, name: string): Promise<string> {
  let candidate = path.join(dir, name);
  if (!(await pathExists(candidate))) {
    return candidate;
  }

  const ext = path.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  for (let n = 1; ; n++) {
    candidate = path.join(dir, `${stem} (${n})${ext}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}
