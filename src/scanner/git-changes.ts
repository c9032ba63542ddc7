import { join, relative } from 'path';
import { simpleGit } from 'simple-git';
import { toPosix } from './file-discovery.js';

/**
 * Files git reports as modified, added, renamed or untracked, relative to
 * `root`. Deleted files and files outside `root` are left out.
 */
export async function changedFiles(root: string): Promise<string[]> {
  const git = simpleGit(root);
  const topLevel = (await git.revparse(['--show-toplevel'])).trim();
  const status = await git.status(['--untracked-files=all']);
  const deleted = new Set(status.deleted);

  return status.files
    .filter(file => !deleted.has(file.path))
    .map(file => toPosix(relative(root, join(topLevel, file.path))))
    .filter(path => !path.startsWith('..'))
    .sort();
}
