/**
 * Backup Manager
 *
 * Append-only copies of source files taken before every mutation.
 * Names sort lexicographically in creation order:
 *   <basename>.<pathTag>.<YYYYMMDDTHHMMSSmmm>-<NNN>.bak
 * The path tag keeps files that share a basename apart.
 */

import { constants } from 'fs';
import { copyFile, mkdir, readFile, readdir, stat } from 'fs/promises';
import { basename, join } from 'path';
import { BackupFailedError, errorMessage, hasErrorCode } from '../errors.js';
import { hashContent } from '../hashing/content-hasher.js';
import { writeFileAtomic } from '../state/atomic-write.js';

const MAX_ATTEMPTS = 1000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}` +
    `T${pad(date.getUTCHours(), 2)}${pad(date.getUTCMinutes(), 2)}${pad(date.getUTCSeconds(), 2)}` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

export class BackupManager {
  private lastStamp = '';
  private sequence = 0;

  constructor(
    private readonly root: string,
    readonly backupDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Copy the current content of `filePath` (root-relative) into the backup
   * directory. Returns the backup file name.
   */
  async snapshot(filePath: string): Promise<string> {
    try {
      await mkdir(this.backupDir, { recursive: true });
    } catch (error) {
      throw new BackupFailedError(`Cannot create backup directory: ${errorMessage(error)}`, { cause: error });
    }

    const stamp = formatStamp(this.now());
    if (stamp !== this.lastStamp) {
      this.lastStamp = stamp;
      this.sequence = 0;
    }

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const backupId = `${this.prefix(filePath)}${stamp}-${pad(this.sequence++, 3)}.bak`;
      try {
        await copyFile(join(this.root, filePath), join(this.backupDir, backupId), constants.COPYFILE_EXCL);
        return backupId;
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) continue;
        throw new BackupFailedError(`Cannot back up ${filePath}: ${errorMessage(error)}`, { cause: error });
      }
    }
    throw new BackupFailedError(`Cannot back up ${filePath}: no free backup name for ${stamp}`);
  }

  /** Backup names for `filePath`, oldest first. */
  async list(filePath: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.backupDir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw error;
    }
    const prefix = this.prefix(filePath);
    return entries.filter(name => name.startsWith(prefix) && name.endsWith('.bak')).sort();
  }

  async latest(filePath: string): Promise<string | null> {
    const backups = await this.list(filePath);
    return backups.length > 0 ? backups[backups.length - 1] : null;
  }

  backupPath(backupId: string): string {
    return join(this.backupDir, backupId);
  }

  /**
   * Overwrite the live file with its most recent backup.
   * Returns false when no backup exists.
   */
  async restoreLatest(filePath: string): Promise<boolean> {
    const backupId = await this.latest(filePath);
    if (!backupId) return false;

    const target = join(this.root, filePath);
    try {
      const content = await readFile(this.backupPath(backupId));
      await writeFileAtomic(target, content, { mode: await this.modeOf(target) });
    } catch (error) {
      throw new BackupFailedError(`Cannot restore ${filePath} from ${backupId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return true;
  }

  private prefix(filePath: string): string {
    return `${basename(filePath)}.${hashContent(filePath).slice(0, 8)}.`;
  }

  private async modeOf(path: string): Promise<number | undefined> {
    try {
      return (await stat(path)).mode;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return undefined;
      throw error;
    }
  }
}
