/**
 * File Discovery
 *
 * Resolves configured scan paths to root-relative, `/`-separated source
 * files, applying extension, exclude and size filters.
 */

import { glob, escape } from 'glob';
import { stat } from 'fs/promises';
import { extname, isAbsolute, join, relative, resolve, sep } from 'path';
import { errorMessage, hasErrorCode } from '../errors.js';
import type { DocmarkConfig } from '../config/config.js';

export interface SkippedPath {
  filePath: string;
  reason: string;
}

export interface Discovery {
  files: string[];
  skipped: SkippedPath[];
}

type ScanningConfig = DocmarkConfig['scanning'];

export function toPosix(path: string): string {
  return path.split(sep).join('/');
}

function extensionGlob(extensions: string[]): string {
  if (extensions.length === 1) return `*${extensions[0]}`;
  return `*.{${extensions.map(ext => ext.slice(1)).join(',')}}`;
}

/**
 * Every eligible file under `paths` (files or directories, relative to root).
 */
export async function discoverFiles(root: string, paths: string[], scanning: ScanningConfig): Promise<Discovery> {
  const found = new Set<string>();
  const skipped: SkippedPath[] = [];
  const options = { cwd: root, ignore: scanning.exclude, nodir: true, dot: true, posix: true };

  for (const entry of paths) {
    const rel = toPosix(relative(root, resolve(root, entry)));
    if (rel.startsWith('..') || isAbsolute(rel)) {
      skipped.push({ filePath: entry, reason: 'is outside the project root' });
      continue;
    }

    let isDirectory: boolean;
    try {
      isDirectory = (await stat(join(root, rel))).isDirectory();
    } catch (error) {
      const reason = hasErrorCode(error, 'ENOENT') ? 'does not exist' : errorMessage(error);
      skipped.push({ filePath: entry, reason });
      continue;
    }

    if (isDirectory) {
      const files = `**/${extensionGlob(scanning.extensions)}`;
      const pattern = rel === '' ? files : `${escape(rel)}/${files}`;
      for (const file of await glob(pattern, options)) found.add(file);
    } else if (scanning.extensions.includes(extname(rel))) {
      for (const file of await glob(escape(rel), options)) found.add(file);
    }
  }

  const files: string[] = [];
  const limit = scanning.maxFileSizeKb * 1024;
  for (const file of [...found].sort()) {
    const { size } = await stat(join(root, file));
    if (size > limit) {
      skipped.push({ filePath: file, reason: `is larger than ${scanning.maxFileSizeKb} KB` });
      continue;
    }
    files.push(file);
  }

  return { files, skipped };
}
