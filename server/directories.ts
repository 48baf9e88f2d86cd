import { promises as fs } from 'node:fs';
import type { Dirent } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { DirectoryListing } from '../src/types';
import { CaptionerError, toErrorMessage } from './errors';

const collator = new Intl.Collator(undefined, {
  numeric: true,
  sensitivity: 'base'
});

export async function listDirectories(target: string): Promise<DirectoryListing> {
  const resolved = path.resolve(target.trim() || os.homedir());

  let entries: Dirent[];
  try {
    entries = await fs.readdir(resolved, { withFileTypes: true });
  } catch (error) {
    throw new CaptionerError('not_found', `Unable to open ${resolved}: ${toErrorMessage(error)}`, { cause: error });
  }

  const directories = entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort((a, b) => collator.compare(a, b));

  const parent = path.dirname(resolved);

  return {
    path: resolved,
    parent: parent === resolved ? null : parent,
    directories
  };
}

export async function isDirectory(target: string): Promise<boolean> {
  if (!target) {
    return false;
  }

  try {
    const stat = await fs.stat(target);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
