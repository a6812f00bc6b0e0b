import path from 'node:path';
import { TextDecoder } from 'node:util';
import { ScanError } from '@projpick/shared';
import type { DirEntry, EntryKind, ResolvedRuleSet, ScanFs } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads the names in a directory, sorted by code unit.
 * Returns undefined when the directory cannot be read.
 *
 * @throws ScanError when a name is not valid UTF-8
 */
export function readEntryNames(fs: ScanFs, dir: string): string[] | undefined {
  let raw: Buffer[];
  try {
    raw = fs.readdirSync(dir, { encoding: 'buffer' });
  } catch {
    return undefined;
  }

  return raw
    .map((name) => {
      try {
        return utf8.decode(name);
      } catch (error: unknown) {
        throw new ScanError(`Entry name in ${dir} is not valid UTF-8: ${name.toString('hex')}`, {
          cause: error,
          details: { directory: dir, nameHex: name.toString('hex') },
        });
      }
    })
    .sort();
}

/**
 * Resolves an entry to its target's type. Broken links, link loops and
 * entries that cannot be stat'ed are `unreadable`.
 */
export function resolveEntry(fs: ScanFs, dir: string, name: string): DirEntry {
  const entryPath = path.join(dir, name);
  let symlink = false;
  let kind: EntryKind;
  try {
    let stats = fs.lstatSync(entryPath);
    if (stats.isSymbolicLink()) {
      symlink = true;
      stats = fs.statSync(entryPath);
    }
    kind = stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : 'other';
  } catch {
    kind = 'unreadable';
  }
  return { name, path: entryPath, kind, symlink };
}

export function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/**
 * The child-filtering step shared by both traversal modes: drops ignored
 * names and, unless hidden traversal is on, dot-names; then resolves types
 * and keeps only files and directories.
 */
export function selectChildren(
  fs: ScanFs,
  dir: string,
  names: readonly string[],
  rules: ResolvedRuleSet,
): DirEntry[] {
  const children: DirEntry[] = [];
  for (const name of names) {
    if (rules.ignore.matches(name)) continue;
    if (!rules.traverseHidden && isHidden(name)) continue;

    const entry = resolveEntry(fs, dir, name);
    if (entry.kind === 'directory' || entry.kind === 'file') {
      children.push(entry);
    }
  }
  return children;
}
