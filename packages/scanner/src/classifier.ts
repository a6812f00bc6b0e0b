import path from 'node:path';
import { readEntryNames, selectChildren } from './entries';
import type { ClassifyResult, DirEntry, ScanContext } from './types';

interface DirNode {
  path: string;
  realPath: string;
  /** Real paths of this directory and every ancestor on the current branch */
  ancestry: ReadonlySet<string>;
}

function noMatch(): ClassifyResult {
  return { yields: false, paths: [] };
}

/**
 * Decides whether `dir` qualifies for the picker, directly or through a
 * qualifying descendant, and collects the qualifying paths of its subtree.
 *
 * `depth` is the number of levels below the scan root (0 for the root). The
 * root is a container: markers are only tested on directories below it.
 * Unreadable directories do not qualify.
 *
 * @throws ScanError when an entry name cannot be decoded
 */
export function classify(dir: string, depth: number, ctx: ScanContext): ClassifyResult {
  const realPath = resolveRealPath(dir, ctx) ?? dir;
  return descend({ path: dir, realPath, ancestry: new Set([realPath]) }, depth, ctx);
}

function descend(node: DirNode, depth: number, ctx: ScanContext): ClassifyResult {
  const names = readEntryNames(ctx.fs, node.path);
  if (names === undefined) {
    ctx.logger.trace(`cannot read ${node.path}, skipping`);
    return noMatch();
  }

  return ctx.rules.mode === 'file-listing'
    ? classifyFileListing(node, depth, names, ctx)
    : classifyDirectoryMarker(node, depth, names, ctx);
}

function classifyDirectoryMarker(
  node: DirNode,
  depth: number,
  names: string[],
  ctx: ScanContext,
): ClassifyResult {
  const { rules, logger } = ctx;

  const marker = depth > 0 ? names.find((name) => rules.markers.matches(name)) : undefined;
  const matched = marker !== undefined;
  if (matched) {
    logger.trace(`marker ${marker} matched in ${node.path}`);
    if (rules.yieldOnMarker) {
      return { yields: true, paths: [node.path] };
    }
  }

  if (depth >= rules.depth) {
    return matched ? { yields: true, paths: [node.path] } : noMatch();
  }

  const children = selectChildren(ctx.fs, node.path, names, rules).filter(
    (entry) => entry.kind === 'directory',
  );
  const { yields: descendantYields, paths } = descendChildren(node, children, depth, ctx);

  if (matched || (descendantYields && rules.includeIntermediatePaths)) {
    paths.push(node.path);
  }
  return { yields: matched || descendantYields, paths };
}

function classifyFileListing(
  node: DirNode,
  depth: number,
  names: string[],
  ctx: ScanContext,
): ClassifyResult {
  const { rules } = ctx;
  if (depth >= rules.depth) {
    return noMatch();
  }

  const children = selectChildren(ctx.fs, node.path, names, rules);
  const files = children.filter((entry) => entry.kind === 'file').map((entry) => entry.path);
  const directories = children.filter((entry) => entry.kind === 'directory');

  const descendants = descendChildren(node, directories, depth, ctx);
  const yields = files.length > 0 || descendants.yields;
  const paths = [...files, ...descendants.paths];

  if (yields && rules.includeIntermediatePaths) {
    paths.push(node.path);
  }
  return { yields, paths };
}

function descendChildren(
  parent: DirNode,
  children: DirEntry[],
  depth: number,
  ctx: ScanContext,
): ClassifyResult {
  let yields = false;
  const paths: string[] = [];

  for (const child of children) {
    const realPath = childRealPath(parent, child, ctx);
    if (realPath === undefined) continue;
    if (parent.ancestry.has(realPath)) {
      ctx.logger.trace(`${child.path} links back to ${realPath}, skipping`);
      continue;
    }

    const ancestry = new Set(parent.ancestry).add(realPath);
    const result = descend({ path: child.path, realPath, ancestry }, depth + 1, ctx);
    if (result.yields) {
      yields = true;
      paths.push(...result.paths);
    }
  }
  return { yields, paths };
}

function childRealPath(parent: DirNode, child: DirEntry, ctx: ScanContext): string | undefined {
  if (!child.symlink) {
    return path.join(parent.realPath, child.name);
  }
  return resolveRealPath(child.path, ctx);
}

function resolveRealPath(target: string, ctx: ScanContext): string | undefined {
  try {
    return ctx.fs.realpathSync(target);
  } catch {
    ctx.logger.trace(`cannot resolve real path of ${target}`);
    return undefined;
  }
}
