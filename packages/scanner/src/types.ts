import type { Logger, TraversalMode } from '@projpick/shared';

export type { TraversalMode };

/**
 * Exact names plus regular-expression patterns, as written in configuration.
 */
export interface NameRules {
  exact: readonly string[];
  pattern: readonly string[];
}

/**
 * One include entry of the configuration with every default filled in.
 * Immutable for the duration of a scan.
 */
export interface RuleSet {
  /** Roots to scan, with environment variables already expanded */
  paths: readonly string[];
  mode: TraversalMode;
  markers: NameRules;
  ignore: NameRules;
  /** Maximum number of directory levels below a root */
  depth: number;
  includeIntermediatePaths: boolean;
  yieldOnMarker: boolean;
  chainRootMarkers: boolean;
  chainRootIgnore: boolean;
  /** Falls back to GlobalDefaults.traverseHidden when unset */
  traverseHidden?: boolean;
}

/**
 * Root-level markers and ignore lists, merged into a RuleSet when it chains them.
 */
export interface GlobalDefaults {
  markers: NameRules;
  ignore: NameRules;
  traverseHidden: boolean;
}

export interface NameMatcher {
  matches(name: string): boolean;
}

/**
 * A RuleSet after merging with GlobalDefaults and compiling its patterns.
 * This is the only input the classifier consults.
 */
export interface ResolvedRuleSet {
  paths: readonly string[];
  mode: TraversalMode;
  markers: NameMatcher;
  ignore: NameMatcher;
  depth: number;
  includeIntermediatePaths: boolean;
  yieldOnMarker: boolean;
  traverseHidden: boolean;
}

export type EntryKind = 'file' | 'directory' | 'other' | 'unreadable';

/**
 * A directory entry with symlinks followed to their target's type.
 */
export interface DirEntry {
  name: string;
  path: string;
  kind: EntryKind;
  symlink: boolean;
}

export interface EntryStats {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

/**
 * The synchronous filesystem calls the classifier makes. `node:fs` satisfies it.
 */
export interface ScanFs {
  readdirSync(path: string, options: { encoding: 'buffer' }): Buffer[];
  lstatSync(path: string): EntryStats;
  statSync(path: string): EntryStats;
  realpathSync(path: string): string;
}

export interface ScanContext {
  rules: ResolvedRuleSet;
  fs: ScanFs;
  logger: Logger;
}

/**
 * Outcome of classifying one directory: whether it qualifies (directly or via
 * a descendant) and the qualifying paths found in its subtree, descendants first.
 */
export interface ClassifyResult {
  yields: boolean;
  paths: string[];
}
