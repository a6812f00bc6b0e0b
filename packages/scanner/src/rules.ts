import { ConfigError, MAX_SCAN_DEPTH, expandPath, type Config } from '@projpick/shared';
import { compileNameMatcher } from './matcher';
import type { GlobalDefaults, NameRules, ResolvedRuleSet, RuleSet } from './types';

/**
 * Union of an entry's names with the global ones when chaining is on.
 * Entry names come first; duplicates are dropped.
 */
export function mergeNameRules(entry: NameRules, global: NameRules, chain: boolean): NameRules {
  if (!chain) {
    return { exact: [...entry.exact], pattern: [...entry.pattern] };
  }
  return {
    exact: [...new Set([...entry.exact, ...global.exact])],
    pattern: [...new Set([...entry.pattern, ...global.pattern])],
  };
}

/**
 * Produces the fully-resolved rules the classifier runs on: effective marker
 * and ignore sets compiled once, depth validated.
 *
 * @throws ConfigError on an invalid pattern or an out-of-range depth
 */
export function resolveRuleSet(ruleSet: RuleSet, defaults: GlobalDefaults): ResolvedRuleSet {
  if (!Number.isInteger(ruleSet.depth) || ruleSet.depth < 0 || ruleSet.depth > MAX_SCAN_DEPTH) {
    throw new ConfigError(
      `Invalid depth ${ruleSet.depth}: expected an integer between 0 and ${MAX_SCAN_DEPTH}`,
    );
  }

  const markers = mergeNameRules(ruleSet.markers, defaults.markers, ruleSet.chainRootMarkers);
  const ignore = mergeNameRules(ruleSet.ignore, defaults.ignore, ruleSet.chainRootIgnore);

  return {
    paths: ruleSet.paths,
    mode: ruleSet.mode,
    markers: compileNameMatcher(markers, { wildcard: true, label: 'marker' }),
    ignore: compileNameMatcher(ignore, { label: 'ignore' }),
    depth: ruleSet.depth,
    includeIntermediatePaths: ruleSet.includeIntermediatePaths,
    yieldOnMarker: ruleSet.yieldOnMarker,
    traverseHidden: ruleSet.traverseHidden ?? defaults.traverseHidden,
  };
}

export function globalDefaultsFromConfig(config: Config): GlobalDefaults {
  return {
    markers: { exact: config.markers.exact, pattern: config.markers.pattern },
    ignore: { exact: config.ignore.exact, pattern: config.ignore.pattern },
    traverseHidden: config.markers.traverseHidden,
  };
}

/**
 * One RuleSet per include entry. Fields an entry omits fall back to the
 * top-level values; root paths have their environment variables expanded.
 */
export function ruleSetsFromConfig(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
): RuleSet[] {
  return config.include.map((entry) => ({
    paths: entry.paths.map((p) => expandPath(p, env)),
    mode: entry.mode,
    markers: { exact: entry.markers.exact, pattern: entry.markers.pattern },
    ignore: { exact: entry.ignore.exact, pattern: entry.ignore.pattern },
    depth: entry.depth ?? config.depth,
    includeIntermediatePaths: entry.includeIntermediatePaths ?? config.includeIntermediatePaths,
    yieldOnMarker: entry.yieldOnMarker ?? config.yieldOnMarker,
    chainRootMarkers: entry.markers.chainRootMarkers ?? config.markers.chainRootMarkers,
    chainRootIgnore: entry.ignore.chainRootIgnore ?? config.ignore.chainRootIgnore,
    traverseHidden: entry.traverseHidden,
  }));
}
