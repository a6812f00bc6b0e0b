import nodeFs from 'node:fs';
import path from 'node:path';
import { logger as defaultLogger, type Config, type Logger } from '@projpick/shared';
import { classify } from './classifier';
import { globalDefaultsFromConfig, resolveRuleSet, ruleSetsFromConfig } from './rules';
import type { GlobalDefaults, ResolvedRuleSet, RuleSet, ScanFs } from './types';

export const name = '@projpick/scanner';

export * from './types';
export { classify } from './classifier';
export { compileNameMatcher, WILDCARD } from './matcher';
export { readEntryNames, resolveEntry, selectChildren, isHidden } from './entries';
export {
  mergeNameRules,
  resolveRuleSet,
  ruleSetsFromConfig,
  globalDefaultsFromConfig,
} from './rules';

export interface ProjectScannerOptions {
  fs?: ScanFs;
  logger?: Logger;
}

export class ProjectScanner {
  private readonly fs: ScanFs;
  private readonly logger: Logger;

  constructor(options: ProjectScannerOptions = {}) {
    this.fs = options.fs ?? nodeFs;
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'scanner' });
  }

  /**
   * Scans every root of every rule set and returns the qualifying paths,
   * each once, in the order they were first found.
   *
   * All rule sets are resolved before any directory is read, so an invalid
   * pattern fails the scan up front.
   */
  scan(ruleSets: readonly RuleSet[], defaults: GlobalDefaults): string[] {
    const resolved = ruleSets.map((ruleSet) => resolveRuleSet(ruleSet, defaults));
    const output = new Set<string>();
    for (const rules of resolved) {
      for (const root of rules.paths) {
        this.scanRoot(path.resolve(root), rules, output);
      }
    }
    return [...output];
  }

  scanConfig(config: Config, env: NodeJS.ProcessEnv = process.env): string[] {
    return this.scan(ruleSetsFromConfig(config, env), globalDefaultsFromConfig(config));
  }

  private scanRoot(root: string, rules: ResolvedRuleSet, output: Set<string>): void {
    const started = Date.now();
    // The root stays browsable even when nothing below it qualifies.
    if (rules.includeIntermediatePaths) {
      output.add(root);
    }

    const result = classify(root, 0, { rules, fs: this.fs, logger: this.logger });
    for (const found of result.paths) {
      output.add(found);
    }
    this.logger.debug(
      `scanned ${root} (${rules.mode}): ${result.paths.length} paths in ${Date.now() - started}ms`,
    );
  }
}
