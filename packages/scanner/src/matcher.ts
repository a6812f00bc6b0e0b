import { ConfigError } from '@projpick/shared';
import type { NameMatcher, NameRules } from './types';

export const WILDCARD = '*';

export interface CompileOptions {
  /** Treat an exact `*` as "matches every name" (markers only) */
  wildcard?: boolean;
  /** Used in error messages, e.g. "markers" or "ignore" */
  label?: string;
}

class CompiledNameMatcher implements NameMatcher {
  constructor(
    private readonly exact: ReadonlySet<string>,
    private readonly patterns: readonly RegExp[],
    private readonly matchesAll: boolean,
  ) {}

  matches(name: string): boolean {
    if (this.matchesAll || this.exact.has(name)) {
      return true;
    }
    return this.patterns.some((pattern) => pattern.test(name));
  }
}

/**
 * Builds a matcher answering "is this name in the exact set, or does it match
 * any of the patterns". Each pattern is compiled on its own, once.
 *
 * @throws ConfigError when a pattern is not a valid regular expression
 */
export function compileNameMatcher(rules: NameRules, options: CompileOptions = {}): NameMatcher {
  const label = options.label ?? 'pattern';
  const patterns = rules.pattern.map((source) => {
    try {
      return new RegExp(source);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid ${label} pattern "${source}": ${reason}`, {
        cause: error,
        details: { pattern: source },
      });
    }
  });
  const exact = new Set(rules.exact);
  const matchesAll = options.wildcard === true && exact.has(WILDCARD);

  return new CompiledNameMatcher(exact, patterns, matchesAll);
}
