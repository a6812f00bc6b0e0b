import { ConfigError } from '../errors';

const VARIABLE_REFERENCE = /\$\{?([^}/]*)\}?/g;

/**
 * Expands `$NAME` and `${NAME}` references in a configured path.
 * `${}` expands to nothing. Every other referenced variable must be set.
 *
 * @example
 * ```typescript
 * expandPath('${HOME}/projects', { HOME: '/home/alice' }); // '/home/alice/projects'
 * ```
 */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  const missing: string[] = [];
  const expanded = input.replace(VARIABLE_REFERENCE, (reference: string, name: string) => {
    if (name === '') {
      return reference === '$' ? reference : '';
    }
    const value = env[name];
    if (value === undefined) {
      missing.push(name);
      return '';
    }
    return value;
  });

  if (missing.length > 0) {
    throw new ConfigError(`Environment variable ${missing[0]} is not set (in path "${input}")`, {
      details: { variables: missing },
    });
  }
  return expanded;
}
