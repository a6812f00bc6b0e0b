import { describe, it, expect } from 'vitest';
import { UsageError } from '@projpick/shared';
import { resolveLogLevel } from './context';

describe('resolveLogLevel', () => {
  it('keeps the fallback without flags', () => {
    expect(resolveLogLevel({}, 'warn')).toBe('warn');
  });

  it('uses debug for --verbose', () => {
    expect(resolveLogLevel({ verbose: true }, 'warn')).toBe('debug');
  });

  it('prefers an explicit --log-level over --verbose', () => {
    expect(resolveLogLevel({ verbose: true, logLevel: 'error' }, 'warn')).toBe('error');
  });

  it('rejects unknown levels', () => {
    expect(() => resolveLogLevel({ logLevel: 'chatty' }, 'warn')).toThrow(UsageError);
    expect(() => resolveLogLevel({ logLevel: 'chatty' }, 'warn')).toThrow(
      'Invalid --log-level "chatty". Must be one of trace, debug, info, warn, error, silent.',
    );
  });
});
