import pc from 'picocolors';
import { AppError, SelectionCancelledError } from '@projpick/shared';

export interface ErrorOutputOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Reports a failed command. A dismissed selector is not a failure worth
 * printing.
 */
export function reportError(error: unknown, options: ErrorOutputOptions = {}): void {
  if (error instanceof SelectionCancelledError) {
    return;
  }

  if (options.json) {
    console.log(
      JSON.stringify({
        error:
          error instanceof AppError
            ? { code: error.code, message: error.message, details: error.details }
            : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) },
      }),
    );
    return;
  }

  console.error(pc.red(`Error: ${(error instanceof Error && error.message) || String(error)}`));
  if (error instanceof AppError && error.details) {
    console.error(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  if (options.verbose && error instanceof Error && error.stack) {
    console.error(`\nStack Trace:\n${error.stack}`);
  } else {
    console.error('\nFor more details, run with the --verbose flag.');
  }
}
