import { describeError, isDriveError } from '@minidrive/shared';

export interface ErrorHandlerOptions {
  json?: boolean;
  silent?: boolean;
}

export function handleCommandError(
  error: unknown,
  action: string,
  options: ErrorHandlerOptions = {}
): never {
  if (options.json) {
    const errorResponse = {
      success: false,
      action,
      error: error instanceof Error ? error.message : String(error),
      type: isDriveError(error) ? error.type : 'error',
    };
    console.error(JSON.stringify(errorResponse));
  } else if (options.silent) {
    // exit code only
  } else if (isDriveError(error)) {
    console.error(describeError(error));
  } else if (error instanceof Error) {
    console.error(`Error ${action}: ${error.message}`);
  } else {
    console.error(`Error ${action}:`, error);
  }
  process.exit(1);
}

export function wrapCommand<T extends unknown[]>(
  action: string,
  fn: (...args: T) => Promise<void>,
  getOptions?: (...args: T) => ErrorHandlerOptions
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      const options = getOptions ? getOptions(...args) : {};
      handleCommandError(error, action, options);
    }
  };
}
