/**
 * Mock helpers for CLI command tests
 *
 * Capture console output and process.exit calls so command actions can run
 * inside the test process.
 */

/**
 * Mock console for capturing output in tests
 */
export interface MockConsole {
  logs: string[];
  errors: string[];
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  reset: () => void;
  getOutput: () => string;
  getErrorOutput: () => string;
}

export function createMockConsole(): MockConsole {
  const logs: string[] = [];
  const errors: string[] = [];

  return {
    logs,
    errors,
    log: (...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    },
    error: (...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    },
    reset: () => {
      logs.length = 0;
      errors.length = 0;
    },
    getOutput: () => logs.join('\n'),
    getErrorOutput: () => errors.join('\n'),
  };
}

export interface MockProcessExit {
  readonly exitCode: number | null;
  exit: (code?: number | string | null) => never;
}

/**
 * Mock process.exit to prevent tests from actually exiting
 */
export function createMockProcessExit(): MockProcessExit {
  const state: { exitCode: number | null } = { exitCode: null };

  return {
    get exitCode() { return state.exitCode; },
    exit: (code?: number | string | null): never => {
      state.exitCode = code == null ? 0 : Number(code);
      throw new Error(`process.exit(${state.exitCode})`);
    },
  };
}
