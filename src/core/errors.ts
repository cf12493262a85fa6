/**
 * Structured errors for the sandbox service
 * Every failure that crosses a module boundary is a SandboxError with a stable code
 */

/**
 * Error codes for different types of errors
 */
export enum ErrorCode {
  // Lifecycle errors
  PROVISION_FAILURE = 'PROVISION_FAILURE',
  ALREADY_STARTED = 'ALREADY_STARTED',
  NOT_STARTED = 'NOT_STARTED',
  TERMINATION_FAILURE = 'TERMINATION_FAILURE',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SHUTTING_DOWN = 'SHUTTING_DOWN',

  // Execution errors
  EXECUTION_TIMEOUT = 'EXECUTION_TIMEOUT',
  BUSY = 'BUSY',
  UNSUPPORTED_LANGUAGE = 'UNSUPPORTED_LANGUAGE',

  // File errors
  PATH_VIOLATION = 'PATH_VIOLATION',
  NOT_FOUND = 'NOT_FOUND',

  // Package errors
  PACKAGE_NOT_ALLOWED = 'PACKAGE_NOT_ALLOWED',
  INSTALL_FAILED = 'INSTALL_FAILED',

  // Artifact errors
  STORAGE_UPLOAD_FAILURE = 'STORAGE_UPLOAD_FAILURE',

  // Input errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Main error class for the sandbox service
 * Provides structured errors with suggestions and context
 */
export class SandboxError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    suggestions: string[] = [],
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SandboxError';
    this.code = code;
    this.suggestions = suggestions;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Format error for display
   *
   * Output format:
   *   error[CODE]: [Short, clear description]
   *
   *   hint:
   *     [Actionable suggestions]
   */
  format(colors: boolean = true): string {
    const red = colors ? '\x1b[31m' : '';
    const yellow = colors ? '\x1b[33m' : '';
    const dim = colors ? '\x1b[2m' : '';
    const reset = colors ? '\x1b[0m' : '';

    let output = `${red}error[${this.code}]${reset}: ${this.message}\n`;

    if (typeof this.context.sessionId === 'string') {
      output += `${dim}  Session: ${this.context.sessionId}${reset}\n`;
    }

    if (this.suggestions.length > 0) {
      output += `\n${yellow}hint${reset}:\n`;
      for (const suggestion of this.suggestions) {
        output += `  ${dim}${suggestion}${reset}\n`;
      }
    }

    return output;
  }

  /**
   * Create error as JSON for programmatic use
   */
  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      context: this.context,
    };
  }
}

/**
 * Raised when an execution overruns its wall-clock limit.
 * Carries whatever output was streamed before the runtime was killed.
 */
export class ExecutionTimeoutError extends SandboxError {
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly durationMs: number;

  constructor(limitMs: number, partial: { stdout: string; stderr: string; durationMs: number }) {
    super(
      `Execution exceeded the ${limitMs}ms time limit`,
      ErrorCode.EXECUTION_TIMEOUT,
      [
        'Split long-running work into smaller executions',
        'Raise SANDBOX_MAX_EXECUTION_SECONDS if the workload is expected',
      ],
      { limitMs, durationMs: partial.durationMs }
    );
    this.name = 'ExecutionTimeoutError';
    this.stdout = partial.stdout;
    this.stderr = partial.stderr;
    this.durationMs = partial.durationMs;
  }
}

export function isSandboxError(error: unknown, code?: ErrorCode): error is SandboxError {
  return error instanceof SandboxError && (code === undefined || error.code === code);
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  provisionFailure(backend: string, cause: unknown): SandboxError {
    return new SandboxError(
      `Failed to provision ${backend} sandbox: ${describe(cause)}`,
      ErrorCode.PROVISION_FAILURE,
      [
        'Check that the backend is reachable and credentials are configured',
        'Retry the request; failed sessions are not retried automatically',
      ],
      { backend },
      { cause }
    );
  },

  alreadyStarted(): SandboxError {
    return new SandboxError(
      'Runtime has already been started',
      ErrorCode.ALREADY_STARTED,
      ['Create a new runtime instead of restarting an existing one']
    );
  },

  notStarted(operation: string): SandboxError {
    return new SandboxError(
      `Runtime is not running; cannot ${operation}`,
      ErrorCode.NOT_STARTED,
      [],
      { operation }
    );
  },

  busy(operation: string): SandboxError {
    return new SandboxError(
      `Runtime is busy; ${operation} rejected`,
      ErrorCode.BUSY,
      ['Wait for the current operation to finish before submitting another'],
      { operation }
    );
  },

  unsupportedLanguage(language: string, supported: readonly string[]): SandboxError {
    return new SandboxError(
      `Unsupported language '${language}'`,
      ErrorCode.UNSUPPORTED_LANGUAGE,
      [`Supported languages: ${supported.join(', ')}`],
      { language }
    );
  },

  pathViolation(path: string, workingDirectory: string): SandboxError {
    return new SandboxError(
      `Path '${path}' escapes the working directory ${workingDirectory}`,
      ErrorCode.PATH_VIOLATION,
      ['Use a path relative to the working directory without ".." segments'],
      { path, workingDirectory }
    );
  },

  notFound(path: string, where: 'local' | 'remote'): SandboxError {
    return new SandboxError(
      `${where === 'local' ? 'Local' : 'Remote'} file not found: ${path}`,
      ErrorCode.NOT_FOUND,
      [],
      { path, where }
    );
  },

  packageNotAllowed(spec: string, allowed: readonly string[]): SandboxError {
    return new SandboxError(
      `Package '${spec}' is not in the allowed list`,
      ErrorCode.PACKAGE_NOT_ALLOWED,
      allowed.length > 0 ? [`Allowed packages: ${allowed.join(', ')}`] : ['No packages are allowed by this configuration'],
      { package: spec }
    );
  },

  installFailed(spec: string, details: string): SandboxError {
    return new SandboxError(
      `Failed to install package ${spec}: ${details}`,
      ErrorCode.INSTALL_FAILED,
      [],
      { package: spec }
    );
  },

  storageUploadFailure(key: string, cause: unknown): SandboxError {
    return new SandboxError(
      `Failed to upload artifact ${key}: ${describe(cause)}`,
      ErrorCode.STORAGE_UPLOAD_FAILURE,
      [],
      { key },
      { cause }
    );
  },

  sessionNotFound(sessionId: string): SandboxError {
    return new SandboxError(
      `Session '${sessionId}' not found`,
      ErrorCode.SESSION_NOT_FOUND,
      ['The session may have been closed or reaped after idling; create it again'],
      { sessionId }
    );
  },

  terminationFailure(sessionId: string, details: string): SandboxError {
    return new SandboxError(
      `Failed to terminate session '${sessionId}': ${details}`,
      ErrorCode.TERMINATION_FAILURE,
      ['The backend resource may need manual cleanup'],
      { sessionId }
    );
  },

  shuttingDown(): SandboxError {
    return new SandboxError(
      'Session manager is shutting down',
      ErrorCode.SHUTTING_DOWN
    );
  },

  invalidArgument(arg: string, expected: string): SandboxError {
    return new SandboxError(
      `Invalid argument: ${arg}. Expected: ${expected}`,
      ErrorCode.INVALID_ARGUMENT,
      [],
      { argument: arg, expected }
    );
  },

  configInvalid(issues: string[]): SandboxError {
    return new SandboxError(
      `Invalid sandbox configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`,
      ErrorCode.CONFIG_INVALID,
      ['Check the SANDBOX_* environment variables'],
      { issues }
    );
  },
};
