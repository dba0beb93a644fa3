/**
 * Error Codes for reforge
 *
 * E1xx: Configuration errors - prevent the session from starting
 * E2xx: Cycle errors (hooks, build) - soft, absorbed by the orchestrator
 * E3xx: Process errors - spawn failures are soft, missing isolation is fatal
 * E4xx: Session errors - end the watch session
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  CYCLE = 'CYCLE',
  PROCESS = 'PROCESS',
  SESSION = 'SESSION',
}

export enum ErrorCode {
  // E1xx: Configuration
  E101_CONFIG_FILE_NOT_FOUND = 'E101',
  E102_INVALID_COMMAND = 'E102',
  E103_INVALID_SOURCE_FILE = 'E103',
  E104_CONFIG_SCHEMA_INVALID = 'E104',
  E105_INVALID_ARGUMENT = 'E105',

  // E2xx: Cycle
  E201_HOOK_FAILED = 'E201',
  E202_BUILD_FAILED = 'E202',
  E203_ARTIFACT_NOT_FOUND = 'E203',
  E204_BUILD_SPAWN_FAILED = 'E204',

  // E3xx: Process
  E301_SPAWN_FAILED = 'E301',
  E302_TERMINATION_TIMEOUT = 'E302',
  E303_ISOLATION_UNAVAILABLE = 'E303',

  // E4xx: Session
  E401_WATCH_SOURCE_FAILED = 'E401',
  E402_NO_WATCH_PATHS = 'E402',
  E403_RECURSIVE_SESSION = 'E403',
}

const ERROR_MESSAGES: Record<string, string> = {
  // E1xx
  E101: 'Configuration file not found',
  E102: 'Invalid command or pattern in configuration',
  E103: 'Invalid source file',
  E104: 'Configuration schema validation failed',
  E105: 'Invalid command line argument',

  // E2xx
  E201: 'Hook command failed',
  E202: 'Build command failed',
  E203: 'Built artifact could not be located',
  E204: 'Build command could not be spawned',

  // E3xx
  E301: 'Run process could not be spawned',
  E302: 'Process group did not exit within the grace window',
  E303: 'Process isolation is not available on this platform',

  // E4xx
  E401: 'File watcher failed',
  E402: 'None of the watch paths exist',
  E403: 'reforge is already supervising this process',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.CYCLE;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.PROCESS;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.SESSION;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code.toString()] || `Unknown error: ${code}`;
}

/**
 * Whether an error with this code ends the session.
 *
 * Cycle errors and spawn/termination problems are soft: the orchestrator
 * reports them and goes back to idle.
 */
export function isFatalError(code: ErrorCode): boolean {
  switch (getErrorCategory(code)) {
    case ErrorCategory.CONFIGURATION:
    case ErrorCategory.SESSION:
      return true;
    case ErrorCategory.PROCESS:
      return code === ErrorCode.E303_ISOLATION_UNAVAILABLE;
    case ErrorCategory.CYCLE:
      return false;
  }
}
