export class LoadTestError extends Error {
  readonly code: string;
  readonly suggestion?: string;

  constructor(message: string, code: string, suggestion?: string) {
    super(message);
    this.name = 'LoadTestError';
    this.code = code;
    this.suggestion = suggestion;
  }
}

/** Invalid run configuration, rate pattern or workload weights. Raised before any dispatch. */
export class ConfigurationError extends LoadTestError {
  constructor(message: string, suggestion?: string) {
    super(message, 'CONFIGURATION_ERROR', suggestion);
    this.name = 'ConfigurationError';
  }
}

/** API misuse, e.g. calling run() twice or mutating a test that already started. */
export class StateError extends LoadTestError {
  constructor(message: string) {
    super(message, 'STATE_ERROR');
    this.name = 'StateError';
  }
}

export class WorkloadTimeoutError extends LoadTestError {
  readonly timeoutMs: number;

  constructor(workload: string, timeoutMs: number) {
    super(`Workload "${workload}" exceeded its ${timeoutMs}ms timeout`, 'TIMEOUT');
    this.name = 'WorkloadTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface ErrorHint {
  pattern: RegExp;
  message: string;
  suggestion: string;
}

const ERROR_HINTS: ErrorHint[] = [
  {
    pattern: /econnrefused|connection refused/,
    message: 'Connection refused',
    suggestion: 'Check that the target is running and listening on the configured port.',
  },
  {
    pattern: /enotfound|getaddrinfo|name or service not known/,
    message: 'Could not resolve hostname',
    suggestion: 'Check the spelling of the target URL and your DNS/network connectivity.',
  },
  {
    pattern: /timeout|timed out/,
    message: 'Request timed out',
    suggestion: 'Raise --timeout, lower the rate, or check whether the target is overloaded.',
  },
  {
    pattern: /\b401\b|unauthorized/,
    message: 'Authentication required (401)',
    suggestion: 'Set LOADPULSE_AUTH_TOKEN or pass --header "Authorization: Bearer <token>".',
  },
  {
    pattern: /\b403\b|forbidden/,
    message: 'Access forbidden (403)',
    suggestion: 'Check that the credentials used have access to the endpoint.',
  },
  {
    pattern: /\b404\b|not found/,
    message: 'Endpoint not found (404)',
    suggestion: 'Check the URL path and HTTP method.',
  },
  {
    pattern: /\b429\b|too many requests/,
    message: 'Rate limited (429)',
    suggestion: 'The target is rate limiting the test; lower the rate or raise its limits.',
  },
  {
    pattern: /\b5\d\d\b|internal server error|bad gateway|service unavailable/,
    message: 'Server error',
    suggestion: 'The target failed to handle the request; check its logs.',
  },
];

/**
 * Maps an error to a short message and an optional hint for the console.
 * Errors that already carry a suggestion keep their own.
 */
export function describeError(error: unknown): { message: string; suggestion?: string } {
  if (error instanceof LoadTestError && error.suggestion) {
    return { message: error.message, suggestion: error.suggestion };
  }

  const text = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  const lowered = text.toLowerCase();

  for (const hint of ERROR_HINTS) {
    if (hint.pattern.test(lowered)) {
      return { message: hint.message, suggestion: hint.suggestion };
    }
  }

  return { message: error instanceof Error ? error.message : text };
}

/**
 * Short classifier for a failed execution: the error's own code, then the
 * HTTP status it carries, then its class name.
 */
export function errorCodeOf(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'string' && error.code.length > 0) return error.code;
    if ('statusCode' in error && typeof error.statusCode === 'number') return `HTTP_${error.statusCode}`;
    if ('status' in error && typeof error.status === 'number') return `HTTP_${error.status}`;
    if ('name' in error && typeof error.name === 'string' && error.name !== 'Error') return error.name;
  }
  return 'UNKNOWN';
}
