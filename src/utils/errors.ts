/**
 * Error taxonomy shared by the routing core.
 */

/**
 * Malformed routing configuration. Fatal at startup; on reload the
 * previous configuration version stays active.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised inside route() when the local decision deadline passes.
 * Never escapes route(); it selects the fail-open path.
 */
export class RouteDeadlineError extends Error {
  readonly elapsedMs: number;

  constructor(step: string, elapsedMs: number) {
    super(`Routing deadline exceeded during ${step} after ${elapsedMs}ms`);
    this.name = 'RouteDeadlineError';
    this.elapsedMs = elapsedMs;
  }
}

/**
 * A feedback set that cannot be turned into a reward sample.
 */
export class EvaluationError extends Error {
  readonly contentId: string;

  constructor(contentId: string, message: string) {
    super(message);
    this.name = 'EvaluationError';
    this.contentId = contentId;
  }
}

export class CycleInProgressError extends Error {
  constructor() {
    super('A learning cycle is already running');
    this.name = 'CycleInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
