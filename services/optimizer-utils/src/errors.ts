/** Stable codes carried by every error this package raises. */
export type OptimizerErrorCode = 'context_unavailable' | 'missing_variable' | 'invalid_sessions';

export abstract class OptimizerError extends Error {
  abstract readonly code: OptimizerErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised when a namespace is resolved without a config and no ambient config has been set. */
export class ContextUnavailableError extends OptimizerError {
  readonly code = 'context_unavailable';

  constructor(message = 'No runnable config available: pass one explicitly or call setRunnableConfig()') {
    super(message);
  }
}

/**
 * Raised when a candidate prompt drops one or more required `{name}` placeholders.
 * Lists every missing name so the producer can retry with all of them in one pass.
 */
export class MissingVariableError extends OptimizerError {
  readonly code = 'missing_variable';
  readonly missingVariables: string[];

  constructor(missingVariables: string[]) {
    super(`Missing required variable: ${missingVariables.join(', ')}`);
    this.missingVariables = missingVariables;
  }
}

export interface SessionsIssue {
  path: Array<string | number>;
  message: string;
}

export class InvalidSessionsError extends OptimizerError {
  readonly code = 'invalid_sessions';
  readonly issues: SessionsIssue[];

  constructor(issues: SessionsIssue[]) {
    super(`Unrecognized sessions payload: ${issues.map((i) => i.message).join('; ')}`);
    this.issues = issues;
  }
}
