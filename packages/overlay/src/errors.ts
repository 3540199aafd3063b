export type ParameterIssue = {
  field: string;
  message: string;
};

export abstract class OverlayError extends Error {
  abstract readonly code: 'INVALID_PARAMETER' | 'MISSING_DURATION';

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A config field is missing or malformed. `field` names the first problem,
 * `issues` every malformed field. Cross-field rules (required text key,
 * `end_time` after `start_time`) are only checked once each field is well-formed.
 */
export class InvalidParameterError extends OverlayError {
  readonly code = 'INVALID_PARAMETER' as const;
  readonly field: string;
  readonly issues: ParameterIssue[];

  constructor(field: string, message: string, issues?: ParameterIssue[]) {
    super(message);
    this.field = field;
    this.issues = issues ?? [{ field, message }];
  }

  /** Re-scopes the error under a parent path, e.g. `words[2]`. */
  withPrefix(prefix: string): InvalidParameterError {
    return new InvalidParameterError(
      `${prefix}.${this.field}`,
      `${prefix}: ${this.message}`,
      this.issues.map((issue) => ({ ...issue, field: `${prefix}.${issue.field}` })),
    );
  }
}

/** A duration-dependent effect ran on an element whose duration is unset. */
export class MissingDurationError extends OverlayError {
  readonly code = 'MISSING_DURATION' as const;
  readonly effect: string;

  constructor(effect: string) {
    super(`'${effect}' requires a resolved duration; set 'end_time' or 'duration'`);
    this.effect = effect;
  }
}

export function isOverlayError(error: unknown): error is OverlayError {
  return error instanceof OverlayError;
}
