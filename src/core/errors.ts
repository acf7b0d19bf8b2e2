/**
 * errors.ts — Thrown error types.
 *
 * Expected outcomes (session expired, breaker open, login exhausted) travel as
 * tagged results.  These classes are for the few failures that must unwind to
 * the process boundary or that a collaborator reports by throwing.
 */

export type TrackerErrorCode =
  | 'CONFIG_INVALID'
  | 'RUN_FATAL'
  | 'CHALLENGE_UNSOLVED'
  | 'EXPORT_FAILED';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** One or more environment variables failed validation. */
export class ConfigError extends TrackerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** The run cannot continue (login exhausted, OTP never arrived). Not retried by the core. */
export class RunFatalError extends TrackerError {
  constructor(message: string) {
    super('RUN_FATAL', message);
  }
}

/** The challenge-solving service returned an error or an empty answer. */
export class ChallengeSolveError extends TrackerError {
  constructor(message: string) {
    super('CHALLENGE_UNSOLVED', message);
  }
}

/** The downstream export rejected the batch; the snapshot must not be committed. */
export class ExportError extends TrackerError {
  constructor(message: string) {
    super('EXPORT_FAILED', message);
  }
}
