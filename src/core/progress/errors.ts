/**
 * Usage errors raised by the progress bar.
 *
 * Out-of-range progress values are clamped and cleanup failures are logged,
 * so these cover caller mistakes only.
 */

export type ProgressErrorCode = "USED_AFTER_FINISH" | "MESSAGE_FORMAT" | "INVALID_RANK";

/**
 * Base class for progress bar errors
 */
export class ProgressBarError extends Error {
  readonly code: ProgressErrorCode;

  constructor(message: string, code: ProgressErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A bar method was called after finish()
 */
export class UsedAfterFinishError extends ProgressBarError {
  constructor(method: string) {
    super(`ProgressBar.${method}() used after finish`, "USED_AFTER_FINISH");
  }
}

/**
 * A message template does not match its substitution values
 */
export class MessageFormatError extends ProgressBarError {
  readonly template: string;

  constructor(template: string, expected: number, received: number) {
    super(`Message template "${template}" expects ${expected} value(s), received ${received}`, "MESSAGE_FORMAT");
    this.template = template;
  }
}

/**
 * A worker rank is not usable with the channel
 */
export class InvalidRankError extends ProgressBarError {
  readonly rank: number;

  constructor(rank: number, reason: string) {
    super(`Invalid worker rank ${rank}: ${reason}`, "INVALID_RANK");
    this.rank = rank;
  }
}
