import type { RemoteIdentity } from "./stackTypes.js";

/**
 * Base class for every error the tool raises on purpose. The CLI prints
 * these without a stack trace.
 */
export class StackError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A commit is bound to a revision the server no longer returns.
 */
export class StaleIdentityError extends StackError {
  constructor(
    readonly identity: RemoteIdentity,
    readonly localId: string,
  ) {
    super(
      `Commit ${localId} refers to D${identity}, but the server didn't return it. ` +
        "It might be inaccessible or not exist at all. Remove the " +
        '"Differential Revision:" line from the commit message to submit it as a new revision.',
    );
  }
}

export class DuplicateIdentityError extends StackError {
  constructor(
    readonly identity: RemoteIdentity,
    readonly localIds: [string, string],
  ) {
    super(
      `Revisions should be unique, but commits ${localIds[0]} and ${localIds[1]} ` +
        `both refer to D${identity}.`,
    );
  }
}

export class ReorderedStackError extends StackError {
  constructor(
    readonly identity: RemoteIdentity,
    readonly ancestor: RemoteIdentity,
  ) {
    super(
      `D${ancestor} was submitted below D${identity}, but now sits above it in the stack. ` +
        "Reordering revisions is not supported; rerun with --allow-reorder to rewrite " +
        "the parent relations anyway.",
    );
  }
}

/**
 * Commits that can't be submitted as they are, e.g. with unknown reviewers.
 * `--force` turns these into warnings.
 */
export class PreflightError extends StackError {
  constructor(readonly problems: string[]) {
    super(
      `Unable to submit:\n${problems.map((p) => `  ${p}`).join("\n")}\n` +
        "Fix the commits or rerun with --force to submit anyway.",
    );
  }
}

export class MarkerError extends StackError {
  constructor(readonly localId: string | null) {
    super(
      `${localId ? `Commit ${localId}` : "Commit message"} has more than one ` +
        '"Differential Revision:" line; keep exactly one.',
    );
  }
}

export class SubmissionError extends StackError {
  constructor(
    message: string,
    readonly operationIndex: number,
    readonly lastSucceededOrdinal: number | null,
    cause: Error,
  ) {
    super(message, { cause });
  }
}

export class AmendmentError extends StackError {
  constructor(
    message: string,
    readonly localId: string | null,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
  }
}

export class ConduitAPIError extends StackError {
  constructor(
    readonly method: string,
    detail: string | null,
  ) {
    super(`Phabricator error in ${method}: ${detail ?? "Unknown Error"}`);
  }
}

export class CommandError extends StackError {
  constructor(
    message: string,
    readonly status: number | null,
    readonly stderr: string,
  ) {
    super(message);
  }
}

export class ConfigError extends StackError {}

// Bad command-line arguments
export class UsageError extends StackError {}

/**
 * Normalise anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
