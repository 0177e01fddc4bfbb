/**
 * Handoff Error Classes
 */

/**
 * Discriminator carried by every error the handoff itself produces.
 */
export type HandoffErrorCode =
  | `ALREADY_SATISFIED`
  | `ALREADY_ISSUED`
  | `NO_STATE`
  | `BROKEN_WRITE_HANDLE`
  | `INTERNAL_INCONSISTENCY`

/**
 * Base class for handoff errors. Producer failures passed to
 * `writeFailure()` are never wrapped in one of these.
 */
export abstract class HandoffError extends Error {
  abstract readonly code: HandoffErrorCode
}

/**
 * Error returned when writing to a handoff that already holds a value or a failure.
 */
export class AlreadySatisfiedError extends HandoffError {
  readonly code = `ALREADY_SATISFIED`

  constructor(message = `Handoff has already been satisfied`) {
    super(message)
    this.name = `AlreadySatisfiedError`
  }
}

/**
 * Error returned when a second read handle is requested from a write handle.
 */
export class AlreadyIssuedError extends HandoffError {
  readonly code = `ALREADY_ISSUED`

  constructor(message = `Read handle has already been issued`) {
    super(message)
    this.name = `AlreadyIssuedError`
  }
}

/**
 * Error returned by any operation on a handle that was transferred or released.
 */
export class NoStateError extends HandoffError {
  readonly code = `NO_STATE`

  constructor(message = `Handle has no associated state`) {
    super(message)
    this.name = `NoStateError`
  }
}

/**
 * Failure installed when a write handle is released without ever writing
 * while a read handle exists.
 */
export class BrokenWriteHandleError extends HandoffError {
  readonly code = `BROKEN_WRITE_HANDLE`

  constructor(message = `Write handle released without a result`) {
    super(message)
    this.name = `BrokenWriteHandleError`
  }
}

/**
 * Error returned when the state is ready but holds neither a value nor a failure.
 */
export class InternalInconsistencyError extends HandoffError {
  readonly code = `INTERNAL_INCONSISTENCY`

  constructor(
    message = `Internal error: state is ready but holds no value or failure`
  ) {
    super(message)
    this.name = `InternalInconsistencyError`
  }
}

/**
 * Check if a value is one of the handoff's own errors.
 */
export function isHandoffError(value: unknown): value is HandoffError {
  return value instanceof HandoffError
}
