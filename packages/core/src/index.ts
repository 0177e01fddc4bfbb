/**
 * @handoff/core
 *
 * One-shot, single-value handoff between a producer and its consumer.
 *
 * A WriteHandle satisfies shared state exactly once with a value or a
 * failure; the ReadHandle issued from it waits for and observes the outcome.
 * Releasing a WriteHandle that never wrote fails its reader with
 * BrokenWriteHandleError instead of leaving it waiting.
 *
 * @packageDocumentation
 */

// Handles
export { WriteHandle, withWriteHandle } from "./write-handle"
export { ReadHandle } from "./read-handle"
export { createHandoff } from "./handoff"

// Shared state
export { SharedState } from "./shared-state"
export { Condition } from "./condition"

// Results
export { ok, err, unwrap } from "./result"

// Types
export type { Handoff } from "./handoff"
export type { HandoffState, ReadFailure } from "./shared-state"
export type { Result } from "./result"
export type { HandoffErrorCode } from "./error"

// Errors
export {
  HandoffError,
  AlreadySatisfiedError,
  AlreadyIssuedError,
  NoStateError,
  BrokenWriteHandleError,
  InternalInconsistencyError,
  isHandoffError,
} from "./error"
