/**
 * SharedState - the single cell a producer writes once and consumers observe.
 *
 * Each operation's critical section is synchronous, so no other task can see
 * the slot, failure and ready flag half-updated. Readers suspend on a
 * Condition keyed on `ready` until a write wakes them.
 */

import { Condition } from "./condition"
import { AlreadySatisfiedError, InternalInconsistencyError } from "./error"
import { err, ok } from "./result"
import type { BrokenWriteHandleError } from "./error"
import type { Result } from "./result"

/**
 * State of a handoff. `fulfilled` and `failed` are terminal.
 */
export type HandoffState = `pending` | `fulfilled` | `failed`

/**
 * Everything a reader can receive instead of a value: the producer's own
 * failure, a synthesized broken-write-handle failure, or the defensive
 * inconsistency error.
 */
export type ReadFailure<E> =
  | E
  | BrokenWriteHandleError
  | InternalInconsistencyError

export class SharedState<T, E = Error> {
  #slot: { value: T } | undefined
  #failure: { error: E | BrokenWriteHandleError } | undefined
  #ready = false
  readonly #condition = new Condition()

  /**
   * Store the value and wake every waiting reader.
   */
  writeValue(value: T): Result<void, AlreadySatisfiedError> {
    if (this.#ready) {
      return err(new AlreadySatisfiedError())
    }

    this.#slot = { value }
    this.#ready = true
    this.#condition.notifyAll()
    return ok(undefined)
  }

  /**
   * Store the failure and wake every waiting reader.
   */
  writeFailure(
    error: E | BrokenWriteHandleError
  ): Result<void, AlreadySatisfiedError> {
    if (this.#ready) {
      return err(new AlreadySatisfiedError())
    }

    this.#failure = { error }
    this.#ready = true
    this.#condition.notifyAll()
    return ok(undefined)
  }

  /**
   * Wait until ready, then return the stored value or the stored failure.
   *
   * A failure is returned as the exact object that was written. Reading a
   * successful value does not consume it.
   */
  async read(): Promise<Result<T, ReadFailure<E>>> {
    await this.blockUntilReady()

    if (this.#failure) {
      return err(this.#failure.error)
    }
    if (this.#slot) {
      return ok(this.#slot.value)
    }
    return err(new InternalInconsistencyError())
  }

  /**
   * Current readiness, without waiting.
   */
  pollReady(): boolean {
    return this.#ready
  }

  /**
   * Wait until ready without looking at the outcome.
   */
  blockUntilReady(): Promise<void> {
    return this.#condition.wait(() => this.#ready)
  }

  /**
   * Current position in the state machine, without waiting.
   */
  state(): HandoffState {
    if (!this.#ready) return `pending`
    return this.#failure ? `failed` : `fulfilled`
  }
}
