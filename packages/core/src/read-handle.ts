/**
 * ReadHandle - the consumer side of a handoff.
 */

import { NoStateError } from "./error"
import { err, ok, unwrap } from "./result"
import type { Result } from "./result"
import type { HandoffState, ReadFailure, SharedState } from "./shared-state"

/**
 * ReadHandle - observes one SharedState.
 *
 * Obtained from `WriteHandle.issueReadHandle()`. A handle without state
 * (released, transferred, or constructed unbound) fails every operation
 * with `NoStateError`.
 *
 * @example
 * ```typescript
 * const reader = unwrap(writer.issueReadHandle())
 *
 * const result = await reader.get()
 * if (result.ok) {
 *   console.log(result.value)
 * }
 * ```
 */
export class ReadHandle<T, E = Error> {
  #state: SharedState<T, E> | undefined

  constructor(state?: SharedState<T, E>) {
    this.#state = state
  }

  /**
   * Wait for the outcome. Calling it again after a successful write returns
   * the same value; the handle stays valid.
   */
  async get(): Promise<Result<T, ReadFailure<E> | NoStateError>> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    return this.#state.read()
  }

  /**
   * The outcome as a plain promise: resolves with the value, rejects with
   * whatever `get()` would have returned as its error.
   */
  get value(): Promise<T> {
    return this.get().then((result) => unwrap(result))
  }

  /**
   * Check readiness without waiting.
   */
  isReady(): Result<boolean, NoStateError> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    return ok(this.#state.pollReady())
  }

  /**
   * Wait until a value or failure is written, without fetching it.
   */
  async wait(): Promise<Result<void, NoStateError>> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    await this.#state.blockUntilReady()
    return ok(undefined)
  }

  /**
   * Get the current state without waiting.
   */
  state(): Result<HandoffState, NoStateError> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    return ok(this.#state.state())
  }

  isValid(): boolean {
    return this.#state !== undefined
  }

  /**
   * Move the state into a new handle. This handle is empty afterwards.
   */
  transfer(): Result<ReadHandle<T, E>, NoStateError> {
    const state = this.#state
    if (!state) {
      return err(new NoStateError())
    }
    this.#state = undefined
    return ok(new ReadHandle(state))
  }

  /**
   * Drop the reference to the state.
   */
  release(): void {
    this.#state = undefined
  }
}
