/**
 * WriteHandle - the producer side of a handoff.
 *
 * Holds the only right to write the shared state and the obligation to
 * either write or be released. Releasing a handle that never wrote, after a
 * read handle was issued, installs a BrokenWriteHandleError so readers are
 * not left waiting forever.
 */

import {
  AlreadyIssuedError,
  BrokenWriteHandleError,
  NoStateError,
} from "./error"
import { ReadHandle } from "./read-handle"
import { err, ok } from "./result"
import { SharedState } from "./shared-state"
import type { AlreadySatisfiedError } from "./error"
import type { Result } from "./result"

/**
 * WriteHandle - move-only capability to satisfy a handoff exactly once.
 *
 * @example
 * ```typescript
 * const writer = new WriteHandle<number>()
 * const reader = unwrap(writer.issueReadHandle())
 *
 * // Producer task
 * await withWriteHandle(unwrap(writer.transfer()), async (w) => {
 *   w.writeValue(await compute())
 * })
 *
 * // Consumer task
 * const value = await reader.value
 * ```
 */
export class WriteHandle<T, E = Error> {
  #state: SharedState<T, E> | undefined
  #readHandleIssued = false

  constructor() {
    this.#state = new SharedState<T, E>()
  }

  /**
   * Issue the one read handle bound to this handle's state.
   */
  issueReadHandle(): Result<
    ReadHandle<T, E>,
    AlreadyIssuedError | NoStateError
  > {
    if (!this.#state) {
      return err(new NoStateError())
    }
    if (this.#readHandleIssued) {
      return err(new AlreadyIssuedError())
    }

    this.#readHandleIssued = true
    return ok(new ReadHandle(this.#state))
  }

  /**
   * Satisfy the handoff with a value.
   */
  writeValue(value: T): Result<void, AlreadySatisfiedError | NoStateError> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    return this.#state.writeValue(value)
  }

  /**
   * Satisfy the handoff with a failure. Readers receive `error` itself.
   */
  writeFailure(error: E): Result<void, AlreadySatisfiedError | NoStateError> {
    if (!this.#state) {
      return err(new NoStateError())
    }
    return this.#state.writeFailure(error)
  }

  isValid(): boolean {
    return this.#state !== undefined
  }

  /**
   * Move the state and the issued flag into a new handle.
   * This handle is empty afterwards and fails every operation with NoStateError.
   */
  transfer(): Result<WriteHandle<T, E>, NoStateError> {
    const state = this.#state
    if (!state) {
      return err(new NoStateError())
    }

    const target = new WriteHandle<T, E>()
    target.#state = state
    target.#readHandleIssued = this.#readHandleIssued

    this.#state = undefined
    return ok(target)
  }

  /**
   * Give up the right to write.
   *
   * If nothing was written and a read handle exists, readers receive a
   * BrokenWriteHandleError. Releasing an empty handle does nothing.
   */
  release(): void {
    const state = this.#state
    if (!state) return
    this.#state = undefined

    if (this.#readHandleIssued && !state.pollReady()) {
      // Readiness was checked above, so this write cannot fail.
      state.writeFailure(new BrokenWriteHandleError())
    }
  }
}

/**
 * Run `fn` with the write handle and release the handle afterwards, whether
 * `fn` returns, throws, or rejects. Resolves with `fn`'s result.
 */
export async function withWriteHandle<T, E, R>(
  handle: WriteHandle<T, E>,
  fn: (handle: WriteHandle<T, E>) => R | Promise<R>
): Promise<R> {
  try {
    return await fn(handle)
  } finally {
    handle.release()
  }
}
