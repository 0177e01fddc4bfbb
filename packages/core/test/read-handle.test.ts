/**
 * Tests for ReadHandle.
 */

import { describe, expect, it } from "vitest"
import { NoStateError, ReadHandle, unwrap } from "../src/index"
import { testWithHandoff } from "./support/test-context"
import { sleep, trackSettlement } from "./support/test-helpers"

// ============================================================================
// Observation
// ============================================================================

describe(`ReadHandle Observation`, () => {
  testWithHandoff(
    `should report readiness without waiting`,
    ({ writer, reader }) => {
      expect(reader.isReady()).toEqual({ ok: true, value: false })
      expect(reader.state()).toEqual({ ok: true, value: `pending` })

      writer.writeValue(1)

      expect(reader.isReady()).toEqual({ ok: true, value: true })
      expect(reader.state()).toEqual({ ok: true, value: `fulfilled` })
    }
  )

  testWithHandoff(
    `should wait for readiness separately from fetching`,
    async ({ writer, reader }) => {
      const waiting = reader.wait()
      const isSettled = trackSettlement(waiting)
      await sleep(10)
      expect(isSettled()).toBe(false)

      writer.writeFailure(new Error(`late failure`))
      const waited = await waiting

      expect(waited.ok).toBe(true)
      expect(reader.state()).toEqual({ ok: true, value: `failed` })
    }
  )

  testWithHandoff(
    `should return the same value on every get`,
    async ({ writer, reader }) => {
      writer.writeValue(13)

      expect(await reader.get()).toEqual({ ok: true, value: 13 })
      expect(await reader.get()).toEqual({ ok: true, value: 13 })
      expect(reader.isValid()).toBe(true)
    }
  )
})

// ============================================================================
// Value Promise
// ============================================================================

describe(`ReadHandle Value Promise`, () => {
  testWithHandoff(
    `should resolve with the written value`,
    async ({ writer, reader }) => {
      const value = reader.value

      writer.writeValue(64)

      expect(await value).toBe(64)
    }
  )

  testWithHandoff(
    `should reject with the written failure itself`,
    async ({ writer, reader }) => {
      const failure = new Error(`disk full`)

      writer.writeFailure(failure)

      await expect(reader.value).rejects.toBe(failure)
    }
  )

  it(`should reject with NoStateError on an unbound handle`, async () => {
    const reader = new ReadHandle<number>()

    await expect(reader.value).rejects.toThrow(NoStateError)
  })
})

// ============================================================================
// Empty Handles
// ============================================================================

describe(`ReadHandle Empty Handles`, () => {
  it(`should fail every operation on an unbound handle`, async () => {
    const reader = new ReadHandle<number>()

    expect(reader.isValid()).toBe(false)
    expect(await reader.get()).toEqual({
      ok: false,
      error: expect.any(NoStateError),
    })
    expect(reader.isReady()).toEqual({
      ok: false,
      error: expect.any(NoStateError),
    })
    expect(await reader.wait()).toEqual({
      ok: false,
      error: expect.any(NoStateError),
    })
    expect(reader.state()).toEqual({
      ok: false,
      error: expect.any(NoStateError),
    })
    expect(reader.transfer()).toEqual({
      ok: false,
      error: expect.any(NoStateError),
    })
  })

  testWithHandoff(
    `should move the state on transfer`,
    async ({ writer, reader }) => {
      const moved = unwrap(reader.transfer())

      writer.writeValue(2)

      expect(reader.isValid()).toBe(false)
      expect(await moved.get()).toEqual({ ok: true, value: 2 })
      expect(await reader.get()).toEqual({
        ok: false,
        error: expect.any(NoStateError),
      })
    }
  )

  testWithHandoff(
    `should drop the state on release`,
    async ({ writer, reader }) => {
      reader.release()

      expect(reader.isValid()).toBe(false)
      expect(reader.isReady()).toEqual({
        ok: false,
        error: expect.any(NoStateError),
      })
      expect(writer.writeValue(5).ok).toBe(true)
    }
  )
})
