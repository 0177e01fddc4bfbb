/**
 * Tests for demo configuration.
 */

import { describe, expect, it } from "vitest"
import { DEFAULT_CONFIG, InvalidConfigError, loadConfig } from "../src/config"

describe(`loadConfig`, () => {
  it(`should use defaults when nothing is set`, () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG)
  })

  it(`should treat empty variables as unset`, () => {
    expect(loadConfig({ HANDOFF_DELAY_MS: `` }).delayMs).toBe(2000)
  })

  it(`should read every variable`, () => {
    expect(
      loadConfig({
        HANDOFF_DELAY_MS: `0`,
        HANDOFF_CONSUMERS: `3`,
        HANDOFF_WORKERS: `1`,
      })
    ).toEqual({ delayMs: 0, consumers: 3, workers: 1 })
  })

  it(`should reject values that are not integers`, () => {
    expect(() => loadConfig({ HANDOFF_DELAY_MS: `soon` })).toThrow(
      `HANDOFF_DELAY_MS must be an integer of at least 0, got 'soon'`
    )
    expect(() => loadConfig({ HANDOFF_WORKERS: `1.5` })).toThrow(
      InvalidConfigError
    )
  })

  it(`should reject values below the minimum`, () => {
    expect(() => loadConfig({ HANDOFF_CONSUMERS: `0` })).toThrow(
      `HANDOFF_CONSUMERS must be an integer of at least 1, got '0'`
    )
    expect(() => loadConfig({ HANDOFF_DELAY_MS: `-5` })).toThrow(
      InvalidConfigError
    )
  })
})
