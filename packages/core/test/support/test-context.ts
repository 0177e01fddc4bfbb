/**
 * Test fixtures for handoff tests.
 */

import { test } from "vitest"
import { WriteHandle, unwrap } from "../../src/index"
import type { ReadHandle } from "../../src/index"

/**
 * Fixture with a numeric write handle and the read handle issued from it.
 */
export const testWithHandoff = test.extend<{
  writer: WriteHandle<number>
  reader: ReadHandle<number>
}>({
  // Write handle fixture - released after each test so no reader is left waiting
  // eslint-disable-next-line no-empty-pattern
  writer: async ({}, use) => {
    const writer = new WriteHandle<number>()
    await use(writer)
    writer.release()
  },

  // Read handle fixture - the one handle issued from `writer`
  reader: async ({ writer }, use) => {
    await use(unwrap(writer.issueReadHandle()))
  },
})
