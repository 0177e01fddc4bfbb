import { WriteHandle } from "./write-handle"
import type { ReadHandle } from "./read-handle"

/**
 * A fresh write handle together with its one read handle.
 */
export interface Handoff<T, E = Error> {
  writer: WriteHandle<T, E>
  reader: ReadHandle<T, E>
}

/**
 * Create a write handle and issue its read handle.
 */
export function createHandoff<T, E = Error>(): Handoff<T, E> {
  const writer = new WriteHandle<T, E>()
  const issued = writer.issueReadHandle()
  // A new handle holds state and has issued nothing yet.
  if (!issued.ok) throw issued.error
  return { writer, reader: issued.value }
}
