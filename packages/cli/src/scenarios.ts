/**
 * Producer/consumer scenarios driving a handoff.
 *
 * Each producer runs as its own async task holding the write handle; the
 * consumer holds the read handle and waits for the outcome.
 */

import { createHandoff, unwrap, withWriteHandle } from "@handoff/core"
import fastq from "fastq"
import type {
  NoStateError,
  ReadFailure,
  ReadHandle,
  Result,
  WriteHandle,
} from "@handoff/core"
import type { queueAsPromised } from "fastq"
import type { DemoConfig } from "./config"

/**
 * What a consumer received.
 */
export type Outcome<T> = Result<T, ReadFailure<Error> | NoStateError>

interface ProducerTask {
  writer: WriteHandle<number>
  label: string
  value: number
  delayMs: number
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`
  return String(error)
}

async function produceValue(task: ProducerTask): Promise<void> {
  await withWriteHandle(task.writer, async (writer) => {
    console.log(`${task.label}: Working...`)
    await sleep(task.delayMs)
    unwrap(writer.writeValue(task.value))
    console.log(`${task.label}: Data set.`)
  })
}

async function produceFailure(
  writer: WriteHandle<number>,
  message: string,
  delayMs: number
): Promise<void> {
  await withWriteHandle(writer, async (w) => {
    try {
      console.log(`Producer: Working...`)
      await sleep(delayMs)
      throw new Error(message)
    } catch (error) {
      unwrap(
        w.writeFailure(
          error instanceof Error ? error : new Error(String(error))
        )
      )
      console.log(`Producer: Exception set.`)
    }
  })
}

async function produceNothing(
  writer: WriteHandle<number>,
  delayMs: number
): Promise<void> {
  await withWriteHandle(writer, async () => {
    console.log(`Producer: Working...`)
    await sleep(delayMs)
    console.log(`Producer: Giving up without a result.`)
  })
}

/**
 * Wait on the read handle and log what arrives.
 */
export async function consume(
  reader: ReadHandle<number>,
  label = `Consumer`
): Promise<Outcome<number>> {
  if (unwrap(reader.isReady())) {
    console.log(`${label}: Data is ready immediately!`)
  } else {
    console.log(`${label}: Data not ready yet. Waiting...`)
  }

  const result = await reader.get()
  if (result.ok) {
    console.log(`${label}: Got value: ${result.value}`)
  } else {
    console.log(`${label}: Caught exception: ${describeError(result.error)}`)
  }
  return result
}

/**
 * The producer writes `value` after working for `config.delayMs`.
 */
export async function runValueScenario(
  value: number,
  config: DemoConfig
): Promise<Outcome<number>> {
  const { writer, reader } = createHandoff<number>()

  const producer = produceValue({
    writer: unwrap(writer.transfer()),
    label: `Producer`,
    value,
    delayMs: config.delayMs,
  })
  const outcome = await consume(reader)
  await producer

  return outcome
}

/**
 * The producer fails with `message`.
 */
export async function runFailScenario(
  message: string,
  config: DemoConfig
): Promise<Outcome<number>> {
  const { writer, reader } = createHandoff<number>()

  const producer = produceFailure(
    unwrap(writer.transfer()),
    message,
    config.delayMs
  )
  const outcome = await consume(reader)
  await producer

  return outcome
}

/**
 * The producer releases its write handle without writing.
 */
export async function runAbandonScenario(
  config: DemoConfig
): Promise<Outcome<number>> {
  const { writer, reader } = createHandoff<number>()

  const producer = produceNothing(unwrap(writer.transfer()), config.delayMs)
  const outcome = await consume(reader)
  await producer

  return outcome
}

/**
 * Run `config.consumers` independent handoffs. Producers run on a worker
 * pool of `config.workers`; producer `i` writes `(i + 1) * 10`.
 */
export async function runBatchScenario(
  config: DemoConfig
): Promise<Array<Outcome<number>>> {
  const queue: queueAsPromised<ProducerTask, void> = fastq.promise(
    produceValue,
    config.workers
  )

  const handoffs = Array.from({ length: config.consumers }, () =>
    createHandoff<number>()
  )

  const consumers = handoffs.map(({ reader }, index) =>
    consume(reader, `Consumer ${index}`)
  )
  const producers = handoffs.map(({ writer }, index) =>
    queue.push({
      writer: unwrap(writer.transfer()),
      label: `Producer ${index}`,
      value: (index + 1) * 10,
      delayMs: config.delayMs,
    })
  )

  await Promise.all(producers)
  return Promise.all(consumers)
}
